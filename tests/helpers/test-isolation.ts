import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

/**
 * Per-test scratch directories so file-backed tests never share state
 */
export class TestIsolation {
  private static readonly dirs = new Set<string>();

  static async createDataDir(testName: string): Promise<string> {
    const safeName = testName.replace(/[^a-zA-Z0-9-]+/g, '-').slice(0, 40);
    const dir = await mkdtemp(join(tmpdir(), `catalog-sync-${safeName}-`));
    this.dirs.add(dir);
    return dir;
  }

  static async cleanup(): Promise<void> {
    const dirs = [...this.dirs];
    this.dirs.clear();
    await Promise.all(dirs.map(dir => rm(dir, { recursive: true, force: true })));
  }
}
