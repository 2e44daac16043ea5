import { promises as fs } from 'fs';
import { join, dirname, basename } from 'path';
import { randomUUID } from 'crypto';
import { logger } from '../core/logger';
import { config } from '../core/config';
import { fileSystemBreaker } from './circuitBreaker';
import { fileSystemBulkhead } from './bulkhead';
import { incrementFsRetries } from './metrics';
import { random } from '../testing/rng';

// Errors that will not go away by trying again
const NON_TRANSIENT_CODES = new Set(['ENOENT', 'ENOTDIR', 'EISDIR']);

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

// Exponential backoff with jitter
function getDelayWithJitter(attempt: number): number {
  const baseDelay = config.RETRY_BASE_MS * Math.pow(2, attempt - 1);
  const jitterMs = config.RETRY_JITTER_MS || 0;
  const jitter = random() * jitterMs;
  return Math.floor(baseDelay + jitter);
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function isTransientFsError(error: unknown): boolean {
  if (error instanceof SyntaxError) {
    return false;
  }
  const code = errorCode(error);
  return code === undefined || !NON_TRANSIENT_CODES.has(code);
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Retry wrapper with exponential backoff and jitter. Non-transient errors
 * (missing files, malformed JSON) are rethrown untouched on first sight.
 */
export async function withFsRetry<T>(
  operation: () => Promise<T>,
  operationName: string,
  context: Record<string, unknown> = {}
): Promise<T> {
  let lastError: Error | null = null;
  const retryTimes = config.RETRY_TIMES;

  for (let attempt = 1; attempt <= retryTimes + 1; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (!isTransientFsError(error)) {
        throw error;
      }

      lastError = toError(error);
      logger.warn({
        ...context,
        operationName,
        attempt,
        error: lastError.message,
      }, `${operationName} attempt failed`);

      if (attempt <= retryTimes) {
        const delay = getDelayWithJitter(attempt);
        incrementFsRetries();
        logger.debug({ ...context, operationName, attempt, delay }, `Retrying ${operationName}`);
        await sleep(delay);
      }
    }
  }

  logger.error({ ...context, operationName, attempts: retryTimes + 1 }, `${operationName} failed after all retries`);
  throw new Error(`${operationName} failed after ${retryTimes + 1} attempts: ${lastError?.message}`);
}

function guarded<T>(operation: () => Promise<T>): Promise<T> {
  return fileSystemBulkhead.run(() => fileSystemBreaker.execute(operation));
}

/**
 * Read and parse a JSON file. The caller validates the shape.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  return guarded(() =>
    withFsRetry(
      async (): Promise<unknown> => {
        const data = await fs.readFile(filePath, 'utf8');
        return JSON.parse(data);
      },
      'File read',
      { filePath }
    )
  );
}

/**
 * Temp file name used by writeJsonAtomic; hidden and suffixed so leftovers
 * from an interrupted write can be found and removed.
 */
export function tempPathFor(filePath: string): string {
  return join(dirname(filePath), `.${basename(filePath)}.${randomUUID()}.tmp`);
}

export function isTempFileFor(filePath: string, candidate: string): boolean {
  const prefix = `.${basename(filePath)}.`;
  return candidate.startsWith(prefix) && candidate.endsWith('.tmp');
}

/**
 * Atomic JSON write: temp file in the same directory, then rename over the target
 */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  return guarded(() =>
    withFsRetry(
      async () => {
        const jsonData = JSON.stringify(data, null, 2);
        const tempPath = tempPathFor(filePath);

        try {
          await fs.writeFile(tempPath, jsonData, 'utf8');
          await fs.rename(tempPath, filePath);
          logger.debug({ filePath }, 'File written atomically');
        } catch (error) {
          await fs.unlink(tempPath).catch((cleanupError: unknown) => {
            logger.debug({ tempPath, error: cleanupError }, 'Temp file cleanup skipped');
          });
          throw error;
        }
      },
      'Atomic file write',
      { filePath }
    )
  );
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

export async function ensureDir(dirPath: string): Promise<void> {
  return guarded(() =>
    withFsRetry(
      async () => {
        await fs.mkdir(dirPath, { recursive: true });
      },
      'Directory creation',
      { dirPath }
    )
  );
}

/**
 * Remove temp files left next to filePath by an interrupted atomic write
 */
export async function removeStaleTempFiles(filePath: string): Promise<string[]> {
  const dir = dirname(filePath);
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return [];
    }
    throw error;
  }

  const stale = entries.filter((entry) => isTempFileFor(filePath, entry));
  for (const entry of stale) {
    await fs.rm(join(dir, entry), { force: true });
    logger.warn({ filePath, tempFile: entry }, 'Removed temp file from interrupted write');
  }
  return stale;
}
