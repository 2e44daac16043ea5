/**
 * Swappable random source so retry jitter can be made deterministic in tests
 */

let source: () => number = Math.random;

export function setDeterministicRng(fn: () => number): void {
  source = fn;
}

export function resetRng(): void {
  source = Math.random;
}

/**
 * Number in [0, 1) from the current source
 */
export function random(): number {
  return source();
}
