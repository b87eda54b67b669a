/**
 * Common utility functions shared across the engine.
 */

/**
 * Get the current timestamp as an ISO string.
 */
export function now(): string {
  return new Date().toISOString();
}

/**
 * Resolve after `ms` milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Narrow an unknown value to a plain JSON object. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a row's `id` column as a string.
 *
 * Numeric ids (serial primary keys) are stringified; anything else yields
 * `null`.
 */
export function readRecordId(record: Record<string, unknown>, column = 'id'): string | null {
  const value = record[column];
  if (typeof value === 'string' && value.length > 0) return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

/**
 * Reject with a timeout error if `promise` has not settled within `ms`.
 *
 * The underlying work is not cancelled.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error(`${label} timed out after ${Math.round(ms / 1000)}s`));
    }, ms);
    promise.then(
      (val) => { clearTimeout(timer); resolve(val); },
      (err) => { clearTimeout(timer); reject(err); }
    );
  });
}

/**
 * Run async tasks one at a time per key, in call order.
 *
 * Tasks under different keys run concurrently. A rejected task still releases
 * the next one; its rejection reaches only its own caller.
 */
export function createKeyedSerializer(): <T>(key: string, task: () => Promise<T>) => Promise<T> {
  const tails = new Map<string, Promise<void>>();

  return <T>(key: string, task: () => Promise<T>): Promise<T> => {
    const previous = tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const release = (): void => {
      if (tails.get(key) === tail) tails.delete(key);
    };
    const tail: Promise<void> = result.then(release, release);
    tails.set(key, tail);
    return result;
  };
}
