/**
 * Async Utility Functions
 *
 * Timeouts, sleeping, retries and mutual exclusion (global and per key).
 *
 * @module
 */

// =============================================================================
// Timeout
// =============================================================================

export class TimeoutError extends Error {
  constructor(message: string, readonly ms: number) {
    super(message);
    this.name = "TimeoutError";
  }
}

/**
 * Wraps a promise with a timeout.
 * Rejects with a TimeoutError if the promise doesn't settle in time.
 */
export async function timeout<T>(
  promise: Promise<T>,
  ms: number,
  message = "Operation timed out"
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new TimeoutError(message, ms)), ms);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

// =============================================================================
// Sleep
// =============================================================================

export type SleepFn = (ms: number) => Promise<void>;

/**
 * Returns a promise that resolves after the specified duration.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Mutex
// =============================================================================

/**
 * A simple async mutex for serializing access to a shared resource.
 * Uses a FIFO queue so waiters are served in order.
 */
export class Mutex {
  private _locked = false;
  private _waiters: Array<() => void> = [];

  /** Acquires the mutex, waiting if it's currently held. */
  async acquire(): Promise<void> {
    if (!this._locked) {
      this._locked = true;
      return;
    }
    return new Promise<void>((resolve) => {
      this._waiters.push(resolve);
    });
  }

  /** Releases the mutex, waking the next waiter if any. */
  release(): void {
    const next = this._waiters.shift();
    if (next) {
      next();
    } else {
      this._locked = false;
    }
  }

  get locked(): boolean {
    return this._locked;
  }

  get waiting(): number {
    return this._waiters.length;
  }

  /** Runs a function while holding the mutex, releasing on completion. */
  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

/**
 * One mutex per key, created on demand and dropped once nobody holds or
 * waits for it. Work on different keys never contends.
 */
export class KeyedMutex {
  private readonly mutexes = new Map<string, Mutex>();

  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    let mutex = this.mutexes.get(key);
    if (!mutex) {
      mutex = new Mutex();
      this.mutexes.set(key, mutex);
    }
    const held = mutex;
    try {
      return await held.runExclusive(fn);
    } finally {
      if (!held.locked && held.waiting === 0 && this.mutexes.get(key) === held) {
        this.mutexes.delete(key);
      }
    }
  }
}

// =============================================================================
// Retry
// =============================================================================

/**
 * Options for retry behavior
 */
export interface RetryOptions {
  /** Maximum number of attempts (including initial attempt) */
  maxAttempts: number;
  /** Initial delay between retries in milliseconds */
  initialDelayMs: number;
  /** Maximum delay between retries in milliseconds */
  maxDelayMs: number;
  /** Multiplier for exponential backoff */
  backoffFactor: number;
  /** Optional predicate to determine if error is retryable */
  retryIf?: (error: unknown) => boolean;
  /** Optional callback on each retry */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Sleep implementation, replaceable in tests */
  sleep?: SleepFn;
}

const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 100,
  maxDelayMs: 5000,
  backoffFactor: 2,
};

/**
 * Retries a function with exponential backoff. The attempt number (1-based)
 * is passed to the function.
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const wait = opts.sleep ?? sleep;
  let lastError: unknown;
  let delay = opts.initialDelayMs;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (opts.retryIf && !opts.retryIf(error)) {
        throw error;
      }

      if (attempt === opts.maxAttempts) {
        throw error;
      }

      opts.onRetry?.(error, attempt, delay);

      await wait(delay);
      delay = Math.min(delay * opts.backoffFactor, opts.maxDelayMs);
    }
  }

  throw lastError;
}
