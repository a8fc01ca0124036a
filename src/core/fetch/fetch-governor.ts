/**
 * Fetch Governor
 *
 * Owns every network request of a run. Requests are strictly sequential,
 * paced by a state machine that escalates on anomaly signals:
 *
 *   Normal ──anomaly──▶ Cautious ──anomaly──▶ Backoff ──(5 consecutive)──▶ Aborted
 *      ▲                   │
 *      └── 10 clean calls ─┘
 *
 * Each call retries on its own (attempts, per-attempt timeout, exponential
 * delay); exhausting the attempts counts as one anomaly. Backoff never
 * returns to Normal. Once Aborted, every call fails without I/O.
 *
 * @module
 */

import { errorMessage, FetchError, GovernorAbortedError } from "../errors.js";
import { Mutex, retry, sleep as realSleep, timeout, TimeoutError, type SleepFn } from "../../utils/async.js";
import { createLogger } from "../../utils/logger.js";
import {
  PacingConfigSchema,
  RetryConfigSchema,
  type DelayRange,
  type PacingConfig,
  type RetryConfig,
} from "../../utils/validation.js";
import type { Result } from "../../types/result.js";
import type {
  FetchTarget,
  IPageFetcher,
  PageContent,
  PageFetchFailure,
} from "./interfaces/IPageFetcher.js";

const logger = createLogger("fetch-governor");

// =============================================================================
// Types
// =============================================================================

export type GovernorState = "normal" | "cautious" | "backoff" | "aborted";

export interface GovernorTransition {
  from: GovernorState;
  to: GovernorState;
  /** Key of the call that caused the transition */
  key: string;
  at: number;
}

export interface GovernorStats {
  /** fetch() calls accepted */
  calls: number;
  /** Attempts that reached the page fetcher */
  networkRequests: number;
  succeeded: number;
  failed: number;
  anomalies: number;
  /** Calls rejected because the governor had aborted */
  rejected: number;
  /** Total time spent waiting for pacing and backoff */
  waitedMs: number;
}

export interface GovernorSnapshot {
  state: GovernorState;
  consecutiveAnomalies: number;
  stats: GovernorStats;
  transitions: GovernorTransition[];
}

export interface FetchGovernorOptions {
  fetcher: IPageFetcher;
  pacing?: Partial<PacingConfig>;
  retry?: Partial<RetryConfig>;
  /** Clock in milliseconds (default Date.now) */
  now?: () => number;
  sleep?: SleepFn;
  /** Uniform random source in [0, 1) */
  random?: () => number;
  onStateChange?: (transition: GovernorTransition) => void;
}

// =============================================================================
// FetchGovernor
// =============================================================================

export class FetchGovernor {
  private fetcher: IPageFetcher;
  private pacing: PacingConfig;
  private retryPolicy: RetryConfig;
  private now: () => number;
  private sleep: SleepFn;
  private random: () => number;
  private onStateChange?: (transition: GovernorTransition) => void;

  private mutex = new Mutex();
  private _state: GovernorState = "normal";
  private consecutiveAnomalies = 0;
  private cautiousCleanCalls = 0;
  /** Doublings applied to the next Backoff pause */
  private backoffExponent = 0;
  private pendingPauseMs = 0;
  private lastRequestAt: number | null = null;
  private transitions: GovernorTransition[] = [];

  private _stats: GovernorStats = {
    calls: 0,
    networkRequests: 0,
    succeeded: 0,
    failed: 0,
    anomalies: 0,
    rejected: 0,
    waitedMs: 0,
  };

  constructor(options: FetchGovernorOptions) {
    this.fetcher = options.fetcher;
    this.pacing = PacingConfigSchema.parse(options.pacing ?? {});
    this.retryPolicy = RetryConfigSchema.parse(options.retry ?? {});
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? realSleep;
    this.random = options.random ?? Math.random;
    this.onStateChange = options.onStateChange;
  }

  get state(): GovernorState {
    return this._state;
  }

  get aborted(): boolean {
    return this._state === "aborted";
  }

  snapshot(): GovernorSnapshot {
    return {
      state: this._state,
      consecutiveAnomalies: this.consecutiveAnomalies,
      stats: { ...this._stats },
      transitions: [...this.transitions],
    };
  }

  /**
   * Fetches one page. Throws FetchError when the page could not be obtained
   * and GovernorAbortedError once the governor is terminal.
   */
  async fetch(target: FetchTarget): Promise<PageContent> {
    return this.mutex.runExclusive(() => this.fetchExclusive(target));
  }

  // ==========================================================================
  // Internal
  // ==========================================================================

  private async fetchExclusive(target: FetchTarget): Promise<PageContent> {
    if (this._state === "aborted") {
      this._stats.rejected++;
      throw new GovernorAbortedError(
        "Fetch governor aborted after repeated anomalies; manual intervention required",
        { key: target.key, url: target.url }
      );
    }

    this._stats.calls++;
    const log = logger.child({ key: target.key });

    try {
      const content = await retry((attempt) => this.attempt(target, attempt), {
        maxAttempts: this.retryPolicy.maxAttempts,
        initialDelayMs: this.retryPolicy.initialDelayMs,
        maxDelayMs: this.retryPolicy.maxDelayMs,
        backoffFactor: this.retryPolicy.backoffFactor,
        sleep: (ms) => this.wait(ms),
        retryIf: (error) => error instanceof FetchError && error.anomalous,
        onRetry: (error, attempt, delayMs) => {
          log.warn({ attempt, delayMs, error: errorMessage(error) }, "Retrying fetch");
        },
      });
      this._stats.succeeded++;
      this.recordCleanCall(target.key);
      return content;
    } catch (error) {
      this._stats.failed++;
      if (error instanceof FetchError && error.anomalous) {
        this.recordAnomaly(target.key);
        log.warn({ kind: error.kind, state: this._state }, "Fetch exhausted its attempts");
      } else {
        this.recordCleanCall(target.key);
      }
      throw error;
    }
  }

  private async attempt(target: FetchTarget, attempt: number): Promise<PageContent> {
    await this.pace();
    this._stats.networkRequests++;

    const timeoutMs = this.retryPolicy.attemptTimeoutMs;
    let result: Result<PageContent, PageFetchFailure>;
    try {
      result = await timeout(
        this.fetcher.fetch(target, target.ready, { timeoutMs }),
        timeoutMs,
        `No response for ${target.url} within ${timeoutMs}ms`
      );
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw new FetchError(error.message, { kind: "timeout", url: target.url, attempts: attempt, key: target.key });
      }
      throw new FetchError(errorMessage(error), {
        kind: "network",
        url: target.url,
        attempts: attempt,
        key: target.key,
      });
    }

    if (!result.ok) {
      throw new FetchError(result.error.message, {
        kind: result.error.kind,
        url: target.url,
        attempts: attempt,
        status: result.error.status,
        key: target.key,
      });
    }
    return result.value;
  }

  /**
   * Waits out any pending Backoff pause plus the state's request gap,
   * measured from the start of the previous request.
   */
  private async pace(): Promise<void> {
    if (this.pendingPauseMs > 0) {
      const pause = this.pendingPauseMs;
      this.pendingPauseMs = 0;
      logger.info({ pauseMs: pause }, "Backoff pause");
      await this.wait(pause);
    }

    if (this.lastRequestAt !== null) {
      const gap = this.requestGap();
      const elapsed = this.now() - this.lastRequestAt;
      if (gap > elapsed) {
        await this.wait(gap - elapsed);
      }
    }
    this.lastRequestAt = this.now();
  }

  private requestGap(): number {
    if (this._state === "normal") {
      return this.uniform(this.pacing.normalDelay) + this.uniform(this.pacing.normalJitter);
    }
    return this.uniform(this.pacing.cautiousDelay);
  }

  private uniform(range: DelayRange): number {
    return range.minMs + this.random() * (range.maxMs - range.minMs);
  }

  private async wait(ms: number): Promise<void> {
    this._stats.waitedMs += ms;
    await this.sleep(ms);
  }

  private recordCleanCall(key: string): void {
    this.consecutiveAnomalies = 0;
    this.backoffExponent = 0;

    if (this._state === "cautious") {
      this.cautiousCleanCalls++;
      if (this.cautiousCleanCalls >= this.pacing.cautiousWindow) {
        this.transition("normal", key);
      }
    }
  }

  private recordAnomaly(key: string): void {
    this._stats.anomalies++;
    this.consecutiveAnomalies++;

    if (this.consecutiveAnomalies >= this.pacing.abortThreshold) {
      this.pendingPauseMs = 0;
      this.transition("aborted", key);
      logger.error(
        { consecutiveAnomalies: this.consecutiveAnomalies },
        "Fetch governor aborted; no further requests will be issued"
      );
      return;
    }

    switch (this._state) {
      case "normal":
        this.cautiousCleanCalls = 0;
        this.transition("cautious", key);
        break;
      case "cautious":
        this.backoffExponent = 0;
        this.transition("backoff", key);
        this.schedulePause();
        break;
      case "backoff":
        this.schedulePause();
        break;
      case "aborted":
        break;
    }
  }

  private schedulePause(): void {
    this.pendingPauseMs = this.pacing.backoffPauseMs * 2 ** this.backoffExponent;
    this.backoffExponent++;
  }

  private transition(to: GovernorState, key: string): void {
    const from = this._state;
    if (from === to) return;
    this._state = to;
    const transition: GovernorTransition = { from, to, key, at: this.now() };
    this.transitions.push(transition);
    logger.info({ from, to, key }, "Governor state changed");
    this.onStateChange?.(transition);
  }
}
