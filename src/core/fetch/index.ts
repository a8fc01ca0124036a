/**
 * Fetch Module
 *
 * Page loading behind a pacing and anomaly-escalation governor.
 *
 * @module
 */

export type {
  IPageFetcher,
  FetchTarget,
  ReadyCondition,
  PageContent,
  PageFetchFailure,
  PageFetchOptions,
} from "./interfaces/IPageFetcher.js";

export { HttpPageFetcher, looksLikeChallenge, type HttpPageFetcherOptions } from "./http-page-fetcher.js";

export {
  FetchGovernor,
  type FetchGovernorOptions,
  type GovernorState,
  type GovernorStats,
  type GovernorSnapshot,
  type GovernorTransition,
} from "./fetch-governor.js";
