/**
 * Page Fetcher Interface
 *
 * Boundary to whatever loads a page and returns its markup. The fetch
 * governor is the only caller; implementations never pace or retry.
 *
 * @module
 */

import type { Result } from "../../../types/result.js";
import type { PageType } from "../../../types/index.js";
import type { FetchFailureKind } from "../../errors.js";

/**
 * Structural condition the loaded page must satisfy before its content is
 * accepted, e.g. "the FAQ list holds at least one item".
 */
export interface ReadyCondition {
  /** CSS selector evaluated against the page */
  selector: string;
  /** Minimum number of matches (default 1) */
  minCount?: number;
}

/**
 * A navigation target: where to go, where the artifact is stored and how
 * to tell that the page is ready.
 */
export interface FetchTarget {
  /** Artifact store key */
  key: string;
  url: string;
  pageType: PageType;
  ready: ReadyCondition;
}

export interface PageContent {
  url: string;
  /** URL after redirects */
  finalUrl: string;
  status: number;
  html: string;
}

/**
 * Distinguishable failure signal. Every kind except `not-found` is an
 * anomaly for the governor.
 */
export interface PageFetchFailure {
  kind: FetchFailureKind;
  message: string;
  status?: number;
}

export interface PageFetchOptions {
  /** Per-attempt timeout */
  timeoutMs: number;
}

export interface IPageFetcher {
  fetch(
    target: FetchTarget,
    ready: ReadyCondition,
    options: PageFetchOptions
  ): Promise<Result<PageContent, PageFetchFailure>>;
}
