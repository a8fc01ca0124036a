/**
 * HTTP Page Fetcher
 *
 * Loads pages with the global fetch API and checks the ready condition
 * against the returned markup with cheerio.
 *
 * @module
 */

import * as cheerio from "cheerio";
import { err, ok, type Result } from "../../types/result.js";
import { createLogger } from "../../utils/logger.js";
import type {
  IPageFetcher,
  FetchTarget,
  ReadyCondition,
  PageContent,
  PageFetchFailure,
  PageFetchOptions,
} from "./interfaces/IPageFetcher.js";

const logger = createLogger("page-fetcher");

/** Markers of interstitial bot-check pages */
const CHALLENGE_MARKERS = [
  "just a moment",
  "checking your browser",
  "cf-challenge",
  "challenge-form",
  "captcha",
  "attention required",
];

export interface HttpPageFetcherOptions {
  userAgent: string;
  /** Replaceable for tests */
  fetchImpl?: typeof fetch;
}

export class HttpPageFetcher implements IPageFetcher {
  private userAgent: string;
  private fetchImpl: typeof fetch;

  constructor(options: HttpPageFetcherOptions) {
    this.userAgent = options.userAgent;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetch(
    target: FetchTarget,
    ready: ReadyCondition,
    options: PageFetchOptions
  ): Promise<Result<PageContent, PageFetchFailure>> {
    let response: Response;
    let html: string;

    try {
      response = await this.fetchImpl(target.url, {
        headers: {
          "User-Agent": this.userAgent,
          Accept: "text/html,application/xhtml+xml",
        },
        redirect: "follow",
        signal: AbortSignal.timeout(options.timeoutMs),
      });
      html = await response.text();
    } catch (error) {
      if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
        return err({ kind: "timeout", message: `No response within ${options.timeoutMs}ms` });
      }
      const message = error instanceof Error ? error.message : String(error);
      logger.debug({ url: target.url, error: message }, "Network failure");
      return err({ kind: "network", message });
    }

    if (response.status === 404 || response.status === 410) {
      return err({ kind: "not-found", message: `HTTP ${response.status}`, status: response.status });
    }

    if (!response.ok) {
      return err({ kind: "http-status", message: `HTTP ${response.status}`, status: response.status });
    }

    if (html.trim().length === 0) {
      return err({ kind: "empty-content", message: "Empty response body", status: response.status });
    }

    const required = ready.minCount ?? 1;
    const found = cheerio.load(html)(ready.selector).length;

    if (found < required) {
      if (looksLikeChallenge(html)) {
        return err({ kind: "challenge", message: "Bot challenge page", status: response.status });
      }
      return err({
        kind: "empty-content",
        message: `Ready condition not met: ${ready.selector} matched ${found}, expected >= ${required}`,
        status: response.status,
      });
    }

    return ok({
      url: target.url,
      finalUrl: response.url || target.url,
      status: response.status,
      html,
    });
  }
}

export function looksLikeChallenge(html: string): boolean {
  const lower = html.toLowerCase();
  return CHALLENGE_MARKERS.some((marker) => lower.includes(marker));
}
