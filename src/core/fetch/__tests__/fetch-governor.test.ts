/**
 * Tests for the Fetch Governor
 */

import { describe, it, expect, beforeEach } from "vitest";
import { FetchGovernor, type FetchGovernorOptions } from "../fetch-governor.js";
import { FetchError, GovernorAbortedError } from "../../errors.js";
import { ok, type Result } from "../../../types/result.js";
import type { FetchTarget, IPageFetcher, PageContent, PageFetchFailure } from "../interfaces/IPageFetcher.js";
import { FakePageFetcher, createFakeClock } from "./fake-page-fetcher.js";

function target(url: string): FetchTarget {
  return { key: url.replace("https://example.test/", ""), url, pageType: "faq", ready: { selector: "li" } };
}

const BLOCKED: PageFetchFailure = { kind: "http-status", message: "HTTP 429", status: 429 };

describe("FetchGovernor", () => {
  let fetcher: FakePageFetcher;
  let clock: ReturnType<typeof createFakeClock>;

  function createGovernor(overrides: Partial<FetchGovernorOptions> = {}): FetchGovernor {
    return new FetchGovernor({
      fetcher,
      now: clock.now,
      sleep: clock.sleep,
      random: () => 0,
      ...overrides,
    });
  }

  beforeEach(() => {
    fetcher = new FakePageFetcher();
    clock = createFakeClock();
  });

  describe("pacing", () => {
    it("should not wait before the first request and pace later ones", async () => {
      fetcher.route("https://example.test/a", { html: "<li>a</li>" });
      fetcher.route("https://example.test/b", { html: "<li>b</li>" });
      const governor = createGovernor();

      const page = await governor.fetch(target("https://example.test/a"));
      expect(page.html).toBe("<li>a</li>");
      expect(clock.sleeps).toEqual([]);

      await governor.fetch(target("https://example.test/b"));
      expect(clock.sleeps).toEqual([2000]);
    });

    it("should add jitter to the normal delay", async () => {
      fetcher.route("https://example.test/a", { html: "<li>a</li>" });
      const governor = createGovernor({ random: () => 0.5 });

      await governor.fetch(target("https://example.test/a"));
      await governor.fetch(target("https://example.test/a"));

      // 2000 + 0.5 * 4000 base, 0 + 0.5 * 4000 jitter
      expect(clock.sleeps).toEqual([6000]);
    });

    it("should use the cautious delay after an anomaly", async () => {
      fetcher.route("https://example.test/bad", BLOCKED);
      fetcher.route("https://example.test/good", { html: "<li>ok</li>" });
      const governor = createGovernor({ retry: { maxAttempts: 1 } });

      await expect(governor.fetch(target("https://example.test/bad"))).rejects.toThrow(FetchError);
      expect(governor.state).toBe("cautious");

      await governor.fetch(target("https://example.test/good"));
      expect(clock.sleeps).toEqual([10000]);
    });
  });

  describe("retries", () => {
    it("should retry anomalous failures with exponential delay", async () => {
      fetcher.route("https://example.test/flaky", (attempt) =>
        attempt < 3 ? { kind: "timeout", message: "timed out" } : { html: "<li>late</li>" }
      );
      const governor = createGovernor();

      const page = await governor.fetch(target("https://example.test/flaky"));

      expect(page.html).toBe("<li>late</li>");
      expect(clock.sleeps).toEqual([2000, 4000]);
      expect(fetcher.callsFor("https://example.test/flaky")).toBe(3);
      expect(governor.state).toBe("normal");
      expect(governor.snapshot().stats.networkRequests).toBe(3);
    });

    it("should count one anomaly when all attempts fail", async () => {
      fetcher.route("https://example.test/blocked", BLOCKED);
      const governor = createGovernor();

      const error = await governor.fetch(target("https://example.test/blocked")).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FetchError);
      if (error instanceof FetchError) {
        expect(error.kind).toBe("http-status");
        expect(error.status).toBe(429);
        expect(error.attempts).toBe(3);
      }
      expect(fetcher.callsFor("https://example.test/blocked")).toBe(3);
      expect(governor.snapshot().stats.anomalies).toBe(1);
      expect(governor.state).toBe("cautious");
    });

    it("should not retry a missing page or treat it as an anomaly", async () => {
      const governor = createGovernor();

      const error = await governor.fetch(target("https://example.test/missing")).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FetchError);
      if (error instanceof FetchError) {
        expect(error.kind).toBe("not-found");
      }
      expect(fetcher.calls).toHaveLength(1);
      expect(governor.state).toBe("normal");
      expect(governor.snapshot().stats.anomalies).toBe(0);
    });

    it("should time out an attempt that never settles", async () => {
      const hanging: IPageFetcher = {
        fetch: () => new Promise<Result<PageContent, PageFetchFailure>>(() => undefined),
      };
      const governor = createGovernor({ fetcher: hanging, retry: { maxAttempts: 1, attemptTimeoutMs: 20 } });

      const error = await governor.fetch(target("https://example.test/slow")).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FetchError);
      if (error instanceof FetchError) {
        expect(error.kind).toBe("timeout");
      }
      expect(governor.state).toBe("cautious");
    });
  });

  describe("state machine", () => {
    it("should escalate to backoff with doubling pauses and abort after five anomalies", async () => {
      fetcher.route("https://example.test/blocked", BLOCKED);
      const governor = createGovernor({ retry: { maxAttempts: 1 } });
      const blocked = target("https://example.test/blocked");

      for (let i = 0; i < 5; i++) {
        await expect(governor.fetch(blocked)).rejects.toThrow(FetchError);
      }

      expect(governor.state).toBe("aborted");
      expect(clock.sleeps).toEqual([10000, 180_000, 360_000, 720_000]);
      expect(governor.snapshot().transitions.map((t) => `${t.from}->${t.to}`)).toEqual([
        "normal->cautious",
        "cautious->backoff",
        "backoff->aborted",
      ]);
    });

    it("should fail immediately without I/O once aborted", async () => {
      fetcher.route("https://example.test/blocked", BLOCKED);
      fetcher.route("https://example.test/fine", { html: "<li>fine</li>" });
      const governor = createGovernor({ retry: { maxAttempts: 1 } });

      for (let i = 0; i < 5; i++) {
        await expect(governor.fetch(target("https://example.test/blocked"))).rejects.toThrow(FetchError);
      }
      const callsBefore = fetcher.calls.length;
      const sleepsBefore = clock.sleeps.length;

      await expect(governor.fetch(target("https://example.test/fine"))).rejects.toThrow(GovernorAbortedError);
      await expect(governor.fetch(target("https://example.test/fine"))).rejects.toThrow(GovernorAbortedError);

      expect(fetcher.calls).toHaveLength(callsBefore);
      expect(clock.sleeps).toHaveLength(sleepsBefore);
      expect(governor.snapshot().stats.rejected).toBe(2);
    });

    it("should return to normal after ten clean calls in cautious", async () => {
      fetcher.route("https://example.test/blocked", BLOCKED);
      fetcher.route("https://example.test/fine", { html: "<li>fine</li>" });
      const governor = createGovernor({ retry: { maxAttempts: 1 } });

      await expect(governor.fetch(target("https://example.test/blocked"))).rejects.toThrow(FetchError);
      for (let i = 0; i < 9; i++) {
        await governor.fetch(target("https://example.test/fine"));
      }
      expect(governor.state).toBe("cautious");

      await governor.fetch(target("https://example.test/fine"));
      expect(governor.state).toBe("normal");
    });

    it("should reset the consecutive count on success", async () => {
      fetcher.route("https://example.test/blocked", BLOCKED);
      fetcher.route("https://example.test/fine", { html: "<li>fine</li>" });
      const governor = createGovernor({ retry: { maxAttempts: 1 } });

      await expect(governor.fetch(target("https://example.test/blocked"))).rejects.toThrow(FetchError);
      await governor.fetch(target("https://example.test/fine"));
      await expect(governor.fetch(target("https://example.test/blocked"))).rejects.toThrow(FetchError);

      expect(governor.state).toBe("backoff");
      expect(governor.snapshot().consecutiveAnomalies).toBe(1);
    });

    it("should never recover from backoff", async () => {
      fetcher.route("https://example.test/blocked", BLOCKED);
      fetcher.route("https://example.test/fine", { html: "<li>fine</li>" });
      const governor = createGovernor({ retry: { maxAttempts: 1 } });

      await expect(governor.fetch(target("https://example.test/blocked"))).rejects.toThrow(FetchError);
      await expect(governor.fetch(target("https://example.test/blocked"))).rejects.toThrow(FetchError);
      for (let i = 0; i < 20; i++) {
        await governor.fetch(target("https://example.test/fine"));
      }

      expect(governor.state).toBe("backoff");
    });

    it("should report transitions to the callback", async () => {
      fetcher.route("https://example.test/blocked", BLOCKED);
      const seen: string[] = [];
      const governor = createGovernor({
        retry: { maxAttempts: 1 },
        onStateChange: (t) => seen.push(`${t.to}:${t.key}`),
      });

      await expect(governor.fetch(target("https://example.test/blocked"))).rejects.toThrow(FetchError);

      expect(seen).toEqual(["cautious:blocked"]);
    });
  });

  describe("sequencing", () => {
    it("should never issue overlapping requests", async () => {
      let inFlight = 0;
      let maxInFlight = 0;
      const slow: IPageFetcher = {
        fetch: async (t) => {
          inFlight++;
          maxInFlight = Math.max(maxInFlight, inFlight);
          await new Promise((resolve) => setTimeout(resolve, 2));
          inFlight--;
          return ok({ url: t.url, finalUrl: t.url, status: 200, html: "<li>x</li>" });
        },
      };
      const governor = createGovernor({ fetcher: slow });

      await Promise.all(
        ["a", "b", "c", "d"].map((name) => governor.fetch(target(`https://example.test/${name}`)))
      );

      expect(maxInFlight).toBe(1);
      expect(governor.snapshot().stats.succeeded).toBe(4);
    });
  });
});
