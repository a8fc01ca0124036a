/**
 * Tests for the parse & resolve task executor
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createParseResolveExecutor, ParseResolveWorkerPool, type ParseTaskInput } from "../parse-resolve-worker.js";
import type { WorkerTask } from "../interfaces/IWorkerPool.js";
import { createExtractorRegistry } from "../../extractors/index.js";
import { AgencyDirectoryIndex } from "../../resolve/agency-directory-index.js";
import { ErrorCode, ExtractionError } from "../../errors.js";
import { agencyNameHash, ministryId } from "../../identity/id-generator.js";

const BASE = "https://portal.example.test";

describe("createParseResolveExecutor", () => {
  let directory: AgencyDirectoryIndex;

  beforeEach(() => {
    directory = new AgencyDirectoryIndex();
  });

  it("should register directory cards and count duplicates", async () => {
    const execute = createParseResolveExecutor({ extractors: createExtractorRegistry(), directory });
    const html = `
      <div class="grid">
        <a href="/a"><h4>Lands Office</h4></a>
        <a href="/b"><h4>LANDS office</h4></a>
        <a href="/c"><h4>Tax Office</h4></a>
      </div>`;

    const output = await execute(
      { pageType: "agency-directory", key: "agency-directory", url: `${BASE}/en/agencies`, html },
      "worker-1"
    );

    expect(output).toEqual({ pageType: "agency-directory", key: "agency-directory", registered: 2, duplicates: 1 });
    expect((await directory.lookup(agencyNameHash("Lands Office")))?.agencyUrl).toBe(`${BASE}/a`);
  });

  it("should resolve ministries from the national list", async () => {
    const execute = createParseResolveExecutor({ extractors: createExtractorRegistry(), directory });

    const output = await execute(
      {
        pageType: "ministry-list",
        key: "ministries",
        url: `${BASE}/en/home/national-ministries`,
        html: '<a href="/en/ministries/health">Ministry of Health</a>',
      },
      "worker-1"
    );

    expect(output.pageType).toBe("ministry-list");
    if (output.pageType === "ministry-list") {
      expect(output.ministries.map((m) => m.ministryId)).toEqual([ministryId("Ministry of Health")]);
    }
  });

  it("should tag extraction failures with the artifact key", async () => {
    const execute = createParseResolveExecutor({ extractors: createExtractorRegistry(), directory });

    const error = await execute(
      { pageType: "faq", key: "faq", url: `${BASE}/en/help`, html: "<p>maintenance</p>" },
      "worker-1"
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExtractionError);
    if (error instanceof ExtractionError) {
      expect(error.key).toBe("faq");
      expect(error.pageType).toBe("faq");
      expect(error.code).toBe(ErrorCode.EXTRACTION_NO_ITEMS);
    }
  });

  it("should report failures as pool results", async () => {
    const pool = new ParseResolveWorkerPool(
      { extractors: createExtractorRegistry(), directory },
      { size: 2 }
    );

    const tasks: WorkerTask<ParseTaskInput>[] = [
      {
        id: "faq-good",
        type: "faq",
        input: {
          pageType: "faq",
          key: "faq",
          url: BASE,
          html: '<li id="faq_1"><button>Q?</button><div>A.</div></li>',
        },
      },
      { id: "faq-bad", type: "faq", input: { pageType: "faq", key: "faq", url: BASE, html: "" } },
    ];
    const [good, bad] = await Promise.all(tasks.map((task) => pool.submit(task)));
    await pool.shutdown();

    expect(good?.success).toBe(true);
    expect(bad?.success).toBe(false);
    if (bad && !bad.success) {
      expect(bad.error).toBeInstanceOf(ExtractionError);
    }
  });
});
