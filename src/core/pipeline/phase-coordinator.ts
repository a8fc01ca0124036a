/**
 * Phase Coordinator
 *
 * Runs the crawl as three ordered phases, each a barrier for the next:
 *
 *   FAQ → Agency directory → Ministries (list → ministry pages → services)
 *
 * Every page goes through the artifact store first; only misses reach the
 * fetch governor, so a populated store makes a run fully offline. Parsing
 * runs on the worker pool while the next fetches proceed. After the phases
 * the accumulated records are materialized and validated.
 *
 * @module
 */

import type { EntityGraph, MinistrySeed, PageType } from "../../types/index.js";
import { FetchError, GovernorAbortedError, wrapError, type DirectoryGraphError } from "../errors.js";
import type { FetchGovernor } from "../fetch/fetch-governor.js";
import type { FetchTarget } from "../fetch/interfaces/IPageFetcher.js";
import type { IArtifactStore } from "../store/interfaces/IArtifactStore.js";
import type { PhaseName } from "../store/models/store-state.js";
import type { ExtractorRegistry } from "../extractors/interfaces/IFieldExtractor.js";
import { createExtractorRegistry } from "../extractors/index.js";
import { AgencyDirectoryIndex } from "../resolve/agency-directory-index.js";
import {
  ParseResolveWorkerPool,
  type ParseTaskInput,
  type ParseTaskOutput,
} from "../workers/parse-resolve-worker.js";
import { GraphAccumulator } from "../assembly/graph-accumulator.js";
import { validateGraph } from "../assembly/graph-validator.js";
import type { GraphValidation } from "../assembly/models/findings.js";
import type { SeedUrls } from "../../utils/validation.js";
import { createChildLogger, createLogger } from "../../utils/logger.js";
import {
  AGENCY_DIRECTORY_KEY,
  FAQ_KEY,
  MINISTRY_LIST_KEY,
  agencyServicesKey,
  ministryPageKey,
} from "./artifact-keys.js";
import type {
  FetchPolicy,
  FetchStats,
  PhaseStats,
  PipelinePhase,
  PipelineProgressEvent,
  RunReport,
  RunStatus,
  RunWarning,
} from "./models/run-report.js";

const logger = createLogger("phase-coordinator");

/** Pages that traversal waits on are parsed ahead of queued service listings */
const PARSE_PRIORITY: Record<PageType, number> = {
  faq: 1,
  "agency-directory": 1,
  "ministry-list": 1,
  "ministry-page": 1,
  "agency-services": 0,
};

// =============================================================================
// Types
// =============================================================================

export interface PhaseCoordinatorOptions {
  governor: FetchGovernor;
  store: IArtifactStore;
  seedUrls: SeedUrls;
  extractors?: ExtractorRegistry;
  /** Parse & resolve pool size */
  concurrency?: number;
  /** Per-task timeout of the worker pool */
  taskTimeoutMs?: number;
  /** Discrepancy tolerance */
  tolerance?: number;
  policy?: FetchPolicy;
  onProgress?: (event: PipelineProgressEvent) => void;
  now?: () => Date;
}

export interface PipelineResult {
  graph: EntityGraph;
  validation: GraphValidation;
  report: RunReport;
}

/** State owned by one run */
interface RunState {
  directory: AgencyDirectoryIndex;
  pool: ParseResolveWorkerPool;
  accumulator: GraphAccumulator;
  fetch: FetchStats;
  phases: PhaseStats[];
  warnings: RunWarning[];
  unmatchedPlacements: number;
}

// =============================================================================
// PhaseCoordinator
// =============================================================================

export class PhaseCoordinator {
  private governor: FetchGovernor;
  private store: IArtifactStore;
  private seedUrls: SeedUrls;
  private extractors: ExtractorRegistry;
  private concurrency?: number;
  private taskTimeoutMs?: number;
  private tolerance: number;
  private policy: FetchPolicy;
  private onProgress?: (event: PipelineProgressEvent) => void;
  private now: () => Date;

  constructor(options: PhaseCoordinatorOptions) {
    this.governor = options.governor;
    this.store = options.store;
    this.seedUrls = options.seedUrls;
    this.extractors = options.extractors ?? createExtractorRegistry();
    this.concurrency = options.concurrency;
    this.taskTimeoutMs = options.taskTimeoutMs;
    this.tolerance = options.tolerance ?? 0;
    this.policy = options.policy ?? "network";
    this.onProgress = options.onProgress;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Runs all phases, then assembles and validates the graph.
   * The store must be open.
   */
  async run(): Promise<PipelineResult> {
    const startedAt = this.now();
    const directory = new AgencyDirectoryIndex();
    const state: RunState = {
      directory,
      pool: new ParseResolveWorkerPool(
        { extractors: this.extractors, directory },
        { size: this.concurrency, taskTimeoutMs: this.taskTimeoutMs }
      ),
      accumulator: new GraphAccumulator(),
      fetch: { requested: 0, fetched: 0, cacheHits: 0, skipped: 0, failed: 0, skippedKeys: [] },
      phases: [],
      warnings: [],
      unmatchedPlacements: 0,
    };

    logger.info({ policy: this.policy }, "Starting run");

    try {
      await this.runPhase(state, "faq", (phase) => this.faqPhase(state, phase));
      await this.runPhase(state, "agency-directory", (phase) => this.agencyDirectoryPhase(state, phase));
      await this.runPhase(state, "ministries", (phase) => this.ministriesPhase(state, phase));
      await state.pool.drain();
    } finally {
      await state.pool.shutdown();
    }

    return this.assemble(state, startedAt);
  }

  // ==========================================================================
  // Phases
  // ==========================================================================

  private async faqPhase(state: RunState, phase: PhaseStats): Promise<void> {
    const target = this.target(FAQ_KEY, this.seedUrls.faq, "faq");
    this.emitProgress("faq", 0, 1, "Loading FAQ page", target.key);

    const html = await this.obtain(state, phase, target);
    if (html !== null) {
      const output = await this.parse(state, phase, { pageType: "faq", key: target.key, url: target.url, html });
      if (output?.pageType === "faq") {
        for (const faq of output.faqs) state.accumulator.addFaq(faq);
      }
    }

    this.emitProgress("faq", 1, 1, "FAQ phase complete");
  }

  /**
   * Fills the agency directory index that the ministries phase joins against.
   */
  private async agencyDirectoryPhase(state: RunState, phase: PhaseStats): Promise<void> {
    const target = this.target(AGENCY_DIRECTORY_KEY, this.seedUrls.agencies, "agency-directory");
    this.emitProgress("agency-directory", 0, 1, "Loading agency directory", target.key);

    const html = await this.obtain(state, phase, target);
    if (html !== null) {
      const output = await this.parse(state, phase, {
        pageType: "agency-directory",
        key: target.key,
        url: target.url,
        html,
      });
      if (output?.pageType === "agency-directory" && output.duplicates > 0) {
        logger.debug({ duplicates: output.duplicates }, "Directory lists some agencies more than once");
      }
    }

    this.emitProgress("agency-directory", 1, 1, `Indexed ${state.directory.size} directory agencies`);
  }

  /**
   * Ministry pages are fetched one after another; each page's placements
   * then have their service listings fetched, and those listings are parsed
   * on the pool while traversal moves on.
   */
  private async ministriesPhase(state: RunState, phase: PhaseStats): Promise<void> {
    const listTarget = this.target(MINISTRY_LIST_KEY, this.seedUrls.ministries, "ministry-list");
    const listHtml = await this.obtain(state, phase, listTarget);
    if (listHtml === null) return;

    const listOutput = await this.parse(state, phase, {
      pageType: "ministry-list",
      key: listTarget.key,
      url: listTarget.url,
      html: listHtml,
    });
    if (listOutput?.pageType !== "ministry-list") return;

    const ministries = uniqueBy(listOutput.ministries, (m) => m.ministryId);
    for (const seed of ministries) state.accumulator.addMinistry(seed);

    const serviceParses: Promise<ParseTaskOutput | null>[] = [];
    let processed = 0;

    for (const ministry of ministries) {
      this.emitProgress("ministries", processed, ministries.length, `Traversing ${ministry.name}`);
      serviceParses.push(...(await this.traverseMinistry(state, phase, ministry)));
      processed++;
    }

    this.emitProgress("ministries", processed, ministries.length, "Waiting for service listings to parse");

    for (const output of await Promise.all(serviceParses)) {
      if (output?.pageType !== "agency-services") continue;
      for (const service of output.services) state.accumulator.addService(service);
    }
  }

  private async traverseMinistry(
    state: RunState,
    phase: PhaseStats,
    ministry: MinistrySeed
  ): Promise<Promise<ParseTaskOutput | null>[]> {
    const target = this.target(ministryPageKey(ministry.ministryId), ministry.url, "ministry-page");
    const html = await this.obtain(state, phase, target);
    if (html === null) return [];

    const output = await this.parse(state, phase, {
      pageType: "ministry-page",
      key: target.key,
      url: target.url,
      html,
      ministry,
    });
    if (output?.pageType !== "ministry-page") return [];

    state.accumulator.addMinistry(output.ministry);
    for (const department of output.departments) state.accumulator.addDepartment(department);
    for (const agency of output.agencies) state.accumulator.addAgency(agency);
    state.unmatchedPlacements += output.unmatchedAgencyIds.length;

    const parses: Promise<ParseTaskOutput | null>[] = [];
    for (const placement of uniqueBy(output.agencies, (a) => a.agencyId)) {
      const servicesTarget = this.target(
        agencyServicesKey(placement.ministryId, placement.departmentId, placement.agencyId),
        placement.url,
        "agency-services"
      );
      const servicesHtml = await this.obtain(state, phase, servicesTarget);
      if (servicesHtml === null) continue;

      parses.push(
        this.parse(state, phase, {
          pageType: "agency-services",
          key: servicesTarget.key,
          url: servicesTarget.url,
          html: servicesHtml,
          placement,
        })
      );
    }
    return parses;
  }

  // ==========================================================================
  // Fetch and parse
  // ==========================================================================

  private target(key: string, url: string, pageType: PageType): FetchTarget {
    return { key, url, pageType, ready: this.extractors[pageType].ready };
  }

  /**
   * Cached content, or fetched content when the policy allows a fetch.
   * Returns null when the page is unavailable for this run.
   */
  private async obtain(state: RunState, phase: PhaseStats, target: FetchTarget): Promise<string | null> {
    phase.keys++;
    state.fetch.requested++;

    const cached = await this.store.get(target.key);
    if (cached !== null) {
      phase.cacheHits++;
      state.fetch.cacheHits++;
      return cached;
    }

    if (!this.mayFetch(target.key)) {
      this.skip(state, phase, target.key);
      return null;
    }

    try {
      const page = await this.governor.fetch(target);
      await this.store.put(target.key, page.html);
      if (this.store.getFailure(target.key) !== null) {
        await this.store.clearFailure(target.key);
      }
      phase.fetched++;
      state.fetch.fetched++;
      return page.html;
    } catch (error) {
      if (error instanceof GovernorAbortedError) {
        this.skip(state, phase, target.key);
        return null;
      }
      if (error instanceof FetchError) {
        phase.failed++;
        state.fetch.failed++;
        await this.store.recordFailure({
          key: target.key,
          url: target.url,
          pageType: target.pageType,
          kind: error.kind,
          message: error.message,
          attempts: error.attempts,
          status: error.status,
          recordedAt: this.now().toISOString(),
        });
        logger.warn({ key: target.key, kind: error.kind }, "Page failed; continuing");
        return null;
      }
      throw error;
    }
  }

  private mayFetch(key: string): boolean {
    if (this.governor.aborted) return false;
    switch (this.policy) {
      case "network":
        return true;
      case "failed-only":
        return this.store.getFailure(key) !== null;
      case "cache-only":
        return false;
    }
  }

  private skip(state: RunState, phase: PhaseStats, key: string): void {
    phase.skipped++;
    state.fetch.skipped++;
    state.fetch.skippedKeys.push(key);
  }

  /**
   * Parses one artifact on the pool. Never rejects: a page that cannot be
   * parsed, or a pool or store failure along the way, becomes a
   * `parse-failed` warning and a null result.
   */
  private async parse(state: RunState, phase: PhaseStats, input: ParseTaskInput): Promise<ParseTaskOutput | null> {
    let failure: DirectoryGraphError;
    try {
      const result = await state.pool.submit({
        id: input.key,
        type: input.pageType,
        input,
        priority: PARSE_PRIORITY[input.pageType],
      });
      if (result.success) {
        phase.parsed++;
        await this.store.markProcessed(phase.phase, input.key);
        return result.output;
      }
      failure = result.error;
    } catch (error) {
      failure = wrapError(error, `Parsing ${input.key} failed`);
    }

    phase.parseFailures++;
    state.warnings.push({
      kind: "parse-failed",
      key: input.key,
      pageType: input.pageType,
      code: failure.code,
      message: failure.message,
    });
    logger.warn({ key: input.key, error: failure.message }, "Page could not be parsed; skipping");
    return null;
  }

  // ==========================================================================
  // Phases and assembly
  // ==========================================================================

  private async runPhase(
    state: RunState,
    name: PhaseName,
    body: (phase: PhaseStats) => Promise<void>
  ): Promise<void> {
    const phase: PhaseStats = {
      phase: name,
      keys: 0,
      fetched: 0,
      cacheHits: 0,
      skipped: 0,
      failed: 0,
      parsed: 0,
      parseFailures: 0,
      complete: false,
      durationMs: 0,
    };
    const start = this.now().getTime();
    const log = createChildLogger(logger, { phase: name });
    log.info("Phase started");

    await body(phase);

    phase.durationMs = this.now().getTime() - start;
    phase.complete = phase.keys > 0 && phase.skipped === 0 && phase.failed === 0 && phase.parseFailures === 0;
    if (phase.complete) {
      await this.store.markPhaseComplete(name);
    }
    state.phases.push(phase);
    log.info({ ...phase }, "Phase finished");
  }

  private assemble(state: RunState, startedAt: Date): PipelineResult {
    this.emitProgress("assembly", 0, 1, "Assembling graph");

    const graph = state.accumulator.materialize();
    const validation = validateGraph(graph, {
      tolerance: this.tolerance,
      collisions: state.accumulator.collisions(),
    });

    const warnings: RunWarning[] = [...state.warnings];
    for (const entry of state.directory.unmatched()) {
      warnings.push({
        kind: "unplaced-directory-agency",
        agencyNameHash: entry.agencyNameHash,
        name: entry.name,
        message: `${entry.name} is listed in the directory but was not found under any ministry`,
      });
    }
    warnings.push(...validation.warnings);

    const finishedAt = this.now();
    const report: RunReport = {
      status: this.decideStatus(state, validation),
      policy: this.policy,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      governor: this.governor.snapshot(),
      fetch: state.fetch,
      phases: state.phases,
      counts: validation.counts,
      unmatchedPlacements: state.unmatchedPlacements,
      violations: validation.violations,
      discrepancies: validation.discrepancies,
      warnings,
      failures: this.store.listFailures(),
    };

    this.emitProgress("assembly", 1, 1, `Run finished: ${report.status}`);
    logger.info(
      { status: report.status, counts: report.counts, violations: report.violations.length },
      "Run finished"
    );

    return { graph, validation, report };
  }

  private decideStatus(state: RunState, validation: GraphValidation): RunStatus {
    if (!validation.valid) return "failed";
    if (this.governor.aborted) return "aborted";
    const incomplete = state.phases.some((phase) => !phase.complete);
    return incomplete ? "partial-failure" : "success";
  }

  private emitProgress(
    phase: PipelinePhase,
    processed: number,
    total: number,
    message: string,
    currentKey?: string
  ): void {
    this.onProgress?.({
      phase,
      currentKey,
      processed,
      total,
      percentage: total === 0 ? 100 : Math.round((processed / total) * 100),
      message,
    });
  }
}

function uniqueBy<T>(items: readonly T[], key: (item: T) => string): T[] {
  const seen = new Set<string>();
  return items.filter((item) => {
    const k = key(item);
    if (seen.has(k)) return false;
    seen.add(k);
    return true;
  });
}
