/**
 * crawl command - Run every phase and write the entity graph
 */

import chalk from "chalk";
import ora, { type Ora } from "ora";
import * as path from "node:path";
import { FetchGovernor, HttpPageFetcher } from "../../core/fetch/index.js";
import { FileArtifactStore } from "../../core/store/index.js";
import {
  PhaseCoordinator,
  type FetchPolicy,
  type PipelineProgressEvent,
  type PipelineResult,
  type RunStatus,
} from "../../core/pipeline/index.js";
import { FileOutputWriter } from "../../core/output/index.js";
import { loadConfig } from "../../utils/config.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("crawl");

export interface CrawlOptions {
  config?: string;
  dataDir?: string;
  out?: string;
  offline?: boolean;
  retryFailed?: boolean;
  concurrency?: number;
  tolerance?: number;
}

export const EXIT_CODES: Record<RunStatus, number> = {
  success: 0,
  failed: 1,
  "partial-failure": 2,
  aborted: 3,
};

export function resolvePolicy(options: Pick<CrawlOptions, "offline" | "retryFailed">): FetchPolicy {
  if (options.offline) return "cache-only";
  if (options.retryFailed) return "failed-only";
  return "network";
}

export async function crawlCommand(options: CrawlOptions): Promise<void> {
  const config = loadConfig({
    configPath: options.config,
    overrides: {
      dataDir: options.dataDir,
      outputDir: options.out,
      concurrency: options.concurrency,
      discrepancyTolerance: options.tolerance,
    },
  });
  const policy = resolvePolicy(options);
  const dataDir = path.resolve(config.dataDir);
  const outputDir = path.resolve(config.outputDir);

  logger.info({ dataDir, outputDir, policy, concurrency: config.concurrency }, "Starting crawl");

  console.log();
  console.log(chalk.cyan.bold("Crawling Service Directory"));
  console.log(chalk.dim("─".repeat(40)));
  console.log();

  const spinner = ora("Opening artifact store...").start();

  try {
    const store = new FileArtifactStore({ dataDir });
    await store.open();

    const governor = new FetchGovernor({
      fetcher: new HttpPageFetcher({ userAgent: config.userAgent }),
      pacing: config.pacing,
      retry: config.retry,
      onStateChange: (transition) => {
        spinner.stopAndPersist({
          symbol: chalk.yellow("!"),
          text: chalk.yellow(`Pacing ${transition.from} → ${transition.to} after ${transition.key}`),
        });
        spinner.start();
      },
    });

    const coordinator = new PhaseCoordinator({
      governor,
      store,
      seedUrls: config.seedUrls,
      concurrency: config.concurrency,
      tolerance: config.discrepancyTolerance,
      policy,
      onProgress: (event) => updateSpinner(spinner, event),
    });

    const result = await coordinator.run();
    const { status } = result.report;

    let written: string[] = [];
    if (result.validation.valid) {
      spinner.text = "Writing output...";
      written = await new FileOutputWriter({ outputDir }).write(result);
    }

    if (status === "success") {
      spinner.succeed(chalk.green("Crawl complete!"));
    } else if (status === "failed") {
      spinner.fail(chalk.red("Graph failed validation, nothing was written"));
    } else {
      spinner.warn(chalk.yellow(`Crawl finished with status ${status}`));
    }

    printSummary(result, written.length > 0 ? outputDir : null);
    logger.info({ status, files: written.length }, "Crawl finished");

    process.exitCode = EXIT_CODES[status];
  } catch (error) {
    spinner.fail(chalk.red("Crawl failed"));
    logger.error({ err: error }, "Crawl failed");
    throw error;
  }
}

function printSummary(result: PipelineResult, outputDir: string | null): void {
  const { report } = result;

  console.log();
  console.log(chalk.white.bold("Records"));
  console.log(`  Ministries:    ${report.counts.ministry}`);
  console.log(`  Departments:   ${report.counts.department}`);
  console.log(`  Agencies:      ${report.counts.agency}`);
  console.log(`  Services:      ${report.counts.service}`);
  console.log(`  FAQs:          ${report.counts.faq}`);

  console.log();
  console.log(chalk.white.bold("Pages"));
  console.log(`  Fetched:       ${report.fetch.fetched}`);
  console.log(`  From cache:    ${report.fetch.cacheHits}`);
  console.log(`  Skipped:       ${report.fetch.skipped}`);
  console.log(`  Failed:        ${report.fetch.failed}`);
  console.log(`  Governor:      ${report.governor.state}`);
  console.log(`  Duration:      ${(report.durationMs / 1000).toFixed(1)}s`);

  if (report.violations.length > 0) {
    console.log();
    console.log(chalk.red.bold(`Invariant violations (${report.violations.length})`));
    for (const violation of report.violations.slice(0, 5)) {
      console.log(`  ${chalk.red("✗")} ${violation.message}`);
    }
    if (report.violations.length > 5) {
      console.log(chalk.dim(`  ... and ${report.violations.length - 5} more`));
    }
  }

  if (report.discrepancies.length > 0) {
    console.log();
    console.log(chalk.yellow.bold(`Count discrepancies (${report.discrepancies.length})`));
    for (const d of report.discrepancies.slice(0, 5)) {
      console.log(`  ${d.name}: ${d.measure} reported ${d.reported}, observed ${d.observed}`);
    }
  }

  if (report.failures.length > 0) {
    console.log();
    console.log(chalk.yellow.bold(`Fetch failures (${report.failures.length})`));
    for (const failure of report.failures.slice(0, 5)) {
      console.log(`  ${chalk.red("✗")} ${failure.key}: ${failure.message}`);
    }
    console.log(chalk.dim("Run 'directory-graph crawl --retry-failed' to fetch them again"));
  }

  console.log();
  console.log(chalk.dim("─".repeat(40)));
  if (outputDir) {
    console.log(chalk.dim(`Output written to ${outputDir}`));
  }
}

function updateSpinner(spinner: Ora, event: PipelineProgressEvent): void {
  const progress = `${event.processed}/${event.total}`;
  const suffix = event.currentKey ? ` - ${event.currentKey}` : "";
  spinner.text = `[${event.phase}] ${event.message} (${progress}, ${event.percentage}%)${suffix}`;
}
