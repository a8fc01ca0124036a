/**
 * status command - Show checkpoints, cached artifacts and the failure log
 */

import chalk from "chalk";
import * as path from "node:path";
import { FileArtifactStore, PHASES } from "../../core/store/index.js";
import { loadConfig } from "../../utils/config.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("status");

export interface StatusOptions {
  config?: string;
  dataDir?: string;
  verbose?: boolean;
}

export async function statusCommand(options: StatusOptions): Promise<void> {
  const config = loadConfig({ configPath: options.config, overrides: { dataDir: options.dataDir } });
  const dataDir = path.resolve(config.dataDir);
  logger.info({ dataDir }, "Checking status");

  const store = new FileArtifactStore({ dataDir });
  await store.open();

  const checkpoints = store.checkpoints();
  const keys = await store.keys();
  const failures = store.listFailures();

  console.log();
  console.log(chalk.cyan.bold("Directory Graph Status"));
  console.log(chalk.dim("─".repeat(40)));
  console.log();

  console.log(chalk.white.bold("Data"));
  console.log(`  Directory:     ${dataDir}`);
  console.log(`  Cached pages:  ${keys.length}`);
  console.log(`  Last update:   ${checkpoints.updatedAt ?? chalk.dim("never")}`);
  console.log();

  console.log(chalk.white.bold("Phases"));
  for (const phase of PHASES) {
    const done = checkpoints.completedPhases.includes(phase);
    const processed = checkpoints.processed[phase]?.length ?? 0;
    const mark = done ? chalk.green("✓") : chalk.dim("○");
    console.log(`  ${mark} ${phase.padEnd(18)} ${processed} processed`);
  }
  console.log();

  if (failures.length === 0) {
    console.log(chalk.green("No failed pages."));
  } else {
    console.log(chalk.yellow.bold(`Failed pages (${failures.length})`));
    const shown = options.verbose ? failures : failures.slice(0, 10);
    for (const failure of shown) {
      const status = failure.status === undefined ? "" : ` ${failure.status}`;
      console.log(`  ${chalk.red("✗")} ${failure.key} ${chalk.dim(`[${failure.kind}${status}]`)} ${failure.message}`);
    }
    if (shown.length < failures.length) {
      console.log(chalk.dim(`  ... and ${failures.length - shown.length} more (use --verbose)`));
    }
  }

  if (options.verbose) {
    console.log();
    console.log(chalk.white.bold("Cached pages"));
    for (const key of keys) {
      console.log(`  ${key}`);
    }
  }
  console.log();
}
