#!/usr/bin/env node

/**
 * directory-graph CLI
 * Crawls the public service directory and writes the entity graph
 */

import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import { crawlCommand } from "./commands/crawl.js";
import { statusCommand } from "./commands/status.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("cli");

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

// Create the main program
const program = new Command();

program
  .name("directory-graph")
  .description("Polite crawler that builds the ministry → department → agency → service graph")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Commands
// =============================================================================

program
  .command("crawl")
  .description("Run every phase and write the entity graph")
  .option("-c, --config <path>", "Path to the JSON config file")
  .option("-d, --data-dir <path>", "Directory for raw pages, checkpoints and the failure log")
  .option("-o, --out <path>", "Directory for the serialized graph and reports")
  .option("--offline", "Never fetch; rebuild the graph from cached pages")
  .option("--retry-failed", "Fetch only pages recorded in the failure log")
  .option("--concurrency <n>", "Parse & resolve worker pool size", parseInteger)
  .option("--tolerance <n>", "Tolerated difference between reported and observed counts", parseInteger)
  .action(crawlCommand);

program
  .command("status")
  .description("Show checkpoints, cached pages and the failure log")
  .option("-c, --config <path>", "Path to the JSON config file")
  .option("-d, --data-dir <path>", "Directory for raw pages, checkpoints and the failure log")
  .option("-v, --verbose", "List every failure and cached page")
  .action(statusCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

function handleError(error: unknown): void {
  if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\nError: ${error.message}`));
    if (process.env.DEBUG || process.env.NODE_ENV === "development") {
      console.error(chalk.dim(error.stack));
    }
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

// =============================================================================
// Signal Handlers
// =============================================================================

let isShuttingDown = false;

function shutdown(signal: string): void {
  if (isShuttingDown) {
    logger.warn("Forced shutdown");
    process.exit(1);
  }

  isShuttingDown = true;
  logger.info({ signal }, "Received shutdown signal");
  console.log(chalk.dim(`\nReceived ${signal}, stopping. Cached pages are kept for the next run.`));
  process.exit(130);
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
