/**
 * File Output Writer
 *
 * Writes every entity collection as `<name>.csv` and `<name>.json` (same
 * rows, same column order), plus `report.json` and `report.md`. Nothing is
 * written for a graph that violates an invariant.
 *
 * @module
 */

import * as path from "node:path";
import { assertGraphValid } from "../assembly/graph-validator.js";
import type { PipelineResult } from "../pipeline/phase-coordinator.js";
import { writeFileAtomic } from "../../utils/fs.js";
import { createLogger } from "../../utils/logger.js";
import { toTables } from "./columns.js";
import { toCsv } from "./csv.js";
import { renderInsightsReport, type InsightsOptions } from "./insights.js";
import type { IOutputWriter } from "./interfaces/IOutputWriter.js";

const logger = createLogger("output-writer");

export interface FileOutputWriterOptions {
  outputDir: string;
  insights?: InsightsOptions;
}

export function toJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

export class FileOutputWriter implements IOutputWriter {
  private outputDir: string;
  private insights: InsightsOptions;

  constructor(options: FileOutputWriterOptions) {
    this.outputDir = options.outputDir;
    this.insights = options.insights ?? {};
  }

  async write(result: PipelineResult): Promise<string[]> {
    assertGraphValid(result.validation);

    const files = new Map<string, string>();
    for (const table of toTables(result.graph)) {
      files.set(`${table.name}.csv`, toCsv(table.columns, table.rows));
      files.set(`${table.name}.json`, toJson(table.rows));
    }
    files.set("report.json", toJson(result.report));
    files.set("report.md", renderInsightsReport(result.graph, result.report, this.insights));

    const written: string[] = [];
    for (const [name, content] of files) {
      const filePath = path.join(this.outputDir, name);
      await writeFileAtomic(filePath, content);
      written.push(filePath);
    }

    logger.info({ outputDir: this.outputDir, files: written.length }, "Output written");
    return written.sort();
  }
}
