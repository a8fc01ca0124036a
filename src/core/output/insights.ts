/**
 * Insights Report
 *
 * Markdown summary of a run: overview per collection, invariant
 * violations, missing optional fields, count discrepancies, warnings and
 * fetch failures.
 *
 * @module
 */

import type { EntityGraph } from "../../types/index.js";
import type { RunReport, RunWarning } from "../pipeline/models/run-report.js";
import { toTables, type Table } from "./columns.js";

export interface InsightsOptions {
  title?: string;
  /** Cap on identifiers listed per missing column */
  maxIdsPerIssue?: number;
}

/** Reserved columns that are always empty in this version */
const IGNORED_COLUMNS: Record<string, readonly string[]> = {
  services: ["description", "requirements"],
};

export function renderInsightsReport(graph: EntityGraph, report: RunReport, options: InsightsOptions = {}): string {
  const title = options.title ?? "Directory Graph Insights";
  const maxIds = options.maxIdsPerIssue ?? 100;
  const tables = toTables(graph);

  const sections = [
    `# ${title}\n`,
    renderRunSection(report),
    renderOverviewSection(tables),
    renderViolationsSection(report),
    renderMissingDataSection(tables, maxIds),
    renderDiscrepancySection(report),
    renderWarningsSection(report.warnings),
    renderFailuresSection(report),
  ];

  return `${sections.map((section) => section.replace(/^\n+|\n+$/g, "")).join("\n\n")}\n`;
}

function renderRunSection(report: RunReport): string {
  const { fetch, governor } = report;
  const lines: string[] = [];
  lines.push("## Run");
  lines.push("");
  lines.push(`- **Status:** ${report.status}`);
  lines.push(`- **Fetch policy:** ${report.policy}`);
  lines.push(`- **Governor state:** ${governor.state}`);
  lines.push(
    `- **Pages:** ${fetch.requested} needed, ${fetch.fetched} fetched, ${fetch.cacheHits} cached, ` +
      `${fetch.skipped} skipped, ${fetch.failed} failed`
  );
  lines.push(`- **Network requests:** ${governor.stats.networkRequests}`);
  lines.push(`- **Placements without directory metadata:** ${report.unmatchedPlacements}`);
  return lines.join("\n");
}

function idColumn(table: Table): string | undefined {
  return table.columns[0];
}

function renderOverviewSection(tables: Table[]): string {
  const lines: string[] = [];
  lines.push("## Overview");
  lines.push("");
  lines.push("| Collection | Rows | Unique IDs | Missing cells |");
  lines.push("|---|---:|---:|---:|");

  for (const table of tables) {
    const idCol = idColumn(table);
    const ids = new Set(table.rows.map((row) => (idCol === undefined ? null : row[idCol])));
    const columns = checkedColumns(table);
    const missing = table.rows.reduce(
      (sum, row) => sum + columns.filter((column) => row[column] === null).length,
      0
    );
    const cells = table.rows.length * columns.length;
    lines.push(`| ${table.name} | ${table.rows.length} | ${ids.size} | ${missing} / ${cells} (${percent(missing, cells)}) |`);
  }
  return lines.join("\n");
}

function renderViolationsSection(report: RunReport): string {
  const lines: string[] = [];
  lines.push("## Invariant Violations");
  lines.push("");

  if (report.violations.length === 0) {
    lines.push("- None. Identifiers are unique and every reference resolves.");
    return lines.join("\n");
  }

  lines.push("| Kind | Entity | ID | Detail |");
  lines.push("|---|---|---|---|");
  for (const violation of report.violations) {
    lines.push(`| ${violation.kind} | ${violation.entityType} | \`${violation.id}\` | ${escapeCell(violation.message)} |`);
  }
  return lines.join("\n");
}

function renderMissingDataSection(tables: Table[], maxIds: number): string {
  const lines: string[] = [];
  lines.push("## Missing Data");

  for (const table of tables) {
    const idCol = idColumn(table);
    const columns = checkedColumns(table);
    const missingByColumn = columns
      .map((column) => ({
        column,
        ids: table.rows.filter((row) => row[column] === null).map((row) => String(idCol ? row[idCol] : "")),
      }))
      .filter((entry) => entry.ids.length > 0);

    lines.push("");
    lines.push(`### ${table.name}`);

    if (missingByColumn.length === 0) {
      lines.push("");
      lines.push("- No missing values.");
      continue;
    }

    for (const { column, ids } of missingByColumn) {
      lines.push("");
      lines.push(`#### \`${column}\``);
      lines.push("");
      lines.push(`- Missing rows: ${ids.length} (${percent(ids.length, table.rows.length)})`);
      for (const id of ids.slice(0, maxIds)) {
        lines.push(`- \`${id}\``);
      }
      if (ids.length > maxIds) {
        lines.push("");
        lines.push(`_Only showing first ${maxIds} IDs._`);
      }
    }
  }
  return lines.join("\n");
}

function renderDiscrepancySection(report: RunReport): string {
  const lines: string[] = [];
  lines.push("## Count Discrepancies");
  lines.push("");

  if (report.discrepancies.length === 0) {
    lines.push("- Reported counts match observed counts.");
    return lines.join("\n");
  }

  lines.push("| Ministry | Measure | Reported | Observed | Delta |");
  lines.push("|---|---|---:|---:|---:|");
  for (const d of report.discrepancies) {
    lines.push(`| ${escapeCell(d.name)} | ${d.measure} | ${d.reported} | ${d.observed} | ${d.delta} |`);
  }
  return lines.join("\n");
}

function renderWarningsSection(warnings: RunWarning[]): string {
  const lines: string[] = [];
  lines.push("## Warnings");
  lines.push("");

  if (warnings.length === 0) {
    lines.push("- None.");
    return lines.join("\n");
  }

  for (const warning of warnings) {
    switch (warning.kind) {
      case "parse-failed":
        lines.push(`- Parse failed for \`${warning.key}\` (${warning.pageType}): ${warning.message}`);
        break;
      case "unplaced-directory-agency":
      case "count-not-reported":
        lines.push(`- ${warning.message}`);
        break;
    }
  }
  return lines.join("\n");
}

function renderFailuresSection(report: RunReport): string {
  const lines: string[] = [];
  lines.push("## Fetch Failures");
  lines.push("");

  if (report.failures.length === 0) {
    lines.push("- None.");
    return lines.join("\n");
  }

  lines.push("| Key | Kind | Attempts | Message |");
  lines.push("|---|---|---:|---|");
  for (const failure of report.failures) {
    lines.push(`| \`${failure.key}\` | ${failure.kind} | ${failure.attempts} | ${escapeCell(failure.message)} |`);
  }
  return lines.join("\n");
}

// =============================================================================
// Helpers
// =============================================================================

function checkedColumns(table: Table): string[] {
  const ignored = IGNORED_COLUMNS[table.name] ?? [];
  return table.columns.filter((column) => !ignored.includes(column));
}

function percent(part: number, whole: number): string {
  return `${(whole === 0 ? 0 : (part / whole) * 100).toFixed(2)}%`;
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, "\\|").replace(/\s*\n\s*/g, " ");
}
