/**
 * CSV rendering (RFC 4180 quoting, header row, LF line endings)
 *
 * @module
 */

import type { CellValue, Row } from "./columns.js";

const NEEDS_QUOTING = /[",\r\n]/;

export function formatCell(value: CellValue): string {
  if (value === null) return "";
  const text = String(value);
  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(columns: readonly string[], rows: readonly Row[]): string {
  const lines = [columns.map(formatCell).join(",")];
  for (const row of rows) {
    lines.push(columns.map((column) => formatCell(row[column] ?? null)).join(","));
  }
  return `${lines.join("\n")}\n`;
}
