/**
 * Text normalization for identifier hashing and display
 *
 * @module
 */

const COMBINING_MARKS = /\p{M}/gu;
const DISALLOWED = /[^a-z0-9]/g;
const WHITESPACE = /\s+/gu;

/**
 * Canonical form used for hashing: lowercase, canonical decomposition,
 * combining marks stripped, everything outside `[a-z0-9]` removed.
 *
 * Idempotent: `normalize(normalize(x)) === normalize(x)`.
 *
 * @example
 * normalize("Ministry of  Health!") // => "ministryofhealth"
 * normalize("Énergie")              // => "energie"
 */
export function normalize(text: string): string {
  return text
    .toLowerCase()
    .normalize("NFD")
    .replace(COMBINING_MARKS, "")
    .replace(DISALLOWED, "");
}

/**
 * Display form stored on records: whitespace collapsed to single spaces and trimmed.
 */
export function cleanText(text: string): string {
  return text.replace(WHITESPACE, " ").trim();
}

/**
 * Like cleanText, but absent or blank input becomes null.
 */
export function cleanOptionalText(text: string | null | undefined): string | null {
  if (text === null || text === undefined) return null;
  const cleaned = cleanText(text);
  return cleaned.length > 0 ? cleaned : null;
}

/**
 * Parses a platform counter ("42", " 7 ") into an integer; anything that is
 * not a plain run of digits is treated as not reported.
 */
export function parseCount(text: string | null | undefined): number | null {
  if (text === null || text === undefined) return null;
  const clean = text.trim();
  if (!/^\d+$/.test(clean)) return null;
  return Number.parseInt(clean, 10);
}
