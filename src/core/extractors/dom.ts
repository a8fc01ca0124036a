/**
 * Small cheerio helpers shared by the extractors
 */

import { cleanOptionalText, cleanText } from "../identity/normalize.js";

/** The part of a cheerio selection the helpers read */
interface TextSource {
  length: number;
  text(): string;
}

/** Element text with whitespace collapsed */
export function textOf(element: TextSource): string {
  return cleanText(element.text());
}

export function optionalTextOf(element: TextSource): string | null {
  return element.length === 0 ? null : cleanOptionalText(element.text());
}

const HAS_SCHEME = /^[a-z][a-z0-9+.-]*:/i;

/**
 * Resolves a relative link against the page URL. Absolute links are kept
 * verbatim; blank or unparsable links are null.
 */
export function resolveUrl(href: string | undefined, pageUrl: string): string | null {
  const trimmed = href?.trim();
  if (!trimmed) return null;
  if (HAS_SCHEME.test(trimmed)) return trimmed;
  try {
    return new URL(trimmed, pageUrl).toString();
  } catch {
    return null;
  }
}
