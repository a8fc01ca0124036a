/**
 * Scoped Identifier Generator
 *
 * Deterministic identifiers for directory entities. An identifier is the
 * SHA-256 digest of the normalized, hyphen-joined ordered parts, truncated to
 * 12 hex characters. Parts are ancestor identifiers followed by the entity's
 * own name, so the same leaf name under different parents yields different
 * identifiers while recomputation under the same parent is stable.
 *
 * Input: normalize(part1)-normalize(part2)-...-normalize(name)
 *
 * @module
 */

import { createHash } from "node:crypto";
import { normalize } from "./normalize.js";

export const IDENTIFIER_LENGTH = 12;

/** Opaque fixed-length hex identifier */
export type Identifier = string;

/**
 * Hashes the ordered parts into an identifier. Parts are normalized first
 * (a no-op for parts that are already identifiers). Empty input is legal.
 */
export function scopedHash(parts: readonly string[]): Identifier {
  const input = parts.map(normalize).join("-");
  return createHash("sha256").update(input, "utf8").digest("hex").slice(0, IDENTIFIER_LENGTH);
}

// =============================================================================
// Entity Identifiers
// =============================================================================

export function ministryId(ministryName: string): Identifier {
  return scopedHash([ministryName]);
}

/** Department names are not globally unique, so they are scoped to the ministry */
export function departmentId(ministryIdValue: Identifier, departmentName: string): Identifier {
  return scopedHash([ministryIdValue, departmentName]);
}

/**
 * Name-only agency key, used to join global directory metadata to
 * placements discovered during ministry traversal.
 */
export function agencyNameHash(agencyName: string): Identifier {
  return scopedHash([agencyName]);
}

/** Placement-scoped agency identity */
export function agencyId(
  ministryIdValue: Identifier,
  departmentIdValue: Identifier,
  agencyName: string
): Identifier {
  return scopedHash([ministryIdValue, departmentIdValue, agencyName]);
}

export function serviceId(
  ministryIdValue: Identifier,
  departmentIdValue: Identifier,
  agencyIdValue: Identifier,
  serviceName: string
): Identifier {
  return scopedHash([ministryIdValue, departmentIdValue, agencyIdValue, serviceName]);
}

export function faqId(question: string, answer: string): Identifier {
  return scopedHash([question, answer]);
}

/**
 * Validates that a string is a well-formed identifier.
 */
export function isValidIdentifier(id: string): boolean {
  return /^[a-f0-9]{12}$/.test(id);
}
