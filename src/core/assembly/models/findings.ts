/**
 * Validation findings for the assembled graph
 *
 * @module
 */

import type { EntityType, Identifier } from "../../../types/index.js";

export type ViolationKind = "duplicate-identifier" | "identifier-collision" | "orphaned-reference";

/**
 * A broken graph invariant. Any violation is fatal to the run.
 */
export interface InvariantViolation {
  kind: ViolationKind;
  entityType: EntityType;
  id: Identifier;
  /** Foreign-key field, for orphaned references */
  field?: string;
  /** Referenced identifier that did not resolve */
  reference?: Identifier;
  message: string;
}

export type CountMeasure = "agencies" | "services";

/**
 * Reported vs observed count mismatch on a ministry, reported only
 */
export interface DiscrepancyFinding {
  entityType: "ministry";
  entityId: Identifier;
  name: string;
  measure: CountMeasure;
  reported: number;
  observed: number;
  /** reported - observed */
  delta: number;
}

export interface CountNotReportedWarning {
  kind: "count-not-reported";
  entityType: "ministry";
  entityId: Identifier;
  name: string;
  measure: CountMeasure;
  message: string;
}

export type EntityCounts = Record<EntityType, number>;

export interface GraphValidation {
  valid: boolean;
  counts: EntityCounts;
  violations: InvariantViolation[];
  discrepancies: DiscrepancyFinding[];
  warnings: CountNotReportedWarning[];
}
