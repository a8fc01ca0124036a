/**
 * Graph Validator
 *
 * Checks identifier uniqueness and referential completeness of an
 * assembled graph, and compares platform-reported ministry counts with
 * observed ones. Invariant violations are fatal; discrepancies are reported.
 *
 * @module
 */

import type { EntityGraph, EntityType, Identifier, Ministry } from "../../types/index.js";
import { ENTITY_TYPES } from "../../types/index.js";
import { ErrorCode, InvariantViolationError } from "../errors.js";
import type {
  CountMeasure,
  CountNotReportedWarning,
  DiscrepancyFinding,
  EntityCounts,
  GraphValidation,
  InvariantViolation,
} from "./models/findings.js";

export interface ValidateOptions {
  /** Absolute delta tolerated before a discrepancy is flagged */
  tolerance?: number;
  /** Violations found during accumulation, e.g. identifier collisions */
  collisions?: InvariantViolation[];
}

export function validateGraph(graph: EntityGraph, options: ValidateOptions = {}): GraphValidation {
  const tolerance = options.tolerance ?? 0;

  const violations: InvariantViolation[] = [
    ...(options.collisions ?? []),
    ...checkUniqueness(graph),
    ...checkReferences(graph),
  ];

  const discrepancies: DiscrepancyFinding[] = [];
  const warnings: CountNotReportedWarning[] = [];
  for (const ministry of graph.ministries) {
    compareCount(ministry, "agencies", ministry.reportedAgencyCount, ministry.observedAgencyCount);
    compareCount(ministry, "services", ministry.reportedServiceCount, ministry.observedServiceCount);
  }

  return {
    valid: violations.length === 0,
    counts: countEntities(graph),
    violations,
    discrepancies,
    warnings,
  };

  function compareCount(ministry: Ministry, measure: CountMeasure, reported: number | null, observed: number): void {
    if (reported === null) {
      warnings.push({
        kind: "count-not-reported",
        entityType: "ministry",
        entityId: ministry.ministryId,
        name: ministry.name,
        measure,
        message: `${ministry.name} does not report a ${measure} count`,
      });
      return;
    }

    const delta = reported - observed;
    if (Math.abs(delta) > tolerance) {
      discrepancies.push({
        entityType: "ministry",
        entityId: ministry.ministryId,
        name: ministry.name,
        measure,
        reported,
        observed,
        delta,
      });
    }
  }
}

/**
 * Throws when the validation holds any invariant violation.
 */
export function assertGraphValid(validation: GraphValidation): void {
  if (validation.valid) return;
  throw new InvariantViolationError(
    `Graph has ${validation.violations.length} invariant violation(s)`,
    ErrorCode.GRAPH_INVARIANT_VIOLATION,
    { violations: validation.violations }
  );
}

export function countEntities(graph: EntityGraph): EntityCounts {
  return {
    ministry: graph.ministries.length,
    department: graph.departments.length,
    agency: graph.agencies.length,
    service: graph.services.length,
    faq: graph.faqs.length,
  };
}

// =============================================================================
// Checks
// =============================================================================

function idsOf(graph: EntityGraph, entityType: EntityType): Identifier[] {
  switch (entityType) {
    case "ministry":
      return graph.ministries.map((m) => m.ministryId);
    case "department":
      return graph.departments.map((d) => d.departmentId);
    case "agency":
      return graph.agencies.map((a) => a.agencyId);
    case "service":
      return graph.services.map((s) => s.serviceId);
    case "faq":
      return graph.faqs.map((f) => f.faqId);
  }
}

function checkUniqueness(graph: EntityGraph): InvariantViolation[] {
  const violations: InvariantViolation[] = [];

  for (const entityType of ENTITY_TYPES) {
    const seen = new Set<Identifier>();
    const reported = new Set<Identifier>();
    for (const id of idsOf(graph, entityType)) {
      if (!seen.has(id)) {
        seen.add(id);
        continue;
      }
      if (reported.has(id)) continue;
      reported.add(id);
      violations.push({
        kind: "duplicate-identifier",
        entityType,
        id,
        message: `Duplicate ${entityType} identifier ${id}`,
      });
    }
  }

  return violations;
}

function checkReferences(graph: EntityGraph): InvariantViolation[] {
  const ministries = new Set(graph.ministries.map((m) => m.ministryId));
  const departments = new Set(graph.departments.map((d) => d.departmentId));
  const agencies = new Set(graph.agencies.map((a) => a.agencyId));
  const violations: InvariantViolation[] = [];

  const requireRef = (
    entityType: EntityType,
    id: Identifier,
    field: string,
    reference: Identifier,
    known: Set<Identifier>
  ): void => {
    if (known.has(reference)) return;
    violations.push({
      kind: "orphaned-reference",
      entityType,
      id,
      field,
      reference,
      message: `${entityType} ${id} references missing ${field} ${reference}`,
    });
  };

  for (const d of graph.departments) {
    requireRef("department", d.departmentId, "ministryId", d.ministryId, ministries);
  }
  for (const a of graph.agencies) {
    requireRef("agency", a.agencyId, "ministryId", a.ministryId, ministries);
    requireRef("agency", a.agencyId, "departmentId", a.departmentId, departments);
  }
  for (const s of graph.services) {
    requireRef("service", s.serviceId, "ministryId", s.ministryId, ministries);
    requireRef("service", s.serviceId, "departmentId", s.departmentId, departments);
    requireRef("service", s.serviceId, "agencyId", s.agencyId, agencies);
  }

  return violations;
}
