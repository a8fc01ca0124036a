/**
 * Tests for graph accumulation and validation
 */

import { describe, it, expect, beforeEach } from "vitest";
import { GraphAccumulator, assertGraphValid, validateGraph, type InvariantViolation } from "../index.js";
import { InvariantViolationError } from "../../errors.js";
import {
  agencyId,
  agencyNameHash,
  departmentId,
  ministryId,
  serviceId,
} from "../../identity/id-generator.js";
import type { AgencySeed, DepartmentSeed, EntityGraph, MinistrySeed, Service } from "../../../types/index.js";

const BASE = "https://portal.example.test";

function ministry(name: string, overrides: Partial<MinistrySeed> = {}): MinistrySeed {
  return {
    ministryId: ministryId(name),
    name,
    description: null,
    reportedAgencyCount: null,
    reportedServiceCount: null,
    url: `${BASE}/en/ministries/${name.length}`,
    ...overrides,
  };
}

function department(m: MinistrySeed, name: string): DepartmentSeed {
  return { departmentId: departmentId(m.ministryId, name), ministryId: m.ministryId, name, url: m.url };
}

function agency(d: DepartmentSeed, name: string, overrides: Partial<AgencySeed> = {}): AgencySeed {
  return {
    agencyId: agencyId(d.ministryId, d.departmentId, name),
    agencyNameHash: agencyNameHash(name),
    ministryId: d.ministryId,
    departmentId: d.departmentId,
    name,
    description: null,
    logoUrl: null,
    agencyUrl: null,
    url: `${BASE}/s/${name.length}`,
    ...overrides,
  };
}

function service(a: AgencySeed, name: string): Service {
  return {
    serviceId: serviceId(a.ministryId, a.departmentId, a.agencyId, name),
    ministryId: a.ministryId,
    departmentId: a.departmentId,
    agencyId: a.agencyId,
    name,
    url: null,
    description: null,
    requirements: null,
  };
}

describe("GraphAccumulator", () => {
  let accumulator: GraphAccumulator;
  const health = ministry("Ministry of Health");
  const finance = ministry("Ministry of Finance");

  beforeEach(() => {
    accumulator = new GraphAccumulator();
  });

  it("should compute observed counts by counting children", () => {
    const dept = department(health, "Medical Services");
    const board = agency(dept, "Medical Board");
    const lab = agency(dept, "Lab Authority");

    accumulator.addMinistry(health);
    accumulator.addDepartment(dept);
    accumulator.addAgency(board);
    accumulator.addAgency(lab);
    accumulator.addService(service(board, "Register"));
    accumulator.addService(service(board, "Renew"));
    accumulator.addService(service(lab, "Certify"));

    const graph = accumulator.materialize();

    expect(graph.ministries).toHaveLength(1);
    expect(graph.ministries[0]).toMatchObject({
      observedDepartmentCount: 1,
      observedAgencyCount: 2,
      observedServiceCount: 3,
    });
    expect(graph.departments[0]).toMatchObject({ observedAgencyCount: 2, observedServiceCount: 3 });
    expect(graph.agencies.find((a) => a.agencyId === board.agencyId)?.observedServiceCount).toBe(2);
    expect(graph.agencies.find((a) => a.agencyId === lab.agencyId)?.observedServiceCount).toBe(1);
  });

  it("should not double-count repeated discoveries", () => {
    const dept = department(health, "Medical Services");
    const board = agency(dept, "Medical Board");

    for (let run = 0; run < 2; run++) {
      accumulator.addMinistry(health);
      accumulator.addDepartment(dept);
      accumulator.addAgency(board);
      accumulator.addService(service(board, "Register"));
    }

    const graph = accumulator.materialize();

    expect(graph.services).toHaveLength(1);
    expect(graph.ministries[0]?.observedServiceCount).toBe(1);
    expect(accumulator.collisions()).toEqual([]);
  });

  it("should keep the same department name under two ministries apart", () => {
    const a = department(health, "Finance");
    const b = department(finance, "Finance");
    accumulator.addMinistry(health);
    accumulator.addMinistry(finance);
    accumulator.addDepartment(a);
    accumulator.addDepartment(b);

    const graph = accumulator.materialize();

    expect(a.departmentId).not.toBe(b.departmentId);
    expect(graph.departments.map((d) => [d.departmentId, d.ministryId]).sort()).toEqual(
      [
        [a.departmentId, health.ministryId],
        [b.departmentId, finance.ministryId],
      ].sort()
    );
  });

  it("should fill unknown ministry fields from the ministry page", () => {
    accumulator.addMinistry(health);
    accumulator.addMinistry({ ...health, description: "Public health.", reportedServiceCount: 50 });

    expect(accumulator.listMinistries()).toEqual([
      { ...health, description: "Public health.", reportedServiceCount: 50 },
    ]);
  });

  it("should record a collision when one identifier names two identities", () => {
    accumulator.addMinistry(ministry("Ministry of Health", { ministryId: "aaaaaaaaaaaa" }));
    accumulator.addMinistry(ministry("Ministry of Lands", { ministryId: "aaaaaaaaaaaa" }));

    expect(accumulator.collisions()).toEqual([
      {
        kind: "identifier-collision",
        entityType: "ministry",
        id: "aaaaaaaaaaaa",
        message: "ministry aaaaaaaaaaaa is shared by two different records",
      },
    ]);
    expect(accumulator.materialize().ministries.map((m) => m.name)).toEqual(["Ministry of Health"]);
  });

  it("should sort every collection by identifier", () => {
    const names = ["Ministry C", "Ministry A", "Ministry B"];
    for (const name of names) accumulator.addMinistry(ministry(name));

    const ids = accumulator.materialize().ministries.map((m) => m.ministryId);
    expect(ids).toEqual([...ids].sort());
  });
});

describe("validateGraph", () => {
  function graphWith(reportedServiceCount: number | null, services: number): EntityGraph {
    const accumulator = new GraphAccumulator();
    const health = ministry("Ministry of Health", { reportedServiceCount, reportedAgencyCount: 3 });
    accumulator.addMinistry(health);

    const medical = department(health, "Medical Services");
    const publicHealth = department(health, "Public Health");
    const agencies = [
      agency(medical, "Medical Board"),
      agency(medical, "Lab Authority"),
      agency(publicHealth, "Disease Control"),
    ];
    accumulator.addDepartment(medical);
    accumulator.addDepartment(publicHealth);
    for (const a of agencies) accumulator.addAgency(a);
    for (let i = 0; i < services; i++) {
      const owner = agencies[i % agencies.length];
      if (owner) accumulator.addService(service(owner, `Service ${i}`));
    }
    return accumulator.materialize();
  }

  it("should report a discrepancy of 5 for 50 reported and 45 observed services", () => {
    const graph = graphWith(50, 45);
    const validation = validateGraph(graph);

    expect(validation.valid).toBe(true);
    expect(validation.violations).toEqual([]);
    expect(validation.counts).toEqual({ ministry: 1, department: 2, agency: 3, service: 45, faq: 0 });
    expect(validation.discrepancies).toEqual([
      {
        entityType: "ministry",
        entityId: ministryId("Ministry of Health"),
        name: "Ministry of Health",
        measure: "services",
        reported: 50,
        observed: 45,
        delta: 5,
      },
    ]);
  });

  it("should tolerate deltas within the configured tolerance", () => {
    expect(validateGraph(graphWith(50, 45), { tolerance: 5 }).discrepancies).toEqual([]);
    expect(validateGraph(graphWith(50, 44), { tolerance: 5 }).discrepancies).toHaveLength(1);
  });

  it("should warn when a count is not reported", () => {
    const validation = validateGraph(graphWith(null, 3));

    expect(validation.discrepancies).toEqual([]);
    expect(validation.warnings).toEqual([
      {
        kind: "count-not-reported",
        entityType: "ministry",
        entityId: ministryId("Ministry of Health"),
        name: "Ministry of Health",
        measure: "services",
        message: "Ministry of Health does not report a services count",
      },
    ]);
  });

  it("should flag orphaned references and duplicate identifiers", () => {
    const graph = graphWith(null, 1);
    const broken: EntityGraph = {
      ...graph,
      departments: graph.departments.map((d, i) => (i === 0 ? { ...d, ministryId: "ffffffffffff" } : d)),
      faqs: [
        { faqId: "111111111111", question: "Q", answer: "A" },
        { faqId: "111111111111", question: "Q2", answer: "A2" },
      ],
    };
    const orphanId = broken.departments[0]?.departmentId;

    const validation = validateGraph(broken);

    expect(validation.valid).toBe(false);
    expect(validation.violations).toEqual([
      {
        kind: "duplicate-identifier",
        entityType: "faq",
        id: "111111111111",
        message: "Duplicate faq identifier 111111111111",
      },
      {
        kind: "orphaned-reference",
        entityType: "department",
        id: orphanId,
        field: "ministryId",
        reference: "ffffffffffff",
        message: `department ${orphanId} references missing ministryId ffffffffffff`,
      },
    ]);
    expect(() => assertGraphValid(validation)).toThrow(InvariantViolationError);
  });

  it("should carry accumulation collisions into the violations", () => {
    const collision: InvariantViolation = {
      kind: "identifier-collision",
      entityType: "agency",
      id: "abcdefabcdef",
      message: "agency abcdefabcdef is shared by two different records",
    };

    const validation = validateGraph(graphWith(3, 3), { collisions: [collision] });

    expect(validation.violations).toEqual([collision]);
    expect(validation.valid).toBe(false);
  });

  it("should accept a consistent graph", () => {
    expect(() => assertGraphValid(validateGraph(graphWith(3, 3)))).not.toThrow();
  });
});
