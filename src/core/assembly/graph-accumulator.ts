/**
 * Graph Accumulator
 *
 * Collects candidate records across phases, merges repeated discoveries of
 * the same identity, and materializes the final entity graph. Observed
 * counts are computed once, at materialization, by counting child records.
 *
 * @module
 */

import type {
  Agency,
  AgencySeed,
  Department,
  DepartmentSeed,
  EntityGraph,
  EntityType,
  Faq,
  Identifier,
  Ministry,
  MinistrySeed,
  Service,
} from "../../types/index.js";
import { normalize } from "../identity/normalize.js";
import { createLogger } from "../../utils/logger.js";
import type { InvariantViolation } from "./models/findings.js";

const logger = createLogger("graph-accumulator");

interface Slot<T> {
  /** Parent ids plus normalized names; equal identities merge */
  identity: string;
  record: T;
}

function identityOf(parts: readonly string[]): string {
  return parts.join("|");
}

export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function countBy<T>(records: readonly T[], key: (record: T) => Identifier): Map<Identifier, number> {
  const counts = new Map<Identifier, number>();
  for (const record of records) {
    const id = key(record);
    counts.set(id, (counts.get(id) ?? 0) + 1);
  }
  return counts;
}

export class GraphAccumulator {
  private ministries = new Map<Identifier, Slot<MinistrySeed>>();
  private departments = new Map<Identifier, Slot<DepartmentSeed>>();
  private agencies = new Map<Identifier, Slot<AgencySeed>>();
  private services = new Map<Identifier, Slot<Service>>();
  private faqs = new Map<Identifier, Slot<Faq>>();
  private collisionFindings: InvariantViolation[] = [];

  /**
   * Adds or merges a ministry. Values from a later discovery replace
   * unknown ones; the ministry page supplies description and reported counts.
   */
  addMinistry(seed: MinistrySeed): void {
    this.add("ministry", this.ministries, seed.ministryId, identityOf([normalize(seed.name)]), seed, (prev) => ({
      ...prev,
      description: seed.description ?? prev.description,
      reportedAgencyCount: seed.reportedAgencyCount ?? prev.reportedAgencyCount,
      reportedServiceCount: seed.reportedServiceCount ?? prev.reportedServiceCount,
    }));
  }

  addDepartment(seed: DepartmentSeed): void {
    this.add(
      "department",
      this.departments,
      seed.departmentId,
      identityOf([seed.ministryId, normalize(seed.name)]),
      seed,
      (prev) => prev
    );
  }

  addAgency(seed: AgencySeed): void {
    this.add(
      "agency",
      this.agencies,
      seed.agencyId,
      identityOf([seed.ministryId, seed.departmentId, normalize(seed.name)]),
      seed,
      (prev) => ({
        ...prev,
        description: prev.description ?? seed.description,
        logoUrl: prev.logoUrl ?? seed.logoUrl,
        agencyUrl: prev.agencyUrl ?? seed.agencyUrl,
      })
    );
  }

  addService(service: Service): void {
    this.add(
      "service",
      this.services,
      service.serviceId,
      identityOf([service.ministryId, service.departmentId, service.agencyId, normalize(service.name)]),
      service,
      (prev) => ({ ...prev, url: prev.url ?? service.url })
    );
  }

  addFaq(faq: Faq): void {
    this.add(
      "faq",
      this.faqs,
      faq.faqId,
      identityOf([normalize(faq.question), normalize(faq.answer)]),
      faq,
      (prev) => prev
    );
  }

  /** Known ministries in identifier order */
  listMinistries(): MinistrySeed[] {
    return sortById(Array.from(this.ministries.values(), (slot) => slot.record), (m) => m.ministryId);
  }

  /**
   * Identifiers shared by records with different identities
   */
  collisions(): InvariantViolation[] {
    return [...this.collisionFindings];
  }

  /**
   * Builds the final graph: observed counts by direct counting, every
   * collection sorted by identifier.
   */
  materialize(): EntityGraph {
    const services = sortById(
      Array.from(this.services.values(), (slot) => slot.record),
      (s) => s.serviceId
    );
    const agencySeeds = Array.from(this.agencies.values(), (slot) => slot.record);
    const departmentSeeds = Array.from(this.departments.values(), (slot) => slot.record);

    const servicesByAgency = countBy(services, (s) => s.agencyId);
    const servicesByDepartment = countBy(services, (s) => s.departmentId);
    const servicesByMinistry = countBy(services, (s) => s.ministryId);
    const agenciesByDepartment = countBy(agencySeeds, (a) => a.departmentId);
    const agenciesByMinistry = countBy(agencySeeds, (a) => a.ministryId);
    const departmentsByMinistry = countBy(departmentSeeds, (d) => d.ministryId);

    const agencies: Agency[] = sortById(
      agencySeeds.map((seed) => ({ ...seed, observedServiceCount: servicesByAgency.get(seed.agencyId) ?? 0 })),
      (a) => a.agencyId
    );

    const departments: Department[] = sortById(
      departmentSeeds.map((seed) => ({
        ...seed,
        observedAgencyCount: agenciesByDepartment.get(seed.departmentId) ?? 0,
        observedServiceCount: servicesByDepartment.get(seed.departmentId) ?? 0,
      })),
      (d) => d.departmentId
    );

    const ministries: Ministry[] = this.listMinistries().map((seed) => ({
      ...seed,
      observedDepartmentCount: departmentsByMinistry.get(seed.ministryId) ?? 0,
      observedAgencyCount: agenciesByMinistry.get(seed.ministryId) ?? 0,
      observedServiceCount: servicesByMinistry.get(seed.ministryId) ?? 0,
    }));

    const faqs = sortById(
      Array.from(this.faqs.values(), (slot) => slot.record),
      (f) => f.faqId
    );

    return { ministries, departments, agencies, services, faqs };
  }

  private add<T>(
    entityType: EntityType,
    slots: Map<Identifier, Slot<T>>,
    id: Identifier,
    identity: string,
    record: T,
    merge: (prev: T) => T
  ): void {
    const existing = slots.get(id);
    if (!existing) {
      slots.set(id, { identity, record });
      return;
    }

    if (existing.identity === identity) {
      existing.record = merge(existing.record);
      return;
    }

    logger.error({ entityType, id }, "Identifier collision");
    this.collisionFindings.push({
      kind: "identifier-collision",
      entityType,
      id,
      message: `${entityType} ${id} is shared by two different records`,
    });
  }
}

function sortById<T>(records: T[], id: (record: T) => Identifier): T[] {
  return records.sort((a, b) => compareIds(id(a), id(b)));
}
