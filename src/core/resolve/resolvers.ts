/**
 * Entity Resolution
 *
 * Turns extracted page fields into candidate entity records with scoped
 * identifiers. Placement-scoped agencies are reconciled with global
 * directory metadata through the name-hash join index; a placement with no
 * directory match is kept with its metadata absent.
 *
 * @module
 */

import type {
  AgencySeed,
  DepartmentSeed,
  Faq,
  MinistrySeed,
  Service,
} from "../../types/index.js";
import {
  agencyId,
  agencyNameHash,
  departmentId,
  faqId,
  ministryId,
  serviceId,
  type Identifier,
} from "../identity/id-generator.js";
import type {
  FaqFields,
  MinistryListItem,
  MinistryPageFields,
  ServiceLink,
} from "../extractors/models/fields.js";
import type { AgencyDirectoryIndex } from "./agency-directory-index.js";

export function resolveFaqs(fields: FaqFields[]): Faq[] {
  return fields.map((entry) => ({
    faqId: faqId(entry.question, entry.answer),
    question: entry.question,
    answer: entry.answer,
  }));
}

/**
 * Seeds ministries from the national list. Description and reported counts
 * stay unknown until the ministry page is processed.
 */
export function resolveMinistryList(items: MinistryListItem[]): MinistrySeed[] {
  return items.map((item) => ({
    ministryId: ministryId(item.name),
    name: item.name,
    description: null,
    reportedAgencyCount: null,
    reportedServiceCount: null,
    url: item.url,
  }));
}

export interface MinistryPageResolution {
  ministry: MinistrySeed;
  departments: DepartmentSeed[];
  agencies: AgencySeed[];
  /** Placements without a global directory entry */
  unmatchedAgencyIds: Identifier[];
}

export async function resolveMinistryPage(
  fields: MinistryPageFields,
  ministry: MinistrySeed,
  directory: AgencyDirectoryIndex
): Promise<MinistryPageResolution> {
  const mid = ministry.ministryId;
  const departments: DepartmentSeed[] = [];
  const agencies: AgencySeed[] = [];
  const unmatchedAgencyIds: Identifier[] = [];

  for (const block of fields.departments) {
    const did = departmentId(mid, block.name);
    departments.push({ departmentId: did, ministryId: mid, name: block.name, url: block.url });

    for (const link of block.agencies) {
      const nameHash = agencyNameHash(link.name);
      const aid = agencyId(mid, did, link.name);
      const entry = await directory.lookup(nameHash);
      if (!entry) unmatchedAgencyIds.push(aid);

      agencies.push({
        agencyId: aid,
        agencyNameHash: nameHash,
        ministryId: mid,
        departmentId: did,
        name: link.name,
        description: entry?.description ?? null,
        logoUrl: entry?.logoUrl ?? null,
        agencyUrl: entry?.agencyUrl ?? null,
        url: link.servicesUrl,
      });
    }
  }

  return {
    ministry: {
      ...ministry,
      description: fields.description,
      reportedAgencyCount: fields.reportedAgencyCount,
      reportedServiceCount: fields.reportedServiceCount,
    },
    departments,
    agencies,
    unmatchedAgencyIds,
  };
}

export function resolveServices(links: ServiceLink[], placement: AgencySeed): Service[] {
  return links.map((link) => ({
    serviceId: serviceId(placement.ministryId, placement.departmentId, placement.agencyId, link.name),
    ministryId: placement.ministryId,
    departmentId: placement.departmentId,
    agencyId: placement.agencyId,
    name: link.name,
    url: link.url,
    description: null,
    requirements: null,
  }));
}
