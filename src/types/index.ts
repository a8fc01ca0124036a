/**
 * Shared types for the directory graph
 */

import type { Identifier } from "../core/identity/id-generator.js";

export type { Identifier };

// =============================================================================
// Page Types
// =============================================================================

/**
 * Kinds of pages the crawler visits. Each has its own ready condition and
 * field extractor.
 */
export type PageType =
  | "faq"
  | "agency-directory"
  | "ministry-list"
  | "ministry-page"
  | "agency-services";

export const PAGE_TYPES: readonly PageType[] = [
  "faq",
  "agency-directory",
  "ministry-list",
  "ministry-page",
  "agency-services",
];

// =============================================================================
// Entities
// =============================================================================

/**
 * A national ministry. Reported counts are declared by the source platform;
 * observed counts are derived from the assembled graph.
 */
export interface Ministry {
  ministryId: Identifier;
  name: string;
  description: string | null;
  reportedAgencyCount: number | null;
  reportedServiceCount: number | null;
  observedDepartmentCount: number;
  observedAgencyCount: number;
  observedServiceCount: number;
  /** Canonical ministry page URL */
  url: string;
}

/**
 * A department, scoped to its ministry
 */
export interface Department {
  departmentId: Identifier;
  ministryId: Identifier;
  name: string;
  observedAgencyCount: number;
  observedServiceCount: number;
  /** Ministry page URL narrowed to this department */
  url: string;
}

/**
 * An agency placement: the agency as it appears under one ministry and
 * department. Metadata comes from the global directory when it lists an
 * agency with the same normalized name.
 */
export interface Agency {
  agencyId: Identifier;
  agencyNameHash: Identifier;
  ministryId: Identifier;
  departmentId: Identifier;
  name: string;
  description: string | null;
  logoUrl: string | null;
  agencyUrl: string | null;
  observedServiceCount: number;
  /** Services listing URL for this placement */
  url: string;
}

export interface Service {
  serviceId: Identifier;
  ministryId: Identifier;
  departmentId: Identifier;
  agencyId: Identifier;
  name: string;
  /** Link as published; may point off-platform */
  url: string | null;
  description: null;
  requirements: null;
}

export interface Faq {
  faqId: Identifier;
  question: string;
  answer: string;
}

/** Records before derived counts are attached */
export type MinistrySeed = Omit<
  Ministry,
  "observedDepartmentCount" | "observedAgencyCount" | "observedServiceCount"
>;
export type DepartmentSeed = Omit<Department, "observedAgencyCount" | "observedServiceCount">;
export type AgencySeed = Omit<Agency, "observedServiceCount">;

/**
 * The materialized entity graph, every collection sorted by identifier
 */
export interface EntityGraph {
  ministries: Ministry[];
  departments: Department[];
  agencies: Agency[];
  services: Service[];
  faqs: Faq[];
}

export type EntityType = "ministry" | "department" | "agency" | "service" | "faq";

export const ENTITY_TYPES: readonly EntityType[] = ["ministry", "department", "agency", "service", "faq"];

export const ENTITY_COLLECTIONS = {
  ministry: "ministries",
  department: "departments",
  agency: "agencies",
  service: "services",
  faq: "faqs",
} as const satisfies Record<EntityType, keyof EntityGraph>;
