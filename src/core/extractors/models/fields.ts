/**
 * Candidate fields produced by the page extractors. Values are display
 * text (whitespace collapsed) and absolute URLs; absent values are null.
 */

import type { PageType } from "../../../types/index.js";

export interface FaqFields {
  question: string;
  answer: string;
}

export interface DirectoryAgencyFields {
  name: string;
  description: string | null;
  logoUrl: string | null;
  agencyUrl: string | null;
}

export interface MinistryListItem {
  name: string;
  url: string;
}

export interface AgencyLink {
  name: string;
  /** Services listing for this placement */
  servicesUrl: string;
}

export interface DepartmentBlock {
  name: string;
  /** Ministry page narrowed to the department */
  url: string;
  agencies: AgencyLink[];
}

export interface MinistryPageFields {
  description: string | null;
  reportedAgencyCount: number | null;
  reportedServiceCount: number | null;
  departments: DepartmentBlock[];
}

export interface ServiceLink {
  name: string;
  url: string | null;
}

/** Extractor output per page type */
export interface PageFieldsMap {
  faq: FaqFields[];
  "agency-directory": DirectoryAgencyFields[];
  "ministry-list": MinistryListItem[];
  "ministry-page": MinistryPageFields;
  "agency-services": ServiceLink[];
}

export type PageFields<P extends PageType> = PageFieldsMap[P];
