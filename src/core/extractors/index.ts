/**
 * Field Extractors
 *
 * One cheerio-based extractor per page type.
 *
 * @module
 */

import type { ExtractorRegistry } from "./interfaces/IFieldExtractor.js";
import { FaqExtractor } from "./faq-extractor.js";
import { AgencyDirectoryExtractor } from "./agency-directory-extractor.js";
import { MinistryListExtractor } from "./ministry-list-extractor.js";
import { MinistryPageExtractor } from "./ministry-page-extractor.js";
import { AgencyServicesExtractor } from "./agency-services-extractor.js";

export type { IFieldExtractor, ExtractorRegistry } from "./interfaces/IFieldExtractor.js";
export type * from "./models/fields.js";
export { FaqExtractor, AgencyDirectoryExtractor, MinistryListExtractor, MinistryPageExtractor, AgencyServicesExtractor };
export { departmentUrl } from "./ministry-page-extractor.js";
export { resolveUrl } from "./dom.js";

export function createExtractorRegistry(): ExtractorRegistry {
  return {
    faq: new FaqExtractor(),
    "agency-directory": new AgencyDirectoryExtractor(),
    "ministry-list": new MinistryListExtractor(),
    "ministry-page": new MinistryPageExtractor(),
    "agency-services": new AgencyServicesExtractor(),
  };
}
