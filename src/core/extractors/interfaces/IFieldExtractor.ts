/**
 * Field Extractor Interface
 *
 * Maps raw markup of one page type to named candidate fields. Extractors
 * know nothing about the hierarchy or identifiers.
 *
 * @module
 */

import type { PageType } from "../../../types/index.js";
import type { ReadyCondition } from "../../fetch/interfaces/IPageFetcher.js";
import type { PageFieldsMap } from "../models/fields.js";

export interface IFieldExtractor<P extends PageType> {
  readonly pageType: P;
  /** Condition the fetched page must meet before it is stored */
  readonly ready: ReadyCondition;
  /**
   * @param pageUrl - URL the markup was loaded from; relative links resolve against it
   * @throws ExtractionError when the page lacks content it must have
   */
  extract(html: string, pageUrl: string): PageFieldsMap[P];
}

export type ExtractorRegistry = { [P in PageType]: IFieldExtractor<P> };
