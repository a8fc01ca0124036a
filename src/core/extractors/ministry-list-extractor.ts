/**
 * National ministries list: links into `/en/ministries/<slug>`.
 */

import * as cheerio from "cheerio";
import { ErrorCode, ExtractionError } from "../errors.js";
import type { IFieldExtractor } from "./interfaces/IFieldExtractor.js";
import type { MinistryListItem } from "./models/fields.js";
import { resolveUrl, textOf } from "./dom.js";

const LINK_SELECTOR = "ul a[href^='/en/ministries/']";

export class MinistryListExtractor implements IFieldExtractor<"ministry-list"> {
  readonly pageType = "ministry-list";
  readonly ready = { selector: LINK_SELECTOR };

  extract(html: string, pageUrl: string): MinistryListItem[] {
    const $ = cheerio.load(html);
    const links = $(LINK_SELECTOR);
    const items: MinistryListItem[] = [];

    links.each((_, link) => {
      const $link = $(link);
      const name = textOf($link);
      const url = resolveUrl($link.attr("href"), pageUrl);
      if (name && url) {
        items.push({ name, url });
      }
    });

    if (items.length === 0) {
      throw new ExtractionError(
        `No ministries found (${links.length} candidate links)`,
        ErrorCode.EXTRACTION_NO_ITEMS,
        { pageType: this.pageType, candidates: links.length }
      );
    }
    return items;
  }
}
