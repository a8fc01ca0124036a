/**
 * Global agency directory: a grid of cards, each a link holding the agency
 * name (h4), a short description (p) and a logo (img).
 */

import * as cheerio from "cheerio";
import { ErrorCode, ExtractionError } from "../errors.js";
import type { IFieldExtractor } from "./interfaces/IFieldExtractor.js";
import type { DirectoryAgencyFields } from "./models/fields.js";
import { optionalTextOf, resolveUrl, textOf } from "./dom.js";

const CARD_SELECTOR = "div.grid a";

export class AgencyDirectoryExtractor implements IFieldExtractor<"agency-directory"> {
  readonly pageType = "agency-directory";
  readonly ready = { selector: `${CARD_SELECTOR} h4` };

  extract(html: string, pageUrl: string): DirectoryAgencyFields[] {
    const $ = cheerio.load(html);
    const cards = $(CARD_SELECTOR);
    const entries: DirectoryAgencyFields[] = [];

    cards.each((_, card) => {
      const $card = $(card);
      const name = textOf($card.find("h4").first());
      if (!name) return;

      entries.push({
        name,
        description: optionalTextOf($card.find("p").first()),
        logoUrl: resolveUrl($card.find("img").first().attr("src"), pageUrl),
        agencyUrl: resolveUrl($card.attr("href"), pageUrl),
      });
    });

    if (entries.length === 0) {
      throw new ExtractionError(
        `No agency entries found (${cards.length} candidate links)`,
        ErrorCode.EXTRACTION_NO_ITEMS,
        { pageType: this.pageType, candidates: cards.length }
      );
    }
    return entries;
  }
}
