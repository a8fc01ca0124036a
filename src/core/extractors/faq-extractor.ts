/**
 * FAQ page: one `li#faq_*` per entry, the question in its button and the
 * answer in the div that follows it.
 */

import * as cheerio from "cheerio";
import { ErrorCode, ExtractionError } from "../errors.js";
import type { IFieldExtractor } from "./interfaces/IFieldExtractor.js";
import type { FaqFields } from "./models/fields.js";
import { textOf } from "./dom.js";

const ITEM_SELECTOR = "li[id^=faq_]";

export class FaqExtractor implements IFieldExtractor<"faq"> {
  readonly pageType = "faq";
  readonly ready = { selector: ITEM_SELECTOR };

  extract(html: string): FaqFields[] {
    const $ = cheerio.load(html);
    const items = $(ITEM_SELECTOR);
    const entries: FaqFields[] = [];

    items.each((_, item) => {
      const $item = $(item);
      const button = $item.find("button").first();
      if (button.length === 0) return;

      let answer = button.nextAll("div").first();
      if (answer.length === 0) {
        answer = $item.find("div").first();
      }

      const question = textOf(button);
      const answerText = textOf(answer);
      if (question && answerText) {
        entries.push({ question, answer: answerText });
      }
    });

    if (entries.length === 0) {
      throw new ExtractionError(
        `No FAQ entries found (${items.length} candidate items)`,
        ErrorCode.EXTRACTION_NO_ITEMS,
        { pageType: this.pageType, candidates: items.length }
      );
    }
    return entries;
  }
}
