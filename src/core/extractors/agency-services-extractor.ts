/**
 * Agency services listing: links inside the first `div.space-y-3`.
 * Off-platform links are kept as published.
 */

import * as cheerio from "cheerio";
import type { IFieldExtractor } from "./interfaces/IFieldExtractor.js";
import type { ServiceLink } from "./models/fields.js";
import { resolveUrl, textOf } from "./dom.js";

const CONTAINER_SELECTOR = "div.space-y-3";

export class AgencyServicesExtractor implements IFieldExtractor<"agency-services"> {
  readonly pageType = "agency-services";
  readonly ready = { selector: `${CONTAINER_SELECTOR} a` };

  extract(html: string, pageUrl: string): ServiceLink[] {
    const $ = cheerio.load(html);
    const services: ServiceLink[] = [];

    $(CONTAINER_SELECTOR)
      .first()
      .find("a")
      .each((_, link) => {
        const $link = $(link);
        const name = textOf($link);
        if (name) {
          services.push({ name, url: resolveUrl($link.attr("href"), pageUrl) });
        }
      });

    return services;
  }
}
