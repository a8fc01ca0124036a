/**
 * Ministry page
 *
 * - Reported counts: the first `dd` is the agency count, the second the
 *   service count.
 * - Description: the `article` text.
 * - Departments: direct `div` children of `ul[role=listbox]`, each with a
 *   `span` name and a nested list of agency links.
 *
 * @module
 */

import * as cheerio from "cheerio";
import { parseCount } from "../identity/normalize.js";
import type { IFieldExtractor } from "./interfaces/IFieldExtractor.js";
import type { AgencyLink, DepartmentBlock, MinistryPageFields } from "./models/fields.js";
import { optionalTextOf, resolveUrl, textOf } from "./dom.js";

const DEPARTMENT_QUERY_PARAM = "department";

/**
 * The ministry URL narrowed by the `department` query parameter of the
 * block's first agency link; the ministry URL itself when there is none.
 */
export function departmentUrl(ministryUrl: string, firstAgencyUrl: string | null): string {
  if (firstAgencyUrl === null) return ministryUrl;

  let department: string | null;
  try {
    department = new URL(firstAgencyUrl).searchParams.get(DEPARTMENT_QUERY_PARAM);
  } catch {
    department = null;
  }
  if (!department) return ministryUrl;

  const url = new URL(ministryUrl);
  url.search = "";
  url.searchParams.set(DEPARTMENT_QUERY_PARAM, department);
  return url.toString();
}

export class MinistryPageExtractor implements IFieldExtractor<"ministry-page"> {
  readonly pageType = "ministry-page";
  readonly ready = { selector: "dd" };

  extract(html: string, pageUrl: string): MinistryPageFields {
    const $ = cheerio.load(html);
    const counters = $("dd");

    const departments: DepartmentBlock[] = [];
    $("ul[role=listbox]")
      .first()
      .children("div")
      .each((_, block) => {
        const $block = $(block);
        const name = textOf($block.find("span").first());
        if (!name) return;

        const links = $block.find("ul a[href]");
        const agencies: AgencyLink[] = [];
        links.each((_, link) => {
          const $link = $(link);
          const agencyName = textOf($link);
          const servicesUrl = resolveUrl($link.attr("href"), pageUrl);
          if (agencyName && servicesUrl) {
            agencies.push({ name: agencyName, servicesUrl });
          }
        });

        departments.push({
          name,
          url: departmentUrl(pageUrl, resolveUrl(links.first().attr("href"), pageUrl)),
          agencies,
        });
      });

    return {
      description: optionalTextOf($("article").first()),
      reportedAgencyCount: parseCount(counters.eq(0).text() || null),
      reportedServiceCount: parseCount(counters.eq(1).text() || null),
      departments,
    };
  }
}
