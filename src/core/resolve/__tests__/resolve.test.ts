/**
 * Tests for entity resolution and the agency join index
 */

import { describe, it, expect, beforeEach } from "vitest";
import { AgencyDirectoryIndex } from "../agency-directory-index.js";
import { resolveFaqs, resolveMinistryList, resolveMinistryPage, resolveServices } from "../resolvers.js";
import {
  agencyId,
  agencyNameHash,
  departmentId,
  faqId,
  ministryId,
  serviceId,
} from "../../identity/id-generator.js";
import type { MinistrySeed } from "../../../types/index.js";
import type { MinistryPageFields } from "../../extractors/models/fields.js";

const HEALTH: MinistrySeed = {
  ministryId: ministryId("Ministry of Health"),
  name: "Ministry of Health",
  description: null,
  reportedAgencyCount: null,
  reportedServiceCount: null,
  url: "https://portal.example.test/en/ministries/health",
};

describe("AgencyDirectoryIndex", () => {
  let index: AgencyDirectoryIndex;

  beforeEach(() => {
    index = new AgencyDirectoryIndex();
  });

  it("should keep the first entry for a normalized name", async () => {
    expect(
      await index.register({ name: "Medical Board", description: "First", logoUrl: null, agencyUrl: null })
    ).toBe(true);
    expect(
      await index.register({ name: "MEDICAL  board!", description: "Second", logoUrl: null, agencyUrl: null })
    ).toBe(false);

    expect(index.size).toBe(1);
    expect((await index.lookup(agencyNameHash("medical board")))?.description).toBe("First");
  });

  it("should return null for unknown names", async () => {
    expect(await index.lookup(agencyNameHash("Nobody"))).toBeNull();
  });

  it("should report entries no placement joined to", async () => {
    await index.register({ name: "Joined", description: null, logoUrl: null, agencyUrl: null });
    await index.register({ name: "Orphan", description: null, logoUrl: null, agencyUrl: null });
    await index.lookup(agencyNameHash("Joined"));

    expect(index.unmatched().map((entry) => entry.name)).toEqual(["Orphan"]);
  });

  it("should handle concurrent registration of the same name once", async () => {
    const results = await Promise.all(
      Array.from({ length: 10 }, (_, i) =>
        index.register({ name: "Same Agency", description: `copy ${i}`, logoUrl: null, agencyUrl: null })
      )
    );

    expect(results.filter(Boolean)).toHaveLength(1);
    expect((await index.lookup(agencyNameHash("Same Agency")))?.description).toBe("copy 0");
  });
});

describe("resolvers", () => {
  it("should identify FAQs by question and answer", () => {
    expect(resolveFaqs([{ question: "Is it free?", answer: "Yes." }])).toEqual([
      { faqId: faqId("Is it free?", "Yes."), question: "Is it free?", answer: "Yes." },
    ]);
  });

  it("should seed ministries with unknown counts", () => {
    expect(resolveMinistryList([{ name: "Ministry of Health", url: HEALTH.url }])).toEqual([HEALTH]);
  });

  describe("resolveMinistryPage", () => {
    const fields: MinistryPageFields = {
      description: "Public health.",
      reportedAgencyCount: 2,
      reportedServiceCount: 50,
      departments: [
        {
          name: "Medical Services",
          url: `${HEALTH.url}?department=medical`,
          agencies: [
            { name: "Medical Board", servicesUrl: "https://portal.example.test/s/board" },
            { name: "Unlisted Clinic", servicesUrl: "https://portal.example.test/s/clinic" },
          ],
        },
      ],
    };

    it("should backfill directory metadata and keep unmatched placements", async () => {
      const index = new AgencyDirectoryIndex();
      await index.register({
        name: "Medical Board",
        description: "Licenses practitioners.",
        logoUrl: "https://portal.example.test/logo.png",
        agencyUrl: "https://board.example.test",
      });

      const result = await resolveMinistryPage(fields, HEALTH, index);
      const did = departmentId(HEALTH.ministryId, "Medical Services");

      expect(result.ministry).toEqual({
        ...HEALTH,
        description: "Public health.",
        reportedAgencyCount: 2,
        reportedServiceCount: 50,
      });
      expect(result.departments).toEqual([
        { departmentId: did, ministryId: HEALTH.ministryId, name: "Medical Services", url: `${HEALTH.url}?department=medical` },
      ]);
      expect(result.agencies).toEqual([
        {
          agencyId: agencyId(HEALTH.ministryId, did, "Medical Board"),
          agencyNameHash: agencyNameHash("Medical Board"),
          ministryId: HEALTH.ministryId,
          departmentId: did,
          name: "Medical Board",
          description: "Licenses practitioners.",
          logoUrl: "https://portal.example.test/logo.png",
          agencyUrl: "https://board.example.test",
          url: "https://portal.example.test/s/board",
        },
        {
          agencyId: agencyId(HEALTH.ministryId, did, "Unlisted Clinic"),
          agencyNameHash: agencyNameHash("Unlisted Clinic"),
          ministryId: HEALTH.ministryId,
          departmentId: did,
          name: "Unlisted Clinic",
          description: null,
          logoUrl: null,
          agencyUrl: null,
          url: "https://portal.example.test/s/clinic",
        },
      ]);
      expect(result.unmatchedAgencyIds).toEqual([agencyId(HEALTH.ministryId, did, "Unlisted Clinic")]);
    });
  });

  it("should scope services to their placement", async () => {
    const index = new AgencyDirectoryIndex();
    const { agencies } = await resolveMinistryPage(
      {
        description: null,
        reportedAgencyCount: null,
        reportedServiceCount: null,
        departments: [
          { name: "D", url: HEALTH.url, agencies: [{ name: "A", servicesUrl: "https://portal.example.test/a" }] },
        ],
      },
      HEALTH,
      index
    );
    const placement = agencies[0];
    expect(placement).toBeDefined();
    if (!placement) return;

    const services = resolveServices([{ name: "Apply", url: "https://elsewhere.example.test/apply" }], placement);

    expect(services).toEqual([
      {
        serviceId: serviceId(placement.ministryId, placement.departmentId, placement.agencyId, "Apply"),
        ministryId: placement.ministryId,
        departmentId: placement.departmentId,
        agencyId: placement.agencyId,
        name: "Apply",
        url: "https://elsewhere.example.test/apply",
        description: null,
        requirements: null,
      },
    ]);
  });
});
