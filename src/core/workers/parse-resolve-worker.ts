/**
 * Parse & Resolve Worker
 *
 * Task executor run by the worker pool: extracts fields from one cached
 * artifact and resolves them into candidate records. Executors share
 * nothing but the agency directory index.
 *
 * @module
 */

import type { AgencySeed, DepartmentSeed, Faq, MinistrySeed, Service } from "../../types/index.js";
import type { Identifier } from "../identity/id-generator.js";
import { ExtractionError } from "../errors.js";
import type { ExtractorRegistry } from "../extractors/interfaces/IFieldExtractor.js";
import type { AgencyDirectoryIndex } from "../resolve/agency-directory-index.js";
import {
  resolveFaqs,
  resolveMinistryList,
  resolveMinistryPage,
  resolveServices,
} from "../resolve/resolvers.js";
import { InProcessWorkerPool, type TaskExecutor, type WorkerPoolConfig } from "./worker-pool.js";

// =============================================================================
// Task Types
// =============================================================================

interface ArtifactRef {
  key: string;
  url: string;
  html: string;
}

export type ParseTaskInput =
  | (ArtifactRef & { pageType: "faq" })
  | (ArtifactRef & { pageType: "agency-directory" })
  | (ArtifactRef & { pageType: "ministry-list" })
  | (ArtifactRef & { pageType: "ministry-page"; ministry: MinistrySeed })
  | (ArtifactRef & { pageType: "agency-services"; placement: AgencySeed });

export type ParseTaskOutput =
  | { pageType: "faq"; key: string; faqs: Faq[] }
  | { pageType: "agency-directory"; key: string; registered: number; duplicates: number }
  | { pageType: "ministry-list"; key: string; ministries: MinistrySeed[] }
  | {
      pageType: "ministry-page";
      key: string;
      ministry: MinistrySeed;
      departments: DepartmentSeed[];
      agencies: AgencySeed[];
      unmatchedAgencyIds: Identifier[];
    }
  | { pageType: "agency-services"; key: string; placement: AgencySeed; services: Service[] };

export interface ParseResolveDependencies {
  extractors: ExtractorRegistry;
  directory: AgencyDirectoryIndex;
}

// =============================================================================
// Executor
// =============================================================================

export function createParseResolveExecutor(
  deps: ParseResolveDependencies
): TaskExecutor<ParseTaskInput, ParseTaskOutput> {
  return async (input) => {
    try {
      return await parseAndResolve(input, deps);
    } catch (error) {
      if (error instanceof ExtractionError) {
        throw new ExtractionError(error.message, error.code, {
          ...error.context,
          key: input.key,
          pageType: input.pageType,
        });
      }
      throw error;
    }
  };
}

async function parseAndResolve(input: ParseTaskInput, deps: ParseResolveDependencies): Promise<ParseTaskOutput> {
  const { extractors, directory } = deps;

  switch (input.pageType) {
    case "faq": {
      const fields = extractors.faq.extract(input.html, input.url);
      return { pageType: "faq", key: input.key, faqs: resolveFaqs(fields) };
    }

    case "agency-directory": {
      const fields = extractors["agency-directory"].extract(input.html, input.url);
      let registered = 0;
      for (const entry of fields) {
        if (await directory.register(entry)) registered++;
      }
      return {
        pageType: "agency-directory",
        key: input.key,
        registered,
        duplicates: fields.length - registered,
      };
    }

    case "ministry-list": {
      const fields = extractors["ministry-list"].extract(input.html, input.url);
      return { pageType: "ministry-list", key: input.key, ministries: resolveMinistryList(fields) };
    }

    case "ministry-page": {
      const fields = extractors["ministry-page"].extract(input.html, input.url);
      const resolution = await resolveMinistryPage(fields, input.ministry, directory);
      return { pageType: "ministry-page", key: input.key, ...resolution };
    }

    case "agency-services": {
      const fields = extractors["agency-services"].extract(input.html, input.url);
      return {
        pageType: "agency-services",
        key: input.key,
        placement: input.placement,
        services: resolveServices(fields, input.placement),
      };
    }
  }
}

// =============================================================================
// Pool
// =============================================================================

export class ParseResolveWorkerPool extends InProcessWorkerPool<ParseTaskInput, ParseTaskOutput> {
  constructor(deps: ParseResolveDependencies, config?: Partial<WorkerPoolConfig>) {
    super(createParseResolveExecutor(deps), config);
  }
}
