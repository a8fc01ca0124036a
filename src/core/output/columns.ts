/**
 * Tabular layout of each entity collection
 *
 * Field order is the column order of every output format. Column names are
 * the snake_case form of the record fields.
 *
 * @module
 */

import type { Agency, Department, EntityGraph, EntityType, Faq, Ministry, Service } from "../../types/index.js";
import { ENTITY_COLLECTIONS } from "../../types/index.js";

export type CellValue = string | number | null;

export type Row = Record<string, CellValue>;

export const MINISTRY_FIELDS = [
  "ministryId",
  "name",
  "description",
  "reportedAgencyCount",
  "reportedServiceCount",
  "observedDepartmentCount",
  "observedAgencyCount",
  "observedServiceCount",
  "url",
] as const satisfies readonly (keyof Ministry)[];

export const DEPARTMENT_FIELDS = [
  "departmentId",
  "ministryId",
  "name",
  "observedAgencyCount",
  "observedServiceCount",
  "url",
] as const satisfies readonly (keyof Department)[];

export const AGENCY_FIELDS = [
  "agencyId",
  "agencyNameHash",
  "ministryId",
  "departmentId",
  "name",
  "description",
  "logoUrl",
  "agencyUrl",
  "observedServiceCount",
  "url",
] as const satisfies readonly (keyof Agency)[];

export const SERVICE_FIELDS = [
  "serviceId",
  "ministryId",
  "departmentId",
  "agencyId",
  "name",
  "url",
  "description",
  "requirements",
] as const satisfies readonly (keyof Service)[];

export const FAQ_FIELDS = ["faqId", "question", "answer"] as const satisfies readonly (keyof Faq)[];

export function toColumnName(field: string): string {
  return field.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

function toRow<K extends string>(record: Record<K, CellValue>, fields: readonly K[]): Row {
  const row: Row = {};
  for (const field of fields) {
    row[toColumnName(field)] = record[field];
  }
  return row;
}

export interface Table {
  /** File stem, e.g. "ministries" */
  name: string;
  columns: string[];
  rows: Row[];
}

function table<K extends string>(entityType: EntityType, fields: readonly K[], records: Record<K, CellValue>[]): Table {
  return {
    name: ENTITY_COLLECTIONS[entityType],
    columns: fields.map(toColumnName),
    rows: records.map((record) => toRow(record, fields)),
  };
}

/**
 * One table per entity collection, in a fixed order.
 */
export function toTables(graph: EntityGraph): Table[] {
  return [
    table("ministry", MINISTRY_FIELDS, graph.ministries),
    table("department", DEPARTMENT_FIELDS, graph.departments),
    table("agency", AGENCY_FIELDS, graph.agencies),
    table("service", SERVICE_FIELDS, graph.services),
    table("faq", FAQ_FIELDS, graph.faqs),
  ];
}
