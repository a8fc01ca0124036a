/**
 * Output serialization
 *
 * @module
 */

export type { IOutputWriter } from "./interfaces/IOutputWriter.js";
export { FileOutputWriter, toJson, type FileOutputWriterOptions } from "./file-output-writer.js";
export {
  toTables,
  toColumnName,
  MINISTRY_FIELDS,
  DEPARTMENT_FIELDS,
  AGENCY_FIELDS,
  SERVICE_FIELDS,
  FAQ_FIELDS,
  type CellValue,
  type Row,
  type Table,
} from "./columns.js";
export { toCsv, formatCell } from "./csv.js";
export { renderInsightsReport, type InsightsOptions } from "./insights.js";
