/**
 * Artifact store keys, derived from hierarchy position
 *
 * @module
 */

import type { Identifier } from "../../types/index.js";

export const FAQ_KEY = "faq";
export const AGENCY_DIRECTORY_KEY = "agency-directory";
export const MINISTRY_LIST_KEY = "ministries";

export function ministryPageKey(ministryId: Identifier): string {
  return `${MINISTRY_LIST_KEY}/${ministryId}`;
}

export function agencyServicesKey(ministryId: Identifier, departmentId: Identifier, agencyId: Identifier): string {
  return `${MINISTRY_LIST_KEY}/${ministryId}/${departmentId}/${agencyId}/services`;
}
