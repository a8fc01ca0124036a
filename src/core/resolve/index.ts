/**
 * Entity resolution and the agency join index
 *
 * @module
 */

export { AgencyDirectoryIndex, type DirectoryEntry } from "./agency-directory-index.js";
export {
  resolveFaqs,
  resolveMinistryList,
  resolveMinistryPage,
  resolveServices,
  type MinistryPageResolution,
} from "./resolvers.js";
