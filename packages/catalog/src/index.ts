// @pinkeeper/catalog — tracked addon definitions

export type { Addon, AddonCatalog, CatalogIssue } from "./types.js";
export { VERSION_PLACEHOLDER } from "./types.js";
export { PinkeeperError, CatalogParseError } from "./errors.js";
export { AddonEntrySchema } from "./schema.js";
export type { AddonEntry } from "./schema.js";
export {
  buildCatalog,
  parseCatalog,
  loadCatalog,
  defaultVariable,
} from "./load.js";
