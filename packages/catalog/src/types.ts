// ---------------------------------------------------------------------------
// Addon — one third-party plugin pinned in the generated build block
// ---------------------------------------------------------------------------

export interface Addon {
  /** Unique key, e.g. "ascanrules" */
  id: string;
  /** Release repository on the release host, "owner/name" */
  repository: string;
  /** Release tags look like `<tagPrefix>-v<version>` */
  tagPrefix: string;
  /** Artifact filename template with a `{version}` placeholder */
  filename: string;
  /** Pinned version recorded in the catalog */
  version: string;
  /** Build variable holding the version, e.g. "ASCANRULES_VERSION" */
  variable: string;
  /** Release channel label ("release", "beta", "alpha"); informational */
  channel?: string | undefined;
}

export interface AddonCatalog {
  /** Addons in declaration order */
  addons: Addon[];
  byId: Map<string, Addon>;
  /** Where the catalog was read from, used in error messages */
  source: string;
}

export const VERSION_PLACEHOLDER = "{version}" as const;

export interface CatalogIssue {
  /** Entry index in the addon list, undefined for document-level issues */
  index?: number | undefined;
  /** Dotted field path inside the entry, e.g. "tagPrefix" */
  path: string;
  message: string;
}
