import { readFile } from "node:fs/promises";
import * as yaml from "js-yaml";
import { CatalogParseError } from "./errors.js";
import { AddonEntrySchema, CatalogDocumentSchema } from "./schema.js";
import type { AddonEntry } from "./schema.js";
import type { Addon, AddonCatalog, CatalogIssue } from "./types.js";

/**
 * Build variable name for an addon id: upper-cased, non-alphanumeric runs
 * collapsed to "_", suffixed with "_VERSION".
 *
 * @example defaultVariable("ascanrulesBeta") // "ASCANRULESBETA_VERSION"
 */
export function defaultVariable(id: string): string {
  const stem = id
    .toUpperCase()
    .replace(/[^A-Z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return `${stem}_VERSION`;
}

function toAddon(entry: AddonEntry): Addon {
  return {
    id: entry.id,
    repository: entry.repository,
    tagPrefix: entry.tagPrefix,
    filename: entry.filename,
    version: entry.version,
    variable: entry.variable ?? defaultVariable(entry.id),
    channel: entry.channel,
  };
}

// Addons that share a build variable must describe the same release stream,
// otherwise one declaration could not hold both versions.
function checkSharedVariables(addons: Addon[], issues: CatalogIssue[]): void {
  const firstByVariable = new Map<string, { addon: Addon; index: number }>();
  addons.forEach((addon, index) => {
    const first = firstByVariable.get(addon.variable);
    if (!first) {
      firstByVariable.set(addon.variable, { addon, index });
      return;
    }
    for (const field of ["repository", "tagPrefix", "version"] as const) {
      if (first.addon[field] !== addon[field]) {
        issues.push({
          index,
          path: field,
          message: `shares variable ${addon.variable} with "${first.addon.id}" but ${field} differs (${addon[field]} vs ${first.addon[field]})`,
        });
      }
    }
  });
}

/**
 * Validate an already-parsed catalog document. Accepts either
 * `{ addons: [...] }` or a bare list.
 */
export function buildCatalog(document: unknown, source: string): AddonCatalog {
  const doc = CatalogDocumentSchema.safeParse(document);
  if (!doc.success) {
    throw new CatalogParseError(source, [
      {
        path: "",
        message: 'expected a list of addons or an object with an "addons" list',
      },
    ]);
  }

  const entries = Array.isArray(doc.data) ? doc.data : doc.data.addons;
  if (entries.length === 0) {
    throw new CatalogParseError(source, [
      { path: "addons", message: "must list at least one addon" },
    ]);
  }

  const issues: CatalogIssue[] = [];
  const addons: Addon[] = [];
  const byId = new Map<string, Addon>();

  entries.forEach((raw, index) => {
    const parsed = AddonEntrySchema.safeParse(raw);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        issues.push({
          index,
          path: issue.path.join("."),
          message: issue.message,
        });
      }
      return;
    }

    const addon = toAddon(parsed.data);
    if (byId.has(addon.id)) {
      issues.push({
        index,
        path: "id",
        message: `duplicate addon id "${addon.id}"`,
      });
      return;
    }
    byId.set(addon.id, addon);
    addons.push(addon);
  });

  checkSharedVariables(addons, issues);

  if (issues.length > 0) {
    throw new CatalogParseError(source, issues);
  }

  return { addons, byId, source };
}

/** Parse addon definitions from YAML text. */
export function parseCatalog(text: string, source = "<inline>"): AddonCatalog {
  let document: unknown;
  try {
    document = yaml.load(text, {
      schema: yaml.FAILSAFE_SCHEMA,
      filename: source,
    });
  } catch (err) {
    throw new CatalogParseError(source, [
      {
        path: "",
        message: err instanceof Error ? err.message : String(err),
      },
    ]);
  }

  if (document == null) {
    throw new CatalogParseError(source, [
      { path: "", message: "catalog is empty" },
    ]);
  }

  return buildCatalog(document, source);
}

/** Read and parse an addon-definitions file. */
export async function loadCatalog(path: string): Promise<AddonCatalog> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    throw new CatalogParseError(path, [
      {
        path: "",
        message: `cannot read file: ${err instanceof Error ? err.message : String(err)}`,
      },
    ]);
  }
  return parseCatalog(text, path);
}
