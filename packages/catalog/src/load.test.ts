import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  buildCatalog,
  defaultVariable,
  loadCatalog,
  parseCatalog,
} from "./load.js";
import { CatalogParseError, PinkeeperError } from "./errors.js";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const CATALOG_YAML = `
addons:
  - id: ascanrules
    repository: example-org/scanner-extensions
    tagPrefix: ascanrules
    filename: ascanrules-release-{version}.zap
    version: 35
    channel: release
  - id: retire
    repository: example-org/scanner-extensions
    tagPrefix: retire
    filename: retire-release-{version}.zap
    version: 0.21.0
`;

function entry(overrides: Record<string, unknown> = {}) {
  return {
    id: "pscanrules",
    repository: "example-org/scanner-extensions",
    tagPrefix: "pscanrules",
    filename: "pscanrules-release-{version}.zap",
    version: "47",
    ...overrides,
  };
}

function issuesOf(fn: () => unknown): CatalogParseError {
  try {
    fn();
  } catch (err) {
    if (err instanceof CatalogParseError) return err;
    throw err;
  }
  throw new Error("expected CatalogParseError");
}

// ---------------------------------------------------------------------------
// defaultVariable
// ---------------------------------------------------------------------------

describe("defaultVariable", () => {
  it("upper-cases the id and appends _VERSION", () => {
    expect(defaultVariable("ascanrulesBeta")).toBe("ASCANRULESBETA_VERSION");
  });

  it("collapses separators into single underscores", () => {
    expect(defaultVariable("alert-filters.v2")).toBe("ALERT_FILTERS_V2_VERSION");
  });

  it("trims leading and trailing separators", () => {
    expect(defaultVariable("-network-")).toBe("NETWORK_VERSION");
  });
});

// ---------------------------------------------------------------------------
// parseCatalog
// ---------------------------------------------------------------------------

describe("parseCatalog", () => {
  it("parses addons in declaration order", () => {
    const catalog = parseCatalog(CATALOG_YAML, "addons.yml");

    expect(catalog.source).toBe("addons.yml");
    expect(catalog.addons.map((a) => a.id)).toEqual(["ascanrules", "retire"]);
    expect(catalog.addons[0]).toEqual({
      id: "ascanrules",
      repository: "example-org/scanner-extensions",
      tagPrefix: "ascanrules",
      filename: "ascanrules-release-{version}.zap",
      version: "35",
      variable: "ASCANRULES_VERSION",
      channel: "release",
    });
    expect(catalog.byId.get("retire")?.version).toBe("0.21.0");
  });

  it("keeps numeric-looking versions as written", () => {
    const catalog = parseCatalog(
      "- id: a\n  repository: o/r\n  tagPrefix: a\n  filename: a-{version}.zap\n  version: 1.10\n",
    );
    expect(catalog.addons[0]?.version).toBe("1.10");
  });

  it("accepts a bare list", () => {
    const catalog = parseCatalog(
      "- id: a\n  repository: o/r\n  tagPrefix: a\n  filename: a-{version}.zap\n  version: '3'\n",
    );
    expect(catalog.addons).toHaveLength(1);
  });

  it("uses an explicit variable when given", () => {
    const catalog = buildCatalog(
      [entry({ variable: "PSCAN_VERSION" })],
      "inline",
    );
    expect(catalog.addons[0]?.variable).toBe("PSCAN_VERSION");
  });

  it("rejects empty documents", () => {
    const err = issuesOf(() => parseCatalog("", "empty.yml"));
    expect(err.message).toBe("Invalid addon catalog empty.yml: catalog is empty");
  });

  it("rejects malformed YAML", () => {
    const err = issuesOf(() => parseCatalog("addons: [", "broken.yml"));
    expect(err.issues).toHaveLength(1);
    expect(err.source).toBe("broken.yml");
  });

  it("rejects an empty addon list", () => {
    const err = issuesOf(() => buildCatalog({ addons: [] }, "inline"));
    expect(err.issues).toEqual([
      { path: "addons", message: "must list at least one addon" },
    ]);
  });

  it("reports missing required fields with the entry index", () => {
    const { version: _version, ...withoutVersion } = entry();
    const err = issuesOf(() =>
      buildCatalog([entry({ id: "ok" }), withoutVersion], "inline"),
    );
    expect(err.issues).toEqual([
      { index: 1, path: "version", message: "Required" },
    ]);
    expect(err.code).toBe("CATALOG_PARSE");
    expect(err).toBeInstanceOf(PinkeeperError);
  });

  it("rejects duplicated ids", () => {
    const err = issuesOf(() => buildCatalog([entry(), entry()], "inline"));
    expect(err.issues).toEqual([
      { index: 1, path: "id", message: 'duplicate addon id "pscanrules"' },
    ]);
  });

  it("rejects filenames without the version placeholder", () => {
    const err = issuesOf(() =>
      buildCatalog([entry({ filename: "pscanrules.zap" })], "inline"),
    );
    expect(err.issues[0]?.path).toBe("filename");
    expect(err.issues[0]?.message).toBe(
      "must contain the {version} placeholder",
    );
  });

  it("rejects unknown keys", () => {
    const err = issuesOf(() =>
      buildCatalog([entry({ status: "release" })], "inline"),
    );
    expect(err.issues[0]?.index).toBe(0);
    expect(err.issues[0]?.message).toContain("status");
  });

  it("allows addons sharing a variable on the same release stream", () => {
    const catalog = buildCatalog(
      [
        entry({ id: "network", variable: "NETWORK_VERSION" }),
        entry({ id: "network-dependency", variable: "NETWORK_VERSION" }),
      ],
      "inline",
    );
    expect(catalog.addons).toHaveLength(2);
  });

  it("rejects addons sharing a variable with different versions", () => {
    const err = issuesOf(() =>
      buildCatalog(
        [
          entry({ id: "network", variable: "NETWORK_VERSION" }),
          entry({
            id: "network-dependency",
            variable: "NETWORK_VERSION",
            version: "48",
          }),
        ],
        "inline",
      ),
    );
    expect(err.issues).toEqual([
      {
        index: 1,
        path: "version",
        message:
          'shares variable NETWORK_VERSION with "network" but version differs (48 vs 47)',
      },
    ]);
  });
});

// ---------------------------------------------------------------------------
// loadCatalog
// ---------------------------------------------------------------------------

describe("loadCatalog", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "pinkeeper-catalog-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads a catalog file", async () => {
    const path = join(dir, "addons.yml");
    await writeFile(path, CATALOG_YAML, "utf-8");

    const catalog = await loadCatalog(path);
    expect(catalog.source).toBe(path);
    expect(catalog.addons).toHaveLength(2);
  });

  it("wraps unreadable files in CatalogParseError", async () => {
    await expect(loadCatalog(join(dir, "missing.yml"))).rejects.toBeInstanceOf(
      CatalogParseError,
    );
  });
});
