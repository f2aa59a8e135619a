import type { CatalogIssue } from "./types.js";

/**
 * Base class for every error pinkeeper raises on purpose. `code` is stable
 * and used by the CLI to choose an exit status.
 */
export class PinkeeperError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PinkeeperError";
    this.code = code;
  }
}

function formatIssue(issue: CatalogIssue): string {
  const where =
    issue.index === undefined
      ? issue.path
      : `addons[${issue.index}]${issue.path ? `.${issue.path}` : ""}`;
  return where ? `${where}: ${issue.message}` : issue.message;
}

/** Malformed addon definitions. Raised before any network call. */
export class CatalogParseError extends PinkeeperError {
  readonly issues: CatalogIssue[];
  readonly source: string;

  constructor(source: string, issues: CatalogIssue[]) {
    const shown = issues.slice(0, 5).map(formatIssue).join("; ");
    const suffix =
      issues.length > 5 ? ` (and ${issues.length - 5} more)` : "";
    super("CATALOG_PARSE", `Invalid addon catalog ${source}: ${shown}${suffix}`);
    this.name = "CatalogParseError";
    this.issues = issues;
    this.source = source;
  }
}
