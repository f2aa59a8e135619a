import semver from "semver";

// Release tags across upstream projects mix plain integers ("35"), dotted
// versions ("0.21.0") and free-form strings (commit hashes, date stamps).
// Numeric versions are ordered component-wise; anything else only compares
// for equality.

const NUMERIC_VERSION = /^v?\d+(\.\d+)*$/;

export type BumpType = "major" | "minor" | "patch";

export function isNumericVersion(version: string): boolean {
  return NUMERIC_VERSION.test(version);
}

// Segments are arbitrary-length digit runs; date-stamp tags overflow a double
function components(version: string): bigint[] {
  return version.replace(/^v/, "").split(".").map(BigInt);
}

/**
 * Order two numeric versions: -1 when `a < b`, 0 when equal, 1 when
 * `a > b`. Missing components count as 0, so "1.0" equals "1.0.0".
 * Returns undefined when either side is not numeric.
 */
export function compareVersions(a: string, b: string): number | undefined {
  if (!isNumericVersion(a) || !isNumericVersion(b)) return undefined;

  const left = components(a);
  const right = components(b);
  const length = Math.max(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const l = left[i] ?? 0n;
    const r = right[i] ?? 0n;
    if (l !== r) return l < r ? -1 : 1;
  }
  return 0;
}

/**
 * Whether `resolved` should replace `current`. Numeric versions must be
 * strictly greater; for any other format, any difference counts.
 */
export function isUpgrade(current: string, resolved: string): boolean {
  if (current === resolved) return false;
  const order = compareVersions(current, resolved);
  if (order === undefined) return true;
  return order < 0;
}

/** Semver bump between two valid semver versions, else undefined. */
export function classifyBump(from: string, to: string): BumpType | undefined {
  if (!semver.valid(from) || !semver.valid(to)) return undefined;
  const diff = semver.diff(from, to);
  if (!diff) return undefined;
  if (diff.startsWith("major") || diff === "premajor") return "major";
  if (diff.startsWith("minor") || diff === "preminor") return "minor";
  return "patch";
}
