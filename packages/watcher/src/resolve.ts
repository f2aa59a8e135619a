import type { Addon } from "@pinkeeper/catalog";
import type { Release, ReleaseIndex, ResolvedVersion, Resolver } from "./types.js";
import { HttpStatusError, ResolutionError } from "./errors.js";
import { RetriesExhaustedError } from "./retry.js";
import { compareVersions, isNumericVersion } from "./versions.js";

export const DEFAULT_CONCURRENCY = 4;

export interface ReleaseResolverOptions {
  /** Consider releases flagged as prerelease (default: false) */
  includePrereleases?: boolean | undefined;
}

interface Candidate {
  version: string;
  release: Release;
}

function publishedTime(release: Release): number {
  const time = Date.parse(release.publishedAt);
  return Number.isNaN(time) ? Number.NEGATIVE_INFINITY : time;
}

/** Tag prefix of a release stream: "ascanrules" tags "ascanrules-v36". */
export function releaseTagPrefix(tagPrefix: string): string {
  return `${tagPrefix}-v`;
}

/**
 * Pick the latest release tagged `<tagPrefix>-v<version>`. Numeric versions
 * are ordered by value; when any candidate is not numeric the most recently
 * published one wins.
 */
export function pickLatest(
  addonId: string,
  releases: Release[],
  tagPrefix: string,
  includePrereleases = false,
): Candidate {
  const prefix = releaseTagPrefix(tagPrefix);
  const matching = releases.filter(
    (r) =>
      !r.draft &&
      (includePrereleases || !r.prerelease) &&
      r.tagName.startsWith(prefix),
  );
  if (matching.length === 0) {
    throw new ResolutionError(
      addonId,
      `no releases tagged "${prefix}<version>" among ${releases.length} release(s)`,
    );
  }

  const candidates: Candidate[] = matching
    .map((release) => ({ version: release.tagName.slice(prefix.length), release }))
    .filter((c) => c.version !== "" && !/[\s/]/.test(c.version));
  const [first, ...rest] = candidates;
  if (!first) {
    throw new ResolutionError(
      addonId,
      `no well-formed versions among ${matching.length} release(s) tagged "${prefix}"`,
    );
  }

  let best = first;
  const allNumeric = candidates.every((c) => isNumericVersion(c.version));
  for (const candidate of rest) {
    const newer = allNumeric
      ? (compareVersions(candidate.version, best.version) ?? 0) > 0
      : publishedTime(candidate.release) > publishedTime(best.release);
    if (newer) best = candidate;
  }
  return best;
}

function describeFailure(err: unknown): string {
  if (err instanceof HttpStatusError && err.status === 404) {
    return "repository not found or has no releases (404)";
  }
  return err instanceof Error ? err.message : String(err);
}

export class ReleaseResolver implements Resolver {
  private readonly includePrereleases: boolean;

  constructor(
    private readonly index: ReleaseIndex,
    options: ReleaseResolverOptions = {},
  ) {
    this.includePrereleases = options.includePrereleases ?? false;
  }

  /** Latest upstream version of `addon`; throws {@link ResolutionError}. */
  async resolve(addon: Addon): Promise<ResolvedVersion> {
    let releases: Release[];
    try {
      releases = await this.index.listReleases(
        addon.repository,
        releaseTagPrefix(addon.tagPrefix),
      );
    } catch (err) {
      throw new ResolutionError(addon.id, describeFailure(err), {
        transient: err instanceof RetriesExhaustedError,
        cause: err,
      });
    }

    const latest = pickLatest(
      addon.id,
      releases,
      addon.tagPrefix,
      this.includePrereleases,
    );
    return {
      id: addon.id,
      version: latest.version,
      status: "resolved",
      tag: latest.release.tagName,
      publishedAt: latest.release.publishedAt || undefined,
    };
  }
}

// ---------------------------------------------------------------------------
// Concurrency limiter
// ---------------------------------------------------------------------------

async function pLimit<T>(
  tasks: (() => Promise<T>)[],
  concurrency: number,
): Promise<T[]> {
  const results: T[] = new Array(tasks.length);
  let nextIndex = 0;

  async function worker(): Promise<void> {
    while (nextIndex < tasks.length) {
      const index = nextIndex++;
      const task = tasks[index];
      if (task) results[index] = await task();
    }
  }

  const workers = Array.from(
    { length: Math.max(1, Math.min(concurrency, tasks.length)) },
    () => worker(),
  );
  await Promise.all(workers);
  return results;
}

// ---------------------------------------------------------------------------
// resolveAll — one lookup per release stream, results in catalog order
// ---------------------------------------------------------------------------

export interface ResolveAllOptions {
  /** Default: 4 */
  concurrency?: number | undefined;
  /** Called as each release stream settles */
  onResult?: ((result: ResolvedVersion) => void) | undefined;
}

type StreamOutcome =
  | {
      ok: true;
      version: string;
      tag: string | undefined;
      publishedAt: string | undefined;
    }
  | { ok: false; error: string };

function streamKey(addon: Addon): string {
  return `${addon.repository}#${addon.tagPrefix}`;
}

/**
 * Resolve every addon. Never rejects because of a single addon: failures come
 * back as `fallback` results carrying the pinned version and the reason.
 */
export async function resolveAll(
  addons: Addon[],
  resolver: Resolver,
  options: ResolveAllOptions = {},
): Promise<ResolvedVersion[]> {
  const streams = new Map<string, Addon>();
  for (const addon of addons) {
    const key = streamKey(addon);
    if (!streams.has(key)) streams.set(key, addon);
  }

  const keys = [...streams.keys()];
  const tasks = keys.map((key) => async (): Promise<StreamOutcome> => {
    const representative = streams.get(key);
    if (!representative) return { ok: false, error: `unknown stream ${key}` };
    try {
      const resolved = await resolver.resolve(representative);
      options.onResult?.(resolved);
      return {
        ok: true,
        version: resolved.version,
        tag: resolved.tag,
        publishedAt: resolved.publishedAt,
      };
    } catch (err) {
      const error =
        err instanceof ResolutionError
          ? err.reason
          : err instanceof Error
            ? err.message
            : String(err);
      options.onResult?.({
        id: representative.id,
        version: representative.version,
        status: "fallback",
        error,
      });
      return { ok: false, error };
    }
  });

  const outcomes = await pLimit(
    tasks,
    options.concurrency ?? DEFAULT_CONCURRENCY,
  );
  const byKey = new Map<string, StreamOutcome>();
  keys.forEach((key, i) => {
    const outcome = outcomes[i];
    if (outcome) byKey.set(key, outcome);
  });

  return addons.map((addon): ResolvedVersion => {
    const outcome = byKey.get(streamKey(addon));
    if (outcome?.ok) {
      return {
        id: addon.id,
        version: outcome.version,
        status: "resolved",
        tag: outcome.tag,
        publishedAt: outcome.publishedAt,
      };
    }
    return {
      id: addon.id,
      version: addon.version,
      status: "fallback",
      error: outcome?.error ?? "not resolved",
    };
  });
}
