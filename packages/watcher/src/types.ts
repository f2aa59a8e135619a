import type { Addon } from "@pinkeeper/catalog";

// ---------------------------------------------------------------------------
// Resolution results
// ---------------------------------------------------------------------------

export type ResolutionStatus = "resolved" | "fallback";

export interface ResolvedVersion {
  id: string;
  /** Latest upstream version, or the pinned one when status is "fallback" */
  version: string;
  status: ResolutionStatus;
  /** Release tag the version came from (resolved only) */
  tag?: string | undefined;
  /** When that release was published, ISO 8601 (resolved only) */
  publishedAt?: string | undefined;
  /** Why resolution failed (fallback only) */
  error?: string | undefined;
}

// ---------------------------------------------------------------------------
// Release index — where published releases are listed
// ---------------------------------------------------------------------------

export interface Release {
  tagName: string;
  publishedAt: string;
  prerelease: boolean;
  draft: boolean;
}

export interface ReleaseIndex {
  /**
   * Releases of `repository` ("owner/name"), newest first. Given a tag
   * prefix such as "ascanrules-v", listing may stop once a release with
   * that prefix has been seen.
   */
  listReleases(repository: string, tagPrefix?: string): Promise<Release[]>;
}

export interface Resolver {
  resolve(addon: Addon): Promise<ResolvedVersion>;
}

// ---------------------------------------------------------------------------
// Conditional-request cache
// ---------------------------------------------------------------------------

export interface CachedResponse {
  etag: string;
  body: unknown;
}

export interface ResponseCache {
  get(key: string): CachedResponse | undefined;
  set(key: string, value: CachedResponse): void;
}
