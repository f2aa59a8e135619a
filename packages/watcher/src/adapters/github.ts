import type { Release, ReleaseIndex, ResponseCache } from "../types.js";
import { HttpStatusError } from "../errors.js";
import { withRetry } from "../retry.js";
import type { RetryOptions } from "../retry.js";
import { InMemoryResponseCache } from "../response-cache.js";

export const GITHUB_API = "https://api.github.com";
export const DEFAULT_MAX_PAGES = 50;

export interface GitHubReleaseIndexOptions {
  token?: string | undefined;
  cache?: ResponseCache | undefined;
  /** Default: https://api.github.com */
  apiUrl?: string | undefined;
  /** Per-attempt timeout in milliseconds (default: 10_000) */
  timeoutMs?: number | undefined;
  /** Default: 100, the API maximum */
  perPage?: number | undefined;
  /** Upper bound on pages fetched per repository (default: 50) */
  maxPages?: number | undefined;
  retry?: RetryOptions | undefined;
}

interface GitHubReleaseResponse {
  tag_name: string;
  published_at: string | null;
  prerelease: boolean;
  draft: boolean;
}

function isReleaseResponse(value: unknown): value is GitHubReleaseResponse {
  if (typeof value !== "object" || value === null) return false;
  const tag = "tag_name" in value ? value.tag_name : undefined;
  return typeof tag === "string";
}

function parseRelease(data: GitHubReleaseResponse): Release {
  return {
    tagName: data.tag_name,
    publishedAt: data.published_at ?? "",
    prerelease: data.prerelease === true,
    draft: data.draft === true,
  };
}

/**
 * Release listing over the GitHub REST API. Pages are remembered for the
 * lifetime of the index, so addons that share a repository fetch each page
 * once per run.
 */
export class GitHubReleaseIndex implements ReleaseIndex {
  private readonly pages = new Map<string, Promise<unknown[]>>();
  private readonly token: string | undefined;
  private readonly cache: ResponseCache;
  private readonly apiUrl: string;
  private readonly timeoutMs: number;
  private readonly perPage: number;
  private readonly maxPages: number;
  private readonly retry: RetryOptions;

  constructor(options: GitHubReleaseIndexOptions = {}) {
    this.token = options.token;
    this.cache = options.cache ?? new InMemoryResponseCache();
    this.apiUrl = (options.apiUrl ?? GITHUB_API).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.perPage = options.perPage ?? 100;
    this.maxPages = Math.max(1, options.maxPages ?? DEFAULT_MAX_PAGES);
    this.retry = options.retry ?? {};
  }

  private authHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: "application/vnd.github+json",
      "X-GitHub-Api-Version": "2022-11-28",
    };
    if (this.token) {
      headers["Authorization"] = `Bearer ${this.token}`;
    }
    return headers;
  }

  async listReleases(repository: string, tagPrefix?: string): Promise<Release[]> {
    const releases: Release[] = [];

    for (let page = 1; page <= this.maxPages; page += 1) {
      const url = `${this.apiUrl}/repos/${repository}/releases?per_page=${this.perPage}&page=${page}`;
      const body = await this.page(url);
      const items = body.filter(isReleaseResponse).map(parseRelease);
      releases.push(...items);

      if (body.length < this.perPage) break;
      // Newest first: stop at the page holding the stream's most recent release
      if (tagPrefix !== undefined && items.some((r) => r.tagName.startsWith(tagPrefix))) {
        break;
      }
    }

    return releases;
  }

  private page(url: string): Promise<unknown[]> {
    let pending = this.pages.get(url);
    if (!pending) {
      pending = this.fetchPage(url);
      this.pages.set(url, pending);
    }
    return pending;
  }

  private async fetchPage(url: string): Promise<unknown[]> {
    const body = await withRetry(() => this.getJson(url), this.retry);
    if (!Array.isArray(body)) {
      throw new Error(`Unexpected response shape from ${url}`);
    }
    return body;
  }

  private async getJson(url: string): Promise<unknown> {
    const headers = this.authHeaders();
    const cached = this.cache.get(url);
    if (cached) {
      headers["If-None-Match"] = cached.etag;
    }

    const response = await fetch(url, {
      headers,
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (response.status === 304 && cached) {
      return cached.body;
    }

    if (!response.ok) {
      throw new HttpStatusError(response.status, url);
    }

    const body: unknown = await response.json();
    const etag = response.headers.get("etag");
    if (etag) {
      this.cache.set(url, { etag, body });
    }
    return body;
  }
}
