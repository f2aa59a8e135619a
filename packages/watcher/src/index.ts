export type {
  ResolvedVersion,
  ResolutionStatus,
  Release,
  ReleaseIndex,
  Resolver,
  CachedResponse,
  ResponseCache,
} from "./types.js";

export { InMemoryResponseCache } from "./response-cache.js";
export {
  GitHubReleaseIndex,
  GITHUB_API,
  DEFAULT_MAX_PAGES,
} from "./adapters/index.js";
export type { GitHubReleaseIndexOptions } from "./adapters/index.js";
export { HttpStatusError, ResolutionError } from "./errors.js";
export {
  withRetry,
  isTransientError,
  RetriesExhaustedError,
  DEFAULT_BACKOFF_MS,
} from "./retry.js";
export type { RetryOptions } from "./retry.js";
export {
  ReleaseResolver,
  resolveAll,
  pickLatest,
  releaseTagPrefix,
  DEFAULT_CONCURRENCY,
} from "./resolve.js";
export type { ReleaseResolverOptions, ResolveAllOptions } from "./resolve.js";
export {
  isUpgrade,
  compareVersions,
  isNumericVersion,
  classifyBump,
} from "./versions.js";
export type { BumpType } from "./versions.js";
