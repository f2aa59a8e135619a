export { GitHubReleaseIndex, GITHUB_API, DEFAULT_MAX_PAGES } from "./github.js";
export type { GitHubReleaseIndexOptions } from "./github.js";
