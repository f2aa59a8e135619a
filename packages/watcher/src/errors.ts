import { PinkeeperError } from "@pinkeeper/catalog";

/** Non-2xx response from the release index. */
export class HttpStatusError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(status: number, url: string) {
    super(`GitHub API returned ${status} for ${url}`);
    this.name = "HttpStatusError";
    this.status = status;
    this.url = url;
  }
}

/**
 * Upstream lookup failed for one addon. The run continues; the addon is
 * reported as unresolved and keeps its pinned version.
 */
export class ResolutionError extends PinkeeperError {
  readonly addonId: string;
  /** The message without the addon prefix */
  readonly reason: string;
  /** True when retries were exhausted on transient failures */
  readonly transient: boolean;

  constructor(
    addonId: string,
    message: string,
    options: { transient?: boolean; cause?: unknown } = {},
  ) {
    super("RESOLUTION", `${addonId}: ${message}`, { cause: options.cause });
    this.name = "ResolutionError";
    this.addonId = addonId;
    this.reason = message;
    this.transient = options.transient ?? false;
  }
}
