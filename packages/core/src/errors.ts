import { PinkeeperError } from "@pinkeeper/catalog";

/** The file has no generated block yet; callers insert one instead. */
export class MarkerNotFoundError extends PinkeeperError {
  constructor(readonly marker: string) {
    super("MARKER_NOT_FOUND", `Start marker "${marker}" not found`);
    this.name = "MarkerNotFoundError";
  }
}

/**
 * Start and end markers do not bound exactly one region. Never recovered:
 * guessing the region could overwrite unrelated content.
 */
export class MarkerMismatchError extends PinkeeperError {
  constructor(
    message: string,
    /** 1-based line of the offending marker */
    readonly line: number,
  ) {
    super("MARKER_MISMATCH", `${message} (line ${line})`);
    this.name = "MarkerMismatchError";
  }
}

export class AnchorNotFoundError extends PinkeeperError {
  constructor(readonly anchor: string) {
    super(
      "ANCHOR_NOT_FOUND",
      `No generated block and anchor line "${anchor}" not found`,
    );
    this.name = "AnchorNotFoundError";
  }
}

/** Rendering the same input twice produced different text. A defect. */
export class RenderDeterminismViolation extends PinkeeperError {
  constructor(readonly first: string, readonly second: string) {
    super(
      "RENDER_NONDETERMINISTIC",
      "Rendering the same versions twice produced different blocks",
    );
    this.name = "RenderDeterminismViolation";
  }
}

export class ConfigError extends PinkeeperError {
  constructor(readonly source: string, message: string) {
    super("CONFIG", `Invalid ${source}: ${message}`);
    this.name = "ConfigError";
  }
}

export interface PublishFailure {
  channelId: string;
  error: string;
}

/** At least one publish channel rejected the summary. */
export class PublishError extends PinkeeperError {
  constructor(readonly failures: PublishFailure[]) {
    super(
      "PUBLISH",
      `Publishing failed for ${failures
        .map((f) => `${f.channelId} (${f.error})`)
        .join(", ")}`,
    );
    this.name = "PublishError";
  }
}
