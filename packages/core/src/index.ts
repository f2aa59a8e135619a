// @pinkeeper/core — reconciliation engine and generated-block rewriting

export {
  renderBlock,
  parseDeclarations,
  downloadUrl,
  cleanupGlob,
  DEFAULT_MARKERS,
  DEFAULT_RELEASE_HOST,
} from "./block.js";
export type { Markers, RenderOptions, LineEnding } from "./block.js";

export {
  locateBlock,
  insertionPoint,
  insertBlock,
  spliceBlock,
  joinSplice,
  detectLineEnding,
} from "./splice.js";
export type { FileSplice } from "./splice.js";

export { reconcile, reconcileFile } from "./reconcile.js";
export type {
  RunState,
  RunMode,
  Publisher,
  ReconcileOptions,
  ReconcileInput,
  ReconcileResult,
  ReconcileFileOptions,
  ReconcileFileResult,
} from "./reconcile.js";

export { formatChangeSummary, summaryTitle, countOutcomes } from "./summary.js";
export type {
  ChangeSummary,
  AddonOutcome,
  AddonOutcomeKind,
  TerminalState,
} from "./summary.js";

export { loadConfig, parseConfig, CONFIG_FILENAME } from "./config.js";
export type { PinkeeperConfig, ChannelConfig, RoutingRuleConfig } from "./config.js";

export { createConsoleLogger, silentLogger } from "./logger.js";
export type { Logger, ConsoleLoggerOptions } from "./logger.js";

export { readBuildFile, writeFileAtomic } from "./build-file.js";

export {
  MarkerNotFoundError,
  MarkerMismatchError,
  AnchorNotFoundError,
  RenderDeterminismViolation,
  ConfigError,
  PublishError,
} from "./errors.js";
export type { PublishFailure } from "./errors.js";
