import type { Addon } from "@pinkeeper/catalog";
import { classifyBump, isUpgrade, resolveAll } from "@pinkeeper/watcher";
import type { ResolvedVersion, Resolver } from "@pinkeeper/watcher";
import { DEFAULT_MARKERS, parseDeclarations, renderBlock } from "./block.js";
import type { Markers, RenderOptions } from "./block.js";
import { readBuildFile, writeFileAtomic } from "./build-file.js";
import { MarkerNotFoundError, RenderDeterminismViolation } from "./errors.js";
import { silentLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import {
  detectLineEnding,
  insertionPoint,
  joinSplice,
  locateBlock,
  spliceBlock,
} from "./splice.js";
import type { FileSplice } from "./splice.js";
import { summaryTitle } from "./summary.js";
import type { AddonOutcome, ChangeSummary, TerminalState } from "./summary.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type RunState =
  | "LOADED"
  | "RESOLVING"
  | "COMPARING"
  | "RENDERING"
  | "SPLICED"
  | TerminalState;

/** Receives the summary of a run that changed the file. */
export interface Publisher {
  publish(summary: ChangeSummary): Promise<void>;
}

export interface ReconcileOptions {
  addons: Addon[];
  resolver: Resolver;
  markers?: Markers | undefined;
  /** Line after which a missing block is inserted; end of file when unset */
  anchor?: string | undefined;
  releaseHost?: string | undefined;
  workdir?: string | undefined;
  /** Concurrent release lookups (default: 4) */
  concurrency?: number | undefined;
  logger?: Logger | undefined;
  onStateChange?: ((state: RunState) => void) | undefined;
  onResolved?: ((result: ResolvedVersion) => void) | undefined;
}

export interface ReconcileInput extends ReconcileOptions {
  /** Current text of the build-definition file */
  text: string;
}

export interface ReconcileResult {
  state: TerminalState;
  summary: ChangeSummary;
  /** New file text; equals the input when nothing changed */
  text: string;
  changed: boolean;
  inserted: boolean;
}

// ---------------------------------------------------------------------------
// reconcile() — pure with respect to the file system
// ---------------------------------------------------------------------------

function compare(
  addon: Addon,
  pinned: string,
  resolved: ResolvedVersion,
  logger: Logger,
): AddonOutcome {
  const base = { id: addon.id, variable: addon.variable, from: pinned };

  if (resolved.status === "fallback") {
    return { ...base, outcome: "unresolved", to: pinned, error: resolved.error };
  }
  if (isUpgrade(pinned, resolved.version)) {
    return {
      ...base,
      outcome: "upgraded",
      to: resolved.version,
      bump: classifyBump(pinned, resolved.version),
      tag: resolved.tag,
      publishedAt: resolved.publishedAt,
    };
  }
  if (resolved.version !== pinned) {
    logger.warn(
      `${addon.id}: upstream ${resolved.version} is not newer than pinned ${pinned}, keeping ${pinned}`,
    );
  }
  return { ...base, outcome: "unchanged", to: pinned };
}

export async function reconcile(input: ReconcileInput): Promise<ReconcileResult> {
  const logger = input.logger ?? silentLogger;
  const markers = input.markers ?? DEFAULT_MARKERS;
  const transition = (state: RunState): void => {
    logger.debug(`state ${state}`);
    input.onStateChange?.(state);
  };

  transition("LOADED");
  const eol = detectLineEnding(input.text);

  // Locate (or plan the insertion of) the block before any network call so
  // marker and anchor errors leave the file untouched.
  let splice: FileSplice;
  let inserted = false;
  try {
    splice = locateBlock(input.text, markers);
  } catch (err) {
    if (!(err instanceof MarkerNotFoundError)) throw err;
    splice = insertionPoint(input.text, input.anchor, eol);
    inserted = true;
    logger.info(
      input.anchor === undefined
        ? "no generated block found, appending one"
        : `no generated block found, inserting after "${input.anchor}"`,
    );
  }

  const declared = parseDeclarations(splice.block);
  const pinned = input.addons.map(
    (addon) => declared.get(addon.variable) ?? addon.version,
  );

  transition("RESOLVING");
  const resolved = await resolveAll(input.addons, input.resolver, {
    concurrency: input.concurrency,
    onResult: (result) => {
      if (result.status === "resolved") {
        logger.debug(`resolved ${result.id} ${result.version}`);
      } else {
        logger.warn(`could not resolve ${result.id}: ${result.error ?? "unknown error"}`);
      }
      input.onResolved?.(result);
    },
  });

  transition("COMPARING");
  const entries = input.addons.map((addon, i): AddonOutcome => {
    const result = resolved[i];
    const current = pinned[i] ?? addon.version;
    if (!result) {
      return {
        id: addon.id,
        variable: addon.variable,
        outcome: "unresolved",
        from: current,
        to: current,
        error: "not resolved",
      };
    }
    return compare(addon, current, result, logger);
  });

  transition("RENDERING");
  const versions = new Map(entries.map((e) => [e.id, e.to] as const));
  const renderOptions: RenderOptions = {
    markers,
    eol,
    releaseHost: input.releaseHost,
    workdir: input.workdir,
  };
  const block = renderBlock(versions, input.addons, renderOptions);
  const again = renderBlock(versions, input.addons, renderOptions);
  if (block !== again) {
    throw new RenderDeterminismViolation(block, again);
  }

  const text = joinSplice(spliceBlock(splice, block));
  const changed = text !== input.text;
  transition("SPLICED");

  const state: TerminalState = entries.some((e) => e.outcome === "unresolved")
    ? "PARTIAL"
    : "DONE";
  const summary: ChangeSummary = {
    state,
    inserted,
    changed,
    oldBlock: inserted ? null : splice.block,
    newBlock: block,
    entries,
  };
  logger.info(`${summaryTitle(summary)}${changed ? "" : " (file unchanged)"}`);
  transition(state);

  return { state, summary, text, changed, inserted };
}

// ---------------------------------------------------------------------------
// reconcileFile() — read, reconcile, write, publish
// ---------------------------------------------------------------------------

/**
 * - `dry`: compute only
 * - `write`: rewrite the file when it changed
 * - `publish`: rewrite, then hand the summary to the publisher
 */
export type RunMode = "dry" | "write" | "publish";

export interface ReconcileFileOptions extends ReconcileOptions {
  path: string;
  mode: RunMode;
  publisher?: Publisher | undefined;
}

export interface ReconcileFileResult extends ReconcileResult {
  written: boolean;
  published: boolean;
}

export async function reconcileFile(
  options: ReconcileFileOptions,
): Promise<ReconcileFileResult> {
  const logger = options.logger ?? silentLogger;
  const { path, mode, publisher, ...rest } = options;

  const original = await readBuildFile(path);
  const result = await reconcile({ ...rest, text: original });

  let written = false;
  let published = false;
  if (result.changed && mode !== "dry") {
    await writeFileAtomic(path, result.text);
    written = true;
    logger.info(`wrote ${path}`);
  }

  if (result.changed && mode === "publish") {
    if (publisher) {
      await publisher.publish(result.summary);
      published = true;
    } else {
      logger.warn("publish mode without a publisher; nothing was sent");
    }
  }

  return { ...result, written, published };
}
