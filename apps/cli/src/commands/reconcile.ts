// apps/cli/src/commands/reconcile.ts — `pinkeeper reconcile` command handler
import { Command, InvalidArgumentError } from "commander";
import { relative, resolve } from "node:path";
import { loadCatalog } from "@pinkeeper/catalog";
import {
  countOutcomes,
  createConsoleLogger,
  loadConfig,
  reconcileFile,
  silentLogger,
} from "@pinkeeper/core";
import type {
  Logger,
  PinkeeperConfig,
  RunMode,
  RunState,
} from "@pinkeeper/core";
import { Notifier } from "@pinkeeper/notifier";
import type { ChannelConfig } from "@pinkeeper/notifier";
import {
  GitHubReleaseIndex,
  InMemoryResponseCache,
  ReleaseResolver,
} from "@pinkeeper/watcher";
import { createSpinner, silentSpinner } from "../ui/spinner.js";
import type { Spinner } from "../ui/spinner.js";
import { printSummaryTable } from "../output/summary.js";
import { formatJson } from "../output/json.js";

export interface ReconcileCommandOpts {
  config?: string | undefined;
  catalog?: string | undefined;
  file?: string | undefined;
  anchor?: string | undefined;
  dryRun?: boolean | undefined;
  /** false with --no-publish */
  publish: boolean;
  json?: boolean | undefined;
  verbose?: boolean | undefined;
  quiet?: boolean | undefined;
  concurrency?: number | undefined;
  timeout?: number | undefined;
}

export interface ReconcileDeps {
  cwd?: string | undefined;
  env?: NodeJS.ProcessEnv | undefined;
  spinner?: Spinner | undefined;
  logger?: Logger | undefined;
  /** Receives --json output */
  stdout?: ((text: string) => void) | undefined;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

// ---------------------------------------------------------------------------
// Secrets come from the environment, never from .pinkeeper.yml
// ---------------------------------------------------------------------------

function withSecrets(
  channel: PinkeeperConfig["publish"]["channels"][number],
  env: NodeJS.ProcessEnv,
): ChannelConfig {
  const settings: Record<string, unknown> = { ...channel.settings };
  const set = (key: string, value: string | undefined) => {
    if (value && settings[key] === undefined) settings[key] = value;
  };

  if (channel.type === "webhook") {
    set("secret", env["PINKEEPER_WEBHOOK_SECRET"]);
  } else {
    set("url", env["SLACK_NOTIFICATION_URL"]);
    set("user", env["SLACK_USER"]);
    set("token", env["SLACK_TOKEN"]);
  }
  return { id: channel.id, type: channel.type, settings };
}

function runMode(opts: ReconcileCommandOpts, config: PinkeeperConfig): RunMode {
  if (opts.dryRun) return "dry";
  if (!opts.publish || config.publish.channels.length === 0) return "write";
  return "publish";
}

const STATE_TEXT: Partial<Record<RunState, string>> = {
  RESOLVING: "Resolving upstream releases…",
  COMPARING: "Comparing versions…",
  RENDERING: "Rendering generated block…",
};

// ---------------------------------------------------------------------------
// runReconcile — returns the process exit code
// ---------------------------------------------------------------------------

export async function runReconcile(
  opts: ReconcileCommandOpts,
  deps: ReconcileDeps = {},
): Promise<number> {
  const cwd = deps.cwd ?? process.cwd();
  const env = deps.env ?? process.env;
  const quiet = opts.quiet ?? false;
  const json = opts.json ?? false;
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));
  const consoleLogger = createConsoleLogger("pinkeeper", { verbose: opts.verbose });
  const logger: Logger =
    deps.logger ??
    (quiet
      ? { ...silentLogger, warn: consoleLogger.warn, error: consoleLogger.error }
      : consoleLogger);
  const s = deps.spinner ?? (quiet || json ? silentSpinner : createSpinner());

  try {
    const config = await loadConfig(cwd, opts.config);
    const catalogPath = opts.catalog ? resolve(cwd, opts.catalog) : config.catalog;
    const filePath = opts.file ? resolve(cwd, opts.file) : config.file;
    const mode = runMode(opts, config);

    const { addons } = await loadCatalog(catalogPath);
    logger.debug(`loaded ${addons.length} addon(s) from ${catalogPath}`);

    const notifier =
      mode === "publish"
        ? new Notifier({
            channels: config.publish.channels.map((c) => withSecrets(c, env)),
            routing: config.publish.routing,
          })
        : undefined;

    const index = new GitHubReleaseIndex({
      token: env["GITHUB_TOKEN"],
      cache: new InMemoryResponseCache(),
      apiUrl: config.apiUrl,
      timeoutMs: opts.timeout ?? config.timeoutMs,
      maxPages: config.maxPages,
      retry: {
        attempts: config.retry.attempts,
        backoffMs: config.retry.backoffMs,
        onRetry: (err, attempt, delayMs) =>
          logger.debug(
            `attempt ${attempt} failed (${err instanceof Error ? err.message : String(err)}), retrying in ${delayMs}ms`,
          ),
      },
    });
    const resolver = new ReleaseResolver(index, {
      includePrereleases: config.includePrereleases,
    });

    s.start("Reading build file…");
    const result = await reconcileFile({
      path: filePath,
      mode,
      addons,
      resolver,
      publisher: notifier,
      markers: config.markers,
      anchor: opts.anchor ?? config.anchor,
      workdir: config.workdir,
      releaseHost: config.releaseHost,
      concurrency: opts.concurrency ?? config.concurrency,
      logger,
      onStateChange: (state) => {
        const text = STATE_TEXT[state];
        if (text) s.update(text);
      },
    });

    if (result.state === "PARTIAL") {
      s.stop();
      const { unresolved } = countOutcomes(result.summary);
      logger.warn(
        `${unresolved} addon(s) could not be resolved; their pinned versions were kept`,
      );
    } else {
      s.succeed("Addons reconciled");
    }

    const displayPath = relative(cwd, filePath) || filePath;
    if (json) {
      stdout(formatJson(displayPath, result));
    } else if (!quiet) {
      printSummaryTable(displayPath, result);
    }

    return 0;
  } catch (err) {
    s.fail("Reconcile failed");
    // Always write errors to stderr regardless of --quiet
    console.error(err instanceof Error ? err.message : String(err));
    return 1;
  }
}

// ---------------------------------------------------------------------------
// Command definition
// ---------------------------------------------------------------------------

export function createReconcileCommand(deps: ReconcileDeps = {}): Command {
  return new Command("reconcile")
    .description(
      "Update the generated addon block of a Dockerfile to the latest upstream releases.",
    )
    .option("--config <file>", "Path to .pinkeeper.yml config file")
    .option("--catalog <file>", "Addon catalog (default: addons.yml)")
    .option("--file <file>", "Build file to rewrite (default: Dockerfile)")
    .option("--anchor <line>", "Insert a missing block after this line")
    .option("--dry-run", "Compute changes without writing the file")
    .option("--no-publish", "Write the file but send no notifications")
    .option("--json", "Print the run summary as JSON on stdout")
    .option("--concurrency <n>", "Concurrent release lookups", parsePositiveInt)
    .option("--timeout <ms>", "Per-request timeout in milliseconds", parsePositiveInt)
    .option("--verbose", "Print detailed logs")
    .option("--quiet", "Suppress all output except warnings and errors")
    .option("--no-color", "Disable colored output")
    .exitOverride()
    .action(async (opts: ReconcileCommandOpts) => {
      process.exitCode = await runReconcile(opts, deps);
    });
}
