import { readFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import * as yaml from "js-yaml";
import { z } from "zod";
import {
  DEFAULT_BACKOFF_MS,
  DEFAULT_CONCURRENCY,
  DEFAULT_MAX_PAGES,
  GITHUB_API,
} from "@pinkeeper/watcher";
import { DEFAULT_MARKERS, DEFAULT_RELEASE_HOST } from "./block.js";
import { ConfigError } from "./errors.js";

export const CONFIG_FILENAME = ".pinkeeper.yml";

// ---------------------------------------------------------------------------
// Schema — Zod validation for .pinkeeper.yml
// ---------------------------------------------------------------------------

const RunStateSchema = z.enum(["DONE", "PARTIAL"]);

const ChannelSchema = z
  .object({
    id: z.string().min(1),
    type: z.enum(["webhook", "slack"]),
    settings: z.record(z.unknown()).default({}),
  })
  .strict();

const RoutingRuleSchema = z
  .object({
    channel: z.string().min(1),
    states: z.array(RunStateSchema).optional(),
  })
  .strict();

const MarkersSchema = z
  .object({
    start: z.string().trim().min(1).default(DEFAULT_MARKERS.start),
    end: z.string().trim().min(1).default(DEFAULT_MARKERS.end),
  })
  .strict()
  .refine((m) => m.start !== m.end, {
    message: "start and end markers must differ",
  });

const ConfigSchema = z
  .object({
    catalog: z.string().min(1).default("addons.yml"),
    file: z.string().min(1).default("Dockerfile"),
    markers: MarkersSchema.default({}),
    anchor: z.string().trim().min(1).optional(),
    workdir: z.string().trim().min(1).optional(),
    releaseHost: z.string().url().default(DEFAULT_RELEASE_HOST),
    apiUrl: z.string().url().default(GITHUB_API),
    concurrency: z.number().int().min(1).max(32).default(DEFAULT_CONCURRENCY),
    timeoutMs: z.number().int().positive().default(10_000),
    maxPages: z.number().int().min(1).max(100).default(DEFAULT_MAX_PAGES),
    includePrereleases: z.boolean().default(false),
    retry: z
      .object({
        attempts: z.number().int().min(1).optional(),
        backoffMs: z
          .array(z.number().int().nonnegative())
          .min(1)
          .default([...DEFAULT_BACKOFF_MS]),
      })
      .strict()
      .default({}),
    publish: z
      .object({
        channels: z.array(ChannelSchema).default([]),
        routing: z.array(RoutingRuleSchema).default([]),
      })
      .strict()
      .default({})
      .superRefine((p, ctx) => {
        const ids = new Set(p.channels.map((c) => c.id));
        p.routing.forEach((rule, i) => {
          if (!ids.has(rule.channel)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: ["routing", i, "channel"],
              message: `unknown channel "${rule.channel}"`,
            });
          }
        });
      }),
  })
  .strict();

export type PinkeeperConfig = z.infer<typeof ConfigSchema>;
export type ChannelConfig = z.infer<typeof ChannelSchema>;
export type RoutingRuleConfig = z.infer<typeof RoutingRuleSchema>;

function formatZodError(err: z.ZodError): string {
  return err.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}

/** Validate a parsed config document and apply defaults. */
export function parseConfig(raw: unknown, source = CONFIG_FILENAME): PinkeeperConfig {
  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(source, formatZodError(result.error));
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// loadConfig — reads and validates .pinkeeper.yml
// ---------------------------------------------------------------------------

/**
 * Load `configPath`, or `<cwd>/.pinkeeper.yml` when it exists. The catalog and
 * file paths in the result are absolute, resolved against the config file's
 * directory.
 */
export async function loadConfig(
  cwd: string,
  configPath?: string | undefined,
): Promise<PinkeeperConfig> {
  const filePath = configPath ? resolve(cwd, configPath) : join(cwd, CONFIG_FILENAME);

  let raw: string | undefined;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    // An explicitly named config must exist; the default one is optional
    if (configPath) {
      throw new ConfigError(
        filePath,
        `cannot read file: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  let parsed: unknown = {};
  if (raw !== undefined) {
    try {
      parsed = yaml.load(raw, { filename: filePath });
    } catch (err) {
      throw new ConfigError(filePath, err instanceof Error ? err.message : String(err));
    }
    if (parsed != null && (typeof parsed !== "object" || Array.isArray(parsed))) {
      throw new ConfigError(filePath, "expected a mapping at the top level");
    }
  }

  const config = parseConfig(parsed, filePath);
  const base = raw === undefined ? cwd : dirname(filePath);
  return {
    ...config,
    catalog: resolve(base, config.catalog),
    file: resolve(base, config.file),
  };
}
