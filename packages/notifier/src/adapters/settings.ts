import { z } from "zod";
import { ConfigError } from "@pinkeeper/core";

export const DEFAULT_TIMEOUT_MS = 10_000;

/** Validate a channel's settings block, naming the channel on failure. */
export function parseSettings<T extends z.ZodTypeAny>(
  schema: T,
  channelId: string,
  settings: unknown,
): z.output<T> {
  const result = schema.safeParse(settings);
  if (!result.success) {
    const detail = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new ConfigError(`settings for channel "${channelId}"`, detail);
  }
  return result.data;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
