import { createHmac } from "node:crypto";
import { z } from "zod";
import { formatChangeSummary, summaryTitle } from "@pinkeeper/core";
import type { ChangeSummary, TerminalState } from "@pinkeeper/core";
import type { NotifierAdapter, NotificationResult } from "../types.js";
import { DEFAULT_TIMEOUT_MS, errorMessage } from "./settings.js";

// ---------------------------------------------------------------------------
// Webhook settings
// ---------------------------------------------------------------------------

export const WebhookSettingsSchema = z
  .object({
    url: z.string().url(),
    /** HMAC secret for signing payloads */
    secret: z.string().min(1).optional(),
    timeoutMs: z.number().int().positive().optional(),
  })
  .strict();

export type WebhookSettings = z.infer<typeof WebhookSettingsSchema>;

// ---------------------------------------------------------------------------
// Webhook payload
// ---------------------------------------------------------------------------

export interface WebhookPayload {
  version: "1";
  event: "addons_reconciled";
  summary: {
    state: TerminalState;
    title: string;
    text: string;
    inserted: boolean;
    upgraded: Array<{
      id: string;
      from: string;
      to: string;
      bump?: string | undefined;
      tag?: string | undefined;
      publishedAt?: string | undefined;
    }>;
    unresolved: Array<{
      id: string;
      version: string;
      error: string;
    }>;
  };
}

export function buildWebhookPayload(summary: ChangeSummary): WebhookPayload {
  return {
    version: "1",
    event: "addons_reconciled",
    summary: {
      state: summary.state,
      title: summaryTitle(summary),
      text: formatChangeSummary(summary),
      inserted: summary.inserted,
      upgraded: summary.entries
        .filter((e) => e.outcome === "upgraded")
        .map((e) => ({
          id: e.id,
          from: e.from,
          to: e.to,
          bump: e.bump,
          tag: e.tag,
          publishedAt: e.publishedAt,
        })),
      unresolved: summary.entries
        .filter((e) => e.outcome === "unresolved")
        .map((e) => ({ id: e.id, version: e.to, error: e.error ?? "unknown error" })),
    },
  };
}

// ---------------------------------------------------------------------------
// HMAC-SHA256 signature
// ---------------------------------------------------------------------------

export function signPayload(payload: string, secret: string): string {
  return (
    "sha256=" + createHmac("sha256", secret).update(payload).digest("hex")
  );
}

// ---------------------------------------------------------------------------
// Webhook adapter
// ---------------------------------------------------------------------------

export class WebhookAdapter implements NotifierAdapter {
  constructor(private settings: WebhookSettings) {}

  async send(summary: ChangeSummary): Promise<NotificationResult> {
    const body = JSON.stringify(buildWebhookPayload(summary));

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };

    if (this.settings.secret) {
      headers["X-Pinkeeper-Signature"] = signPayload(
        body,
        this.settings.secret,
      );
    }

    const timeoutMs = this.settings.timeoutMs ?? DEFAULT_TIMEOUT_MS;

    try {
      const response = await fetch(this.settings.url, {
        method: "POST",
        headers,
        body,
        signal: AbortSignal.timeout(timeoutMs),
      });

      return {
        channelId: "webhook",
        success: response.ok,
        error: response.ok ? undefined : `HTTP ${response.status}`,
      };
    } catch (err) {
      return {
        channelId: "webhook",
        success: false,
        error: errorMessage(err),
      };
    }
  }
}
