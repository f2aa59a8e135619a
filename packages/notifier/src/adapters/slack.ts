import { z } from "zod";
import { formatChangeSummary, summaryTitle } from "@pinkeeper/core";
import type { ChangeSummary } from "@pinkeeper/core";
import type { NotifierAdapter, NotificationResult } from "../types.js";
import { DEFAULT_TIMEOUT_MS, errorMessage } from "./settings.js";

// ---------------------------------------------------------------------------
// Slack notification service settings
//
// The service fans a message out to Slack channels by name. It authenticates
// with HTTP Basic credentials and reports per-channel problems in the body
// (`errors`, `exclusions`) of an otherwise successful response.
// ---------------------------------------------------------------------------

export const SlackSettingsSchema = z
  .object({
    url: z.string().url(),
    channels: z.array(z.string().min(1)).min(1),
    user: z.string().min(1),
    token: z.string().min(1),
    /** First line of the message */
    header: z.string().min(1).default("Addons update"),
    timeoutMs: z.number().int().positive().optional(),
  })
  .strict();

export type SlackSettings = z.infer<typeof SlackSettingsSchema>;

export const COLOR_INFO = "#36a64f";
export const COLOR_ERROR = "#ff4d4d";

export interface SlackMessage {
  channelLookup: {
    by: "slack-channel";
    slackChannels: string[];
  };
  messageDetails: {
    text: string;
    attachments: Array<{ color: string; title: string; text: string }>;
  };
}

export function buildSlackMessage(
  summary: ChangeSummary,
  settings: Pick<SlackSettings, "channels" | "header">,
): SlackMessage {
  return {
    channelLookup: { by: "slack-channel", slackChannels: settings.channels },
    messageDetails: {
      text: settings.header,
      attachments: [
        {
          color: summary.state === "DONE" ? COLOR_INFO : COLOR_ERROR,
          title: summaryTitle(summary),
          text: formatChangeSummary(summary),
        },
      ],
    },
  };
}

const ServiceResponseSchema = z
  .object({
    errors: z.array(z.unknown()).optional(),
    exclusions: z.array(z.unknown()).optional(),
  })
  .passthrough();

function basicAuth(user: string, token: string): string {
  return "Basic " + Buffer.from(`${user}:${token}`, "utf-8").toString("base64");
}

// ---------------------------------------------------------------------------
// Slack notification adapter
// ---------------------------------------------------------------------------

export class SlackNotificationAdapter implements NotifierAdapter {
  constructor(private settings: SlackSettings) {}

  async send(summary: ChangeSummary): Promise<NotificationResult> {
    const body = JSON.stringify(buildSlackMessage(summary, this.settings));
    const target = `${this.settings.url} for channels ${this.settings.channels.join(", ")}`;

    try {
      const response = await fetch(this.settings.url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: basicAuth(this.settings.user, this.settings.token),
        },
        body,
        signal: AbortSignal.timeout(this.settings.timeoutMs ?? DEFAULT_TIMEOUT_MS),
      });

      if (!response.ok) {
        return this.failure(`${target}: HTTP ${response.status}`);
      }

      const parsed = ServiceResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        return this.failure(`${target}: unexpected response body`);
      }

      const { errors = [], exclusions = [] } = parsed.data;
      if (errors.length > 0 || exclusions.length > 0) {
        return this.failure(
          `${target}: errors: ${JSON.stringify(errors)}, exclusions: ${JSON.stringify(exclusions)}`,
        );
      }

      return { channelId: "slack", success: true };
    } catch (err) {
      return this.failure(`${target}: ${errorMessage(err)}`);
    }
  }

  private failure(error: string): NotificationResult {
    return { channelId: "slack", success: false, error };
  }
}
