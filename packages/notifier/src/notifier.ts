import { PublishError } from "@pinkeeper/core";
import type { ChangeSummary, Publisher } from "@pinkeeper/core";
import type {
  ChannelConfig,
  NotifierAdapter,
  NotifierConfig,
  NotificationResult,
} from "./types.js";
import { resolveRoutes } from "./routing.js";
import { WebhookAdapter, WebhookSettingsSchema } from "./adapters/webhook.js";
import { SlackNotificationAdapter, SlackSettingsSchema } from "./adapters/slack.js";
import { errorMessage, parseSettings } from "./adapters/settings.js";

// ---------------------------------------------------------------------------
// Adapter factory — creates adapters from channel configuration
// ---------------------------------------------------------------------------

export function createAdapter(channel: ChannelConfig): NotifierAdapter {
  switch (channel.type) {
    case "webhook":
      return new WebhookAdapter(
        parseSettings(WebhookSettingsSchema, channel.id, channel.settings),
      );
    case "slack":
      return new SlackNotificationAdapter(
        parseSettings(SlackSettingsSchema, channel.id, channel.settings),
      );
  }
}

// ---------------------------------------------------------------------------
// Notifier — routes summaries to configured channels
// ---------------------------------------------------------------------------

export class Notifier implements Publisher {
  private adapters: Map<string, NotifierAdapter> = new Map();

  constructor(
    private config: NotifierConfig,
    adapters?: Map<string, NotifierAdapter> | undefined,
  ) {
    for (const channel of config.channels) {
      this.adapters.set(channel.id, adapters?.get(channel.id) ?? createAdapter(channel));
    }
  }

  /**
   * Send to every routed channel; one result per route. Without routing
   * rules every configured channel receives every summary.
   */
  async notify(summary: ChangeSummary): Promise<NotificationResult[]> {
    const rules =
      this.config.routing.length > 0
        ? this.config.routing
        : this.config.channels.map((c) => ({ channel: c.id }));
    const routes = resolveRoutes(summary, rules);

    if (routes.length === 0) {
      return [];
    }

    const settled = await Promise.allSettled(
      routes.map(async (route): Promise<NotificationResult> => {
        const adapter = this.adapters.get(route.channel);
        if (!adapter) {
          return {
            channelId: route.channel,
            success: false,
            error: `No adapter registered for channel "${route.channel}"`,
          };
        }

        const result = await adapter.send(summary);
        return { ...result, channelId: route.channel };
      }),
    );

    return settled.map((s, i) =>
      s.status === "fulfilled"
        ? s.value
        : {
            channelId: routes[i]?.channel ?? "unknown",
            success: false,
            error: errorMessage(s.reason),
          },
    );
  }

  /** @throws {PublishError} when any routed channel fails */
  async publish(summary: ChangeSummary): Promise<void> {
    const results = await this.notify(summary);
    const failures = results
      .filter((r) => !r.success)
      .map((r) => ({ channelId: r.channelId, error: r.error ?? "unknown error" }));
    if (failures.length > 0) {
      throw new PublishError(failures);
    }
  }
}
