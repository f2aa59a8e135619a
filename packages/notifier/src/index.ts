export type {
  ChannelType,
  ChannelConfig,
  RoutingRule,
  NotifierConfig,
  NotificationResult,
  NotifierAdapter,
} from "./types.js";

export { Notifier, createAdapter } from "./notifier.js";

export { resolveRoutes } from "./routing.js";

export {
  WebhookAdapter,
  WebhookSettingsSchema,
  buildWebhookPayload,
  signPayload,
} from "./adapters/webhook.js";
export type { WebhookSettings, WebhookPayload } from "./adapters/webhook.js";

export {
  SlackNotificationAdapter,
  SlackSettingsSchema,
  buildSlackMessage,
  COLOR_INFO,
  COLOR_ERROR,
} from "./adapters/slack.js";
export type { SlackSettings, SlackMessage } from "./adapters/slack.js";
