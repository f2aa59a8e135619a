import type { ChangeSummary, TerminalState } from "@pinkeeper/core";

// ---------------------------------------------------------------------------
// Channel configuration
// ---------------------------------------------------------------------------

export type ChannelType = "webhook" | "slack";

export interface ChannelConfig {
  type: ChannelType;
  /** User-defined name, e.g. "platform-slack" */
  id: string;
  settings: Record<string, unknown>;
}

// ---------------------------------------------------------------------------
// Routing rules
// ---------------------------------------------------------------------------

export interface RoutingRule {
  /** Matches ChannelConfig.id */
  channel: string;
  /** Run states that reach the channel; all when unset */
  states?: TerminalState[] | undefined;
}

// ---------------------------------------------------------------------------
// Notifier configuration
// ---------------------------------------------------------------------------

export interface NotifierConfig {
  channels: ChannelConfig[];
  routing: RoutingRule[];
}

// ---------------------------------------------------------------------------
// Notification result
// ---------------------------------------------------------------------------

export interface NotificationResult {
  channelId: string;
  success: boolean;
  error?: string | undefined;
}

// ---------------------------------------------------------------------------
// Adapter interface — implemented by each channel
// ---------------------------------------------------------------------------

export interface NotifierAdapter {
  send(summary: ChangeSummary): Promise<NotificationResult>;
}
