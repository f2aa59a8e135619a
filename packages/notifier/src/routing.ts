import type { ChangeSummary } from "@pinkeeper/core";
import type { RoutingRule } from "./types.js";

// ---------------------------------------------------------------------------
// Route resolution — given a summary, find matching routing rules
// ---------------------------------------------------------------------------

export function resolveRoutes(
  summary: ChangeSummary,
  rules: RoutingRule[],
): RoutingRule[] {
  return rules.filter((rule) => matchesRule(summary, rule));
}

function matchesRule(summary: ChangeSummary, rule: RoutingRule): boolean {
  return !rule.states || rule.states.includes(summary.state);
}
