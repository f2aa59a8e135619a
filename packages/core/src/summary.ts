import type { BumpType } from "@pinkeeper/watcher";

// ---------------------------------------------------------------------------
// ChangeSummary — what a reconciliation run changed, handed to publishers
// ---------------------------------------------------------------------------

export type AddonOutcomeKind = "upgraded" | "unchanged" | "unresolved";

export type TerminalState = "DONE" | "PARTIAL";

export interface AddonOutcome {
  id: string;
  variable: string;
  outcome: AddonOutcomeKind;
  /** Pinned version before the run */
  from: string;
  /** Version in the rendered block */
  to: string;
  bump?: BumpType | undefined;
  /** Release tag of the new version (upgraded only) */
  tag?: string | undefined;
  /** When that release was published, ISO 8601 (upgraded only) */
  publishedAt?: string | undefined;
  /** Resolution failure (unresolved only) */
  error?: string | undefined;
}

export interface ChangeSummary {
  state: TerminalState;
  /** True when the file had no block and one was inserted */
  inserted: boolean;
  /** True when the file text differs from what was read */
  changed: boolean;
  /** Previous block text, null when inserted */
  oldBlock: string | null;
  newBlock: string;
  entries: AddonOutcome[];
}

export function countOutcomes(
  summary: ChangeSummary,
): Record<AddonOutcomeKind, number> {
  const counts: Record<AddonOutcomeKind, number> = {
    upgraded: 0,
    unchanged: 0,
    unresolved: 0,
  };
  for (const entry of summary.entries) counts[entry.outcome]++;
  return counts;
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}

/** One-line header, e.g. "2 addons upgraded, 1 unresolved". */
export function summaryTitle(summary: ChangeSummary): string {
  const { upgraded, unresolved } = countOutcomes(summary);
  if (upgraded === 0 && unresolved === 0) return "No addon changes";

  const head =
    upgraded === 0 ? "No addons upgraded" : `${plural(upgraded, "addon")} upgraded`;
  return unresolved === 0 ? head : `${head}, ${unresolved} unresolved`;
}

function describeEntry(entry: AddonOutcome): string {
  switch (entry.outcome) {
    case "upgraded": {
      const notes = [
        entry.bump,
        entry.publishedAt ? `released ${entry.publishedAt.slice(0, 10)}` : undefined,
      ].filter((note) => note !== undefined);
      return `- ${entry.id}: ${entry.from} → ${entry.to}${notes.length > 0 ? ` (${notes.join(", ")})` : ""}`;
    }
    case "unchanged":
      return `- ${entry.id}: ${entry.to} (unchanged)`;
    case "unresolved":
      return `- ${entry.id}: ${entry.to} (unresolved: ${entry.error ?? "unknown error"})`;
  }
}

/**
 * Human-readable change description, suitable as a commit message or pull
 * request body.
 */
export function formatChangeSummary(summary: ChangeSummary): string {
  const lines = [
    "Update addons from upstream",
    "",
    ...summary.entries.map(describeEntry),
  ];
  if (summary.inserted) {
    lines.push("", "No generated block was present; a new one was inserted.");
  }
  return lines.join("\n") + "\n";
}
