// apps/cli/src/output/summary.ts — Human-readable summary table for terminal
import type { AddonOutcome, ReconcileFileResult } from "@pinkeeper/core";
import { summaryTitle } from "@pinkeeper/core";
import pc from "picocolors";

export type Colors = ReturnType<typeof pc.createColors>;

function outcomeMark(entry: AddonOutcome, c: Colors): string {
  switch (entry.outcome) {
    case "upgraded":
      return c.green("↑");
    case "unchanged":
      return c.dim("=");
    case "unresolved":
      return c.yellow("!");
  }
}

function outcomeDetail(entry: AddonOutcome, c: Colors): string {
  switch (entry.outcome) {
    case "upgraded":
      return `${entry.from} → ${c.bold(entry.to)}${entry.bump ? c.dim(` (${entry.bump})`) : ""}`;
    case "unchanged":
      return entry.to;
    case "unresolved":
      return `${entry.to} ${c.yellow(`(unresolved: ${entry.error ?? "unknown error"})`)}`;
  }
}

function pad(str: string, len: number): string {
  return str.length >= len ? str : str + " ".repeat(len - str.length);
}

function fileStatus(result: ReconcileFileResult): string {
  if (!result.changed) return "file unchanged";
  if (!result.written) return "dry run, file not written";
  return result.published ? "file updated, summary published" : "file updated";
}

export function formatSummaryTable(
  path: string,
  result: ReconcileFileResult,
  c: Colors = pc,
): string[] {
  const { summary } = result;
  const width = Math.max(...summary.entries.map((e) => e.id.length));
  const lines = ["", c.bold(`  pinkeeper — ${path}`), ""];

  for (const entry of summary.entries) {
    lines.push(`    ${outcomeMark(entry, c)} ${pad(entry.id, width)}  ${outcomeDetail(entry, c)}`);
  }

  if (summary.inserted) {
    lines.push("", `  ${c.cyan("new generated block inserted")}`);
  }

  lines.push("", c.dim(`  ${summaryTitle(summary)} (${fileStatus(result)})`));
  return lines;
}

export function printSummaryTable(path: string, result: ReconcileFileResult): void {
  for (const line of formatSummaryTable(path, result)) console.log(line);
}
