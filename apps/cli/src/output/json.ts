// apps/cli/src/output/json.ts — JSON output formatter
import type { ReconcileFileResult } from "@pinkeeper/core";

export function formatJson(path: string, result: ReconcileFileResult): string {
  const { summary } = result;
  const report = {
    path,
    state: summary.state,
    changed: summary.changed,
    inserted: summary.inserted,
    written: result.written,
    published: result.published,
    entries: summary.entries,
    oldBlock: summary.oldBlock,
    newBlock: summary.newBlock,
  };
  return JSON.stringify(report, null, 2) + "\n";
}
