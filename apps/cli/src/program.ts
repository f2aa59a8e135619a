// apps/cli/src/program.ts — command tree shared by the entry point and tests
import { Command } from "commander";
import { createReconcileCommand } from "./commands/reconcile.js";
import type { ReconcileDeps } from "./commands/reconcile.js";

export function createProgram(version: string, deps: ReconcileDeps = {}): Command {
  const program = new Command();

  program
    .name("pinkeeper")
    .description(
      "Keep the pinned addon versions of a Dockerfile in step with upstream releases.",
    )
    .version(version, "-v, --version")
    .exitOverride();

  program.addCommand(createReconcileCommand(deps), { isDefault: true });

  return program;
}
