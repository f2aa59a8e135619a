// apps/cli — pinkeeper CLI entry point
import { CommanderError } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { createProgram } from "./program.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(
      readFileSync(join(__dirname, "../package.json"), "utf8"),
    );
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  } catch (err) {
    console.error(`warning: cannot read CLI version: ${err instanceof Error ? err.message : String(err)}`);
  }
  return "0.0.0";
}

try {
  await createProgram(readVersion()).parseAsync();
} catch (err) {
  if (!(err instanceof CommanderError)) throw err;
  // Help and version exit 0; anything else commander rejects is a usage error
  process.exitCode = err.exitCode === 0 ? 0 : 2;
}
