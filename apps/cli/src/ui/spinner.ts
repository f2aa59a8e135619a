// apps/cli/src/ui/spinner.ts — progress spinner wrapper using ora
import ora from "ora";
import type { Ora } from "ora";

export interface Spinner {
  start(text: string): void;
  update(text: string): void;
  succeed(text: string): void;
  fail(text: string): void;
  stop(): void;
}

export function createSpinner(): Spinner {
  let instance: Ora | undefined;

  return {
    start(text: string) {
      instance = ora({ text, stream: process.stderr }).start();
    },
    update(text: string) {
      if (instance) instance.text = text;
    },
    succeed(text: string) {
      instance?.succeed(text);
      instance = undefined;
    },
    fail(text: string) {
      instance?.fail(text);
      instance = undefined;
    },
    stop() {
      instance?.stop();
      instance = undefined;
    },
  };
}

/** Spinner for --quiet and --json runs. */
export const silentSpinner: Spinner = {
  start() {},
  update() {},
  succeed() {},
  fail() {},
  stop() {},
};
