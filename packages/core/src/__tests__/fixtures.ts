import type { Addon } from "@pinkeeper/catalog";

export function addon(id: string, overrides: Partial<Addon> = {}): Addon {
  return {
    id,
    repository: "example-org/scanner-extensions",
    tagPrefix: id,
    filename: `${id}-release-{version}.zap`,
    version: "1",
    variable: `${id.toUpperCase()}_VERSION`,
    ...overrides,
  };
}

export const ASCANRULES = addon("ascanrules", { version: "35" });
export const RETIRE = addon("retire", { version: "0.21.0" });

const DOWNLOAD = "https://github.com/example-org/scanner-extensions/releases/download";

/** The block rendered for ASCANRULES and RETIRE at the given versions. */
export function expectedBlock(ascanrules: string, retire: string): string {
  return [
    "# autogenerated by updater — do not edit manually",
    `ARG ASCANRULES_VERSION=${ascanrules}`,
    `ARG RETIRE_VERSION=${retire}`,
    "RUN rm --force \\",
    "        ascanrules-release-*.zap \\",
    "        retire-release-*.zap \\",
    "    && wget --quiet \\",
    "        " + DOWNLOAD + "/ascanrules-v${ASCANRULES_VERSION}/ascanrules-release-${ASCANRULES_VERSION}.zap \\",
    "        " + DOWNLOAD + "/retire-v${RETIRE_VERSION}/retire-release-${RETIRE_VERSION}.zap",
    "# autogenerated end",
  ].join("\n");
}
