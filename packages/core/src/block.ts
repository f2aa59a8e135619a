import { PinkeeperError, VERSION_PLACEHOLDER } from "@pinkeeper/catalog";
import type { Addon } from "@pinkeeper/catalog";

// ---------------------------------------------------------------------------
// Generated block layout
//
//   # autogenerated by updater — do not edit manually
//   WORKDIR /zap/plugin                      (optional)
//   ARG ASCANRULES_VERSION=36
//   RUN rm --force \
//           ascanrules-release-*.zap \
//       && wget --quiet \
//           https://github.com/<repo>/releases/download/ascanrules-v${ASCANRULES_VERSION}/ascanrules-release-${ASCANRULES_VERSION}.zap
//   # autogenerated end
// ---------------------------------------------------------------------------

export interface Markers {
  start: string;
  end: string;
}

export const DEFAULT_MARKERS: Markers = {
  start: "# autogenerated by updater — do not edit manually",
  end: "# autogenerated end",
};

export const DEFAULT_RELEASE_HOST = "https://github.com";

export type LineEnding = "\n" | "\r\n";

export interface RenderOptions {
  markers?: Markers | undefined;
  /** Default: https://github.com */
  releaseHost?: string | undefined;
  /** Emits `WORKDIR <dir>` before the declarations when set */
  workdir?: string | undefined;
  /** Default: "\n" */
  eol?: LineEnding | undefined;
}

const ITEM_INDENT = " ".repeat(8);
const STEP_INDENT = " ".repeat(4);

function variableRef(addon: Addon): string {
  return `\${${addon.variable}}`;
}

/** Glob matching every downloaded version of the addon's artifact. */
export function cleanupGlob(addon: Addon): string {
  return addon.filename.replaceAll(VERSION_PLACEHOLDER, "*");
}

/**
 * Download URL with the version left as a build-variable reference, so a
 * version bump only touches the declaration line.
 */
export function downloadUrl(
  addon: Addon,
  releaseHost: string = DEFAULT_RELEASE_HOST,
): string {
  const ref = variableRef(addon);
  const host = releaseHost.replace(/\/+$/, "");
  const file = addon.filename.replaceAll(VERSION_PLACEHOLDER, ref);
  return `${host}/${addon.repository}/releases/download/${addon.tagPrefix}-v${ref}/${file}`;
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

/**
 * Render the generated block for `order` using the versions in `versions`
 * (addon id → version). Output is a pure function of its arguments.
 */
export function renderBlock(
  versions: ReadonlyMap<string, string>,
  order: readonly Addon[],
  options: RenderOptions = {},
): string {
  const markers = options.markers ?? DEFAULT_MARKERS;
  const eol = options.eol ?? "\n";
  const releaseHost = options.releaseHost ?? DEFAULT_RELEASE_HOST;

  if (order.length === 0) {
    throw new PinkeeperError("RENDER_INPUT", "Cannot render a block without addons");
  }

  const declared = new Map<string, string>();
  const declarations: string[] = [];
  for (const addon of order) {
    const version = versions.get(addon.id);
    if (version === undefined) {
      throw new PinkeeperError(
        "RENDER_INPUT",
        `No version for addon "${addon.id}"`,
      );
    }
    if (/\s/.test(version) || version === "") {
      throw new PinkeeperError(
        "RENDER_INPUT",
        `Invalid version "${version}" for addon "${addon.id}"`,
      );
    }

    const existing = declared.get(addon.variable);
    if (existing === undefined) {
      declared.set(addon.variable, version);
      declarations.push(`ARG ${addon.variable}=${version}`);
    } else if (existing !== version) {
      throw new PinkeeperError(
        "RENDER_INPUT",
        `Variable ${addon.variable} bound to both ${existing} and ${version}`,
      );
    }
  }

  const globs = unique(order.map(cleanupGlob));
  const urls = unique(order.map((a) => downloadUrl(a, releaseHost)));

  const lines: string[] = [markers.start];
  if (options.workdir) lines.push(`WORKDIR ${options.workdir}`);
  lines.push(...declarations);
  lines.push("RUN rm --force \\");
  for (const glob of globs) lines.push(`${ITEM_INDENT}${glob} \\`);
  lines.push(`${STEP_INDENT}&& wget --quiet \\`);
  urls.forEach((url, i) => {
    lines.push(`${ITEM_INDENT}${url}${i < urls.length - 1 ? " \\" : ""}`);
  });
  lines.push(markers.end);

  return lines.join(eol);
}

const DECLARATION = /^\s*ARG\s+([A-Za-z_][A-Za-z0-9_]*)=(\S+)\s*$/;

/** Read `ARG NAME=value` lines back into variable → version. */
export function parseDeclarations(block: string): Map<string, string> {
  const declared = new Map<string, string>();
  for (const line of block.split(/\r?\n/)) {
    const match = DECLARATION.exec(line);
    if (!match) continue;
    const [, name, value] = match;
    if (name && value && !declared.has(name)) declared.set(name, value);
  }
  return declared;
}
