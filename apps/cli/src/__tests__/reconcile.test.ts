import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CommanderError } from "commander";
import { parseCatalog } from "@pinkeeper/catalog";
import { renderBlock } from "@pinkeeper/core";
import { runReconcile } from "../commands/reconcile.js";
import type { ReconcileCommandOpts } from "../commands/reconcile.js";
import { createProgram } from "../program.js";
import { silentSpinner } from "../ui/spinner.js";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const CATALOG = `addons:
  - id: ascanrules
    repository: example-org/scanner-extensions
    tagPrefix: ascanrules
    filename: ascanrules-release-{version}.zap
    version: 35
  - id: retire
    repository: example-org/retire-extension
    tagPrefix: retire
    filename: retire-release-{version}.zap
    version: 0.21.0
`;

const { addons } = parseCatalog(CATALOG);

function dockerfile(ascanrules: string, retire: string): string {
  const block = renderBlock(
    new Map([
      ["ascanrules", ascanrules],
      ["retire", retire],
    ]),
    addons,
  );
  return `FROM scanner:stable\n${block}\nUSER scanner\n`;
}

function declarations(text: string): string[] {
  return text.split("\n").filter((line) => line.startsWith("ARG "));
}

function release(tag: string) {
  return {
    tag_name: tag,
    published_at: "2024-06-01T12:00:00Z",
    prerelease: false,
    draft: false,
  };
}

function jsonResponse(body: unknown, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    headers: new Headers(),
    json: async () => body,
  };
}

const RELEASES: Record<string, unknown[]> = {
  "example-org/scanner-extensions": [release("ascanrules-v36"), release("ascanrules-v35")],
  "example-org/retire-extension": [release("retire-v0.21.0")],
};

const HOOK_URL = "https://hooks.example.test/pinkeeper";

// ---------------------------------------------------------------------------
// runReconcile
// ---------------------------------------------------------------------------

describe("runReconcile", () => {
  let dir: string;
  let fetchSpy: ReturnType<typeof vi.fn>;
  let output: string[];
  const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

  const run = (opts: Partial<ReconcileCommandOpts> = {}, env: NodeJS.ProcessEnv = {}) =>
    runReconcile(
      { publish: true, ...opts },
      {
        cwd: dir,
        env,
        logger,
        spinner: silentSpinner,
        stdout: (text) => output.push(text),
      },
    );

  const dockerfilePath = () => join(dir, "Dockerfile");

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "pinkeeper-cli-"));
    await writeFile(join(dir, "addons.yml"), CATALOG);
    await writeFile(dockerfilePath(), dockerfile("35", "0.21.0"));
    output = [];

    fetchSpy = vi.fn(async (url: string) => {
      if (url === HOOK_URL) return jsonResponse(null);
      const repo = Object.keys(RELEASES).find((r) => url.includes(`/repos/${r}/releases`));
      return repo ? jsonResponse(RELEASES[repo]) : jsonResponse({ message: "Not Found" }, 404);
    });
    vi.stubGlobal("fetch", fetchSpy);
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await rm(dir, { recursive: true, force: true });
  });

  it("rewrites the Dockerfile with the latest releases", async () => {
    expect(await run()).toBe(0);

    const text = await readFile(dockerfilePath(), "utf-8");
    expect(text).toBe(dockerfile("36", "0.21.0"));
    expect(declarations(text)).toEqual([
      "ARG ASCANRULES_VERSION=36",
      "ARG RETIRE_VERSION=0.21.0",
    ]);
  });

  it("prints a JSON summary with --json", async () => {
    expect(await run({ json: true })).toBe(0);

    expect(output).toHaveLength(1);
    const report: unknown = JSON.parse(output[0] ?? "");
    expect(report).toMatchObject({
      path: "Dockerfile",
      state: "DONE",
      changed: true,
      inserted: false,
      written: true,
      published: false,
      entries: [
        { id: "ascanrules", outcome: "upgraded", from: "35", to: "36" },
        { id: "retire", outcome: "unchanged", from: "0.21.0", to: "0.21.0" },
      ],
    });
  });

  it("leaves the file untouched with --dry-run", async () => {
    expect(await run({ dryRun: true })).toBe(0);
    expect(await readFile(dockerfilePath(), "utf-8")).toBe(dockerfile("35", "0.21.0"));
  });

  it("sends the GitHub token when one is set", async () => {
    await run({}, { GITHUB_TOKEN: "test-token" });
    const [, init] = fetchSpy.mock.calls[0] ?? [];
    expect(init).toMatchObject({
      headers: { Authorization: "Bearer test-token" },
    });
  });

  it("keeps pinned versions of unresolved addons and still exits 0", async () => {
    fetchSpy.mockImplementation(async (url: string) =>
      url.includes("scanner-extensions")
        ? jsonResponse(RELEASES["example-org/scanner-extensions"])
        : jsonResponse({ message: "Not Found" }, 404),
    );

    expect(await run({ json: true })).toBe(0);
    expect(declarations(await readFile(dockerfilePath(), "utf-8"))).toEqual([
      "ARG ASCANRULES_VERSION=36",
      "ARG RETIRE_VERSION=0.21.0",
    ]);
    expect(JSON.parse(output[0] ?? "")).toMatchObject({
      state: "PARTIAL",
      entries: [
        { id: "ascanrules", outcome: "upgraded" },
        {
          id: "retire",
          outcome: "unresolved",
          error: "repository not found or has no releases (404)",
        },
      ],
    });
    expect(logger.warn).toHaveBeenCalledWith(
      "1 addon(s) could not be resolved; their pinned versions were kept",
    );
  });

  it("exits 1 when the catalog is missing", async () => {
    await rm(join(dir, "addons.yml"));
    expect(await run()).toBe(1);
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it("exits 1 on mismatched markers and leaves the file alone", async () => {
    const broken = "FROM scanner:stable\n# autogenerated end\n";
    await writeFile(dockerfilePath(), broken);

    expect(await run()).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      "End marker without a start marker (line 2)",
    );
    expect(await readFile(dockerfilePath(), "utf-8")).toBe(broken);
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it("exits 1 on an invalid config file", async () => {
    await writeFile(join(dir, ".pinkeeper.yml"), "concurrency: many\n");
    expect(await run()).toBe(1);
  });

  it("takes the build file from the config", async () => {
    await writeFile(join(dir, ".pinkeeper.yml"), "file: Dockerfile.scanner\n");
    await writeFile(join(dir, "Dockerfile.scanner"), "FROM scanner:stable\n");

    expect(await run()).toBe(0);
    expect(
      declarations(await readFile(join(dir, "Dockerfile.scanner"), "utf-8")),
    ).toEqual(["ARG ASCANRULES_VERSION=36", "ARG RETIRE_VERSION=0.21.0"]);
  });

  describe("publishing", () => {
    beforeEach(async () => {
      await writeFile(
        join(dir, ".pinkeeper.yml"),
        [
          "publish:",
          "  channels:",
          "    - id: hook",
          "      type: webhook",
          "      settings:",
          `        url: ${HOOK_URL}`,
        ].join("\n"),
      );
    });

    const hookCalls = () =>
      fetchSpy.mock.calls.filter(([url]) => url === HOOK_URL);

    it("signs and sends the summary to configured channels", async () => {
      expect(await run({ json: true }, { PINKEEPER_WEBHOOK_SECRET: "test-secret" })).toBe(0);

      expect(hookCalls()).toHaveLength(1);
      const [, init] = hookCalls()[0] ?? [];
      expect(init).toMatchObject({
        method: "POST",
        headers: { "X-Pinkeeper-Signature": expect.stringMatching(/^sha256=[a-f0-9]{64}$/) },
      });
      expect(JSON.parse(output[0] ?? "")).toMatchObject({ written: true, published: true });
    });

    it("skips notifications with --no-publish", async () => {
      expect(await run({ publish: false })).toBe(0);
      expect(hookCalls()).toHaveLength(0);
    });

    it("does not publish when nothing changed", async () => {
      await writeFile(dockerfilePath(), dockerfile("36", "0.21.0"));
      expect(await run()).toBe(0);
      expect(hookCalls()).toHaveLength(0);
    });

    it("exits 1 when a channel fails, after writing the file", async () => {
      fetchSpy.mockImplementation(async (url: string) => {
        if (url === HOOK_URL) return jsonResponse(null, 502);
        const repo = Object.keys(RELEASES).find((r) => url.includes(`/repos/${r}/releases`));
        return jsonResponse(repo ? RELEASES[repo] : []);
      });

      expect(await run()).toBe(1);
      expect(console.error).toHaveBeenCalledWith("Publishing failed for hook (HTTP 502)");
      expect(await readFile(dockerfilePath(), "utf-8")).toBe(dockerfile("36", "0.21.0"));
    });
  });
});

// ---------------------------------------------------------------------------
// Command line parsing
// ---------------------------------------------------------------------------

describe("pinkeeper program", () => {
  beforeEach(() => {
    vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);
  });

  it("prints the version", async () => {
    const error = await createProgram("1.2.3")
      .parseAsync(["node", "pinkeeper", "--version"])
      .catch((err: unknown) => err);
    expect(error).toBeInstanceOf(CommanderError);
    expect(error).toMatchObject({ exitCode: 0, code: "commander.version" });
    expect(process.stdout.write).toHaveBeenCalledWith("1.2.3\n");
  });

  it("rejects a non-numeric concurrency", async () => {
    const error = await createProgram("1.2.3")
      .parseAsync(["node", "pinkeeper", "reconcile", "--concurrency", "0"])
      .catch((err: unknown) => err);
    expect(error).toMatchObject({ code: "commander.invalidArgument" });
  });

  it("rejects unknown options", async () => {
    const error = await createProgram("1.2.3")
      .parseAsync(["node", "pinkeeper", "reconcile", "--bogus"])
      .catch((err: unknown) => err);
    expect(error).toMatchObject({ code: "commander.unknownOption" });
  });
});
