import { randomUUID } from "node:crypto";
import { chmod, readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";

export async function readBuildFile(path: string): Promise<string> {
  return readFile(path, "utf-8");
}

async function existingMode(path: string): Promise<number | undefined> {
  try {
    return (await stat(path)).mode & 0o7777;
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return undefined;
    }
    throw err;
  }
}

/**
 * Replace `path` with `content` through a temporary file in the same
 * directory and a rename, keeping the original file mode.
 */
export async function writeFileAtomic(
  path: string,
  content: string,
): Promise<void> {
  const temp = join(
    dirname(path),
    `.${basename(path)}.${process.pid}.${randomUUID().slice(0, 8)}.tmp`,
  );

  const mode = await existingMode(path);

  try {
    await writeFile(temp, content, "utf-8");
    if (mode !== undefined) await chmod(temp, mode);
    await rename(temp, path);
  } catch (err) {
    await rm(temp, { force: true });
    throw err;
  }
}
