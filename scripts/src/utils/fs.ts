import { promises as fs } from "node:fs";
import { dirname, join, resolve } from "node:path";
import fsExtra from "fs-extra";

function isMissingFileError(error: unknown): boolean {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return false;
  }
  return error.code === "ENOENT" || error.code === "EISDIR";
}

export async function readTextFile(path: string): Promise<string | null> {
  try {
    const content = await fs.readFile(path, "utf8");
    return content;
  } catch (error) {
    if (isMissingFileError(error)) {
      return null;
    }
    throw error;
  }
}

export async function readBinaryFile(path: string): Promise<Uint8Array | null> {
  try {
    return await fs.readFile(path);
  } catch (error) {
    if (isMissingFileError(error)) {
      return null;
    }
    throw error;
  }
}

/** Walks up from `fromDir` and returns the first `<dir>/<relativePath>` that exists. */
export async function findUpward(fromDir: string, relativePath: string): Promise<string | null> {
  let dir = resolve(fromDir);
  for (;;) {
    const candidate = join(dir, relativePath);
    if (await fsExtra.pathExists(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

export async function writeTextFile(path: string, content: string): Promise<void> {
  await fsExtra.ensureDir(dirname(path));
  const normalized = content.endsWith("\n") ? content : `${content}\n`;
  await fs.writeFile(path, normalized, "utf8");
}

export async function writeJsonFile(path: string, data: unknown): Promise<void> {
  await writeTextFile(path, JSON.stringify(data, null, 2));
}
