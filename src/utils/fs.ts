import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";

export async function fileExists(p: string): Promise<boolean> {
  try {
    await fsp.access(p, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export async function isRegularFile(p: string): Promise<boolean> {
  try {
    const stat = await fsp.stat(p);
    return stat.isFile();
  } catch {
    return false;
  }
}

export async function ensureDir(p: string): Promise<void> {
  await fsp.mkdir(p, { recursive: true });
}

export async function readTextFile(p: string): Promise<string> {
  return fsp.readFile(p, "utf8");
}

/** Whole-file overwrite, pretty-printed with a trailing newline. */
export async function writeJsonFile(p: string, value: unknown): Promise<void> {
  await ensureDir(path.dirname(path.resolve(p)));
  await fsp.writeFile(p, `${JSON.stringify(value, null, 2)}\n`, "utf8");
}
