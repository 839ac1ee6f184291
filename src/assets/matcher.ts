import fsp from "node:fs/promises";
import path from "node:path";
import ignore from "ignore";
import { isRegularFile } from "../utils/fs";
import type { Logger } from "../utils/logger";

/** Detached signatures and checksums shipped next to the payload files. */
export const SIGNATURE_SUFFIXES = [
  ".asc",
  ".cms",
  ".p7s",
  ".crl",
  ".sha256"
] as const;

const PLACEHOLDER_RUN = /x{3,}/g;

/** `imagexxxname` → `image*name`; shorter runs of `x` stay literal. */
export function patternToGlob(pattern: string): string {
  return pattern.replace(PLACEHOLDER_RUN, "*");
}

export function isSignatureFile(name: string): boolean {
  return SIGNATURE_SUFFIXES.some((suffix) => name.endsWith(suffix));
}

// Glob rules go through gitignore syntax, where a leading # or ! means
// something else.
function toMatcherRule(glob: string): string {
  return /^[#!]/.test(glob) ? `\\${glob}` : glob;
}

/**
 * Names of regular files directly inside `directory` matching `pattern`,
 * in directory listing order, signature files excluded.
 */
export async function listMatches(
  directory: string,
  pattern: string
): Promise<string[]> {
  const matcher = ignore({ ignorecase: false }).add(
    toMatcherRule(patternToGlob(pattern))
  );
  const entries = await fsp.readdir(directory, { withFileTypes: true });

  const names: string[] = [];
  for (const entry of entries) {
    // Names like "..." are not valid rule paths and can never be assets.
    if (!ignore.isPathValid(entry.name)) continue;
    if (!matcher.ignores(entry.name)) continue;
    if (isSignatureFile(entry.name)) continue;
    if (!(await isRegularFile(path.join(directory, entry.name)))) continue;
    names.push(entry.name);
  }
  return names;
}

/**
 * Resolves a manifest pattern to one file. Several candidates are not an
 * error: the first listed wins and the rest are reported.
 */
export async function findMatchingFile(
  directory: string,
  pattern: string,
  logger: Logger
): Promise<string | null> {
  const names = await listMatches(directory, pattern);
  const first = names[0];
  if (first === undefined) {
    return null;
  }
  if (names.length > 1) {
    logger.warn(
      `Multiple matches for '${pattern}': ${names.join(", ")} (using ${first})`
    );
  }
  return path.join(directory, first);
}
