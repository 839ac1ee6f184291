import { readTextFile } from "../utils/fs";
import type { Logger } from "../utils/logger";

export const SECTION_MARKER = "#";
export const DEFAULT_SECTION = "default";

/** Section name to patterns, both in file order. */
export type Manifest = Map<string, string[]>;

export function parseManifestText(text: string): Manifest {
  const sections: Manifest = new Map();
  let current = DEFAULT_SECTION;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0) continue;

    if (line.startsWith(SECTION_MARKER)) {
      current = line.replace(/^#+/, "").trim();
      continue;
    }

    // A repeated header keeps appending to the list it started.
    const bucket = sections.get(current);
    if (bucket) {
      bucket.push(line);
    } else {
      sections.set(current, [line]);
    }
  }

  return sections;
}

export async function parseManifest(filePath: string): Promise<Manifest> {
  return parseManifestText(await readTextFile(filePath));
}

export function allPatterns(sections: Manifest): string[] {
  return [...sections.values()].flat();
}

/**
 * Patterns of the first section whose name contains `marker`. Without such
 * a section every pattern in the manifest is treated as an image.
 */
export function selectImageSection(
  sections: Manifest,
  marker: string,
  logger: Logger
): string[] {
  for (const [name, patterns] of sections) {
    if (name.includes(marker)) {
      return patterns;
    }
  }
  logger.warn(`No ${marker} section found in manifest, using all entries`);
  return allPatterns(sections);
}
