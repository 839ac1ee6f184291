import path from "node:path";
import { findMatchingFile } from "../assets/matcher";
import type { Manifest } from "../assets/manifest";
import type { Logger } from "../utils/logger";

export interface FoundAsset {
  section: string;
  pattern: string;
  file: string;
}

export interface MissingAsset {
  section: string;
  pattern: string;
}

export interface ValidationReport {
  found: FoundAsset[];
  missing: MissingAsset[];
}

/** Read-only audit of every manifest section against `directory`. */
export async function validateManifest(
  sections: Manifest,
  directory: string,
  logger: Logger
): Promise<ValidationReport> {
  const report: ValidationReport = { found: [], missing: [] };

  for (const [section, patterns] of sections) {
    for (const pattern of patterns) {
      const match = await findMatchingFile(directory, pattern, logger);
      if (match) {
        report.found.push({ section, pattern, file: path.basename(match) });
      } else {
        report.missing.push({ section, pattern });
      }
    }
  }
  return report;
}

export interface ValidationLines {
  found: string[];
  missing: string[];
  result: string;
}

export function formatValidationReport(report: ValidationReport): ValidationLines {
  return {
    found: report.found.map(
      (f) => `  OK      [${f.section}] ${f.pattern} -> ${f.file}`
    ),
    missing: report.missing.map((m) => `  MISSING [${m.section}] ${m.pattern}`),
    result: `Result: ${report.found.length} found, ${report.missing.length} missing`
  };
}
