import { z } from "zod";
import { ProgressFormatError, errorMessage } from "../errors";
import { fileExists, readTextFile, writeJsonFile } from "../utils/fs";

export type FailedStatus = `failed: ${string}`;
export type ProgressStatus = "done" | "missing" | FailedStatus;

export function isProgressStatus(value: string): value is ProgressStatus {
  return value === "done" || value === "missing" || value.startsWith("failed: ");
}

export function failedStatus(message: string): FailedStatus {
  return `failed: ${message}`;
}

const ProgressStatusSchema = z.custom<ProgressStatus>(
  (v) => typeof v === "string" && isProgressStatus(v),
  { message: "expected 'done', 'missing' or 'failed: <message>'" }
);

const ProgressFileSchema = z.record(z.string(), ProgressStatusSchema);

export interface ProgressSummary {
  done: number;
  failed: number;
  missing: number;
}

/**
 * Durable key → status map behind resumable uploads. Keys are loaded image
 * references once pushed, or the manifest pattern for missing and failed
 * items. Every mutation is flushed to disk before it returns.
 *
 * One writer per file; nothing guards against two runs sharing it.
 */
export class ProgressStore {
  private readonly entriesByKey: Map<string, ProgressStatus>;

  private constructor(
    readonly filePath: string,
    entries: Iterable<[string, ProgressStatus]> = []
  ) {
    this.entriesByKey = new Map(entries);
  }

  static async load(filePath: string): Promise<ProgressStore> {
    if (!(await fileExists(filePath))) {
      return new ProgressStore(filePath);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(await readTextFile(filePath));
    } catch (err) {
      throw new ProgressFormatError(filePath, errorMessage(err));
    }

    const parsed = ProgressFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue?.path.join(".") || "(root)";
      throw new ProgressFormatError(
        filePath,
        `${where}: ${issue?.message ?? "invalid content"}`
      );
    }
    return new ProgressStore(filePath, Object.entries(parsed.data));
  }

  isDone(key: string): boolean {
    return this.entriesByKey.get(key) === "done";
  }

  entries(): Array<[string, ProgressStatus]> {
    return [...this.entriesByKey.entries()];
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  async set(key: string, status: ProgressStatus): Promise<void> {
    this.entriesByKey.set(key, status);
    await this.save();
  }

  /**
   * Without keys every entry goes, forcing a full re-run. With keys only
   * those entries go; unknown keys are ignored. Returns the removed keys.
   */
  async reset(keys?: readonly string[]): Promise<string[]> {
    let removed: string[];
    if (keys === undefined) {
      removed = [...this.entriesByKey.keys()];
      this.entriesByKey.clear();
    } else {
      removed = keys.filter((key) => this.entriesByKey.delete(key));
    }
    await this.save();
    return removed;
  }

  summary(): ProgressSummary {
    const summary: ProgressSummary = { done: 0, failed: 0, missing: 0 };
    for (const status of this.entriesByKey.values()) {
      if (status === "done") summary.done += 1;
      else if (status === "missing") summary.missing += 1;
      else summary.failed += 1;
    }
    return summary;
  }

  async save(): Promise<void> {
    await writeJsonFile(this.filePath, Object.fromEntries(this.entriesByKey));
  }
}
