import { findMatchingFile } from "../assets/matcher";
import type { SwrConfig } from "../config/schema";
import { LoadOutputError, errorMessage } from "../errors";
import type { Logger } from "../utils/logger";
import type { ImageEngine } from "./engine";
import { failedStatus, type ProgressStore, type ProgressSummary } from "./progress";
import { buildTargetRef } from "./reference";

export interface ImagePipelineOptions {
  engine: ImageEngine;
  progress: ProgressStore;
  logger: Logger;
  swr: SwrConfig;
  /** Directory holding the image tarballs. */
  directory: string;
  cleanupAfterPush?: boolean;
}

export type RefOutcome =
  | { ref: string; state: "skipped" }
  | { ref: string; state: "pushed"; target: string };

export type PatternOutcome =
  | { pattern: string; state: "missing" }
  | { pattern: string; state: "failed"; message: string }
  | { pattern: string; state: "recorded"; tarball: string; refs: RefOutcome[] };

/**
 * Load, retag and push every image pattern, one at a time. Each pattern is
 * isolated: a missing file or a failing docker call is recorded and the
 * batch moves on.
 */
export class ImagePipeline {
  private readonly engine: ImageEngine;
  private readonly progress: ProgressStore;
  private readonly logger: Logger;
  private readonly swr: SwrConfig;
  private readonly directory: string;
  private readonly cleanupAfterPush: boolean;

  constructor(opts: ImagePipelineOptions) {
    this.engine = opts.engine;
    this.progress = opts.progress;
    this.logger = opts.logger;
    this.swr = opts.swr;
    this.directory = opts.directory;
    this.cleanupAfterPush = Boolean(opts.cleanupAfterPush);
  }

  async run(patterns: readonly string[]): Promise<ProgressSummary> {
    for (const pattern of patterns) {
      await this.processPattern(pattern);
    }
    return this.progress.summary();
  }

  async processPattern(pattern: string): Promise<PatternOutcome> {
    try {
      const tarball = await findMatchingFile(this.directory, pattern, this.logger);
      if (!tarball) {
        this.logger.error(`[MISSING] No file found for: ${pattern}`);
        await this.progress.set(pattern, "missing");
        return { pattern, state: "missing" };
      }

      // Not skipped even when some refs are done: the same tarball may
      // still hold pending ones.
      const loaded = await this.engine.load(tarball);
      if (loaded.length === 0) {
        throw new LoadOutputError("");
      }
      this.logger.info(`Loaded: ${loaded.join(", ")}`);

      const refs: RefOutcome[] = [];
      for (const ref of loaded) {
        if (this.progress.isDone(ref)) {
          this.logger.info(`[SKIP] ${ref} (already done)`);
          refs.push({ ref, state: "skipped" });
          continue;
        }

        const target = await this.publish(ref);
        await this.progress.set(ref, "done");
        this.logger.info(`[DONE] ${ref}`);
        refs.push({ ref, state: "pushed", target });
      }
      return { pattern, state: "recorded", tarball, refs };
    } catch (err) {
      const message = errorMessage(err);
      this.logger.error(`[FAILED] ${pattern}: ${message}`);
      await this.progress.set(pattern, failedStatus(message));
      return { pattern, state: "failed", message };
    }
  }

  private async publish(ref: string): Promise<string> {
    const target = buildTargetRef(this.swr, ref);
    await this.engine.tag(ref, target);
    await this.engine.push(target);
    this.logger.info(`[PUSHED] ${target}`);

    if (this.cleanupAfterPush) {
      await this.removeQuietly(ref);
      await this.removeQuietly(target);
    }
    return target;
  }

  private async removeQuietly(ref: string): Promise<void> {
    try {
      await this.engine.remove(ref);
    } catch (err) {
      this.logger.warn(`Failed to remove image ${ref}: ${errorMessage(err)}`);
    }
  }
}
