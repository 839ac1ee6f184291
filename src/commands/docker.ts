import path from "node:path";
import type { Command } from "commander";
import { addGlobalOptions, createLogger, type GlobalOptions } from "./common";
import { parseManifest, selectImageSection } from "../assets/manifest";
import {
  loadConfig,
  requireSwr,
  resolveAssetsFile
} from "../config/loader";
import { ConfigError } from "../errors";
import {
  DockerCliEngine,
  DryRunEngine,
  type ImageEngine
} from "../images/engine";
import { ImagePipeline } from "../images/pipeline";
import { ProgressStore } from "../images/progress";
import {
  formatValidationReport,
  validateManifest
} from "../images/validate";
import { fileExists } from "../utils/fs";
import type { Logger } from "../utils/logger";
import {
  DEFAULT_LOG_FILE,
  DEFAULT_PROGRESS_FILE,
  progressFile
} from "../utils/paths";

export interface UploadImagesOptions extends GlobalOptions {
  dir: string;
  dryRun?: boolean;
  validate?: boolean;
  /** `true` resets everything, a list resets only those keys. */
  reset?: boolean | string[];
  progress?: string;
  /** Commander turns `--no-log-file` into `false`. */
  logFile?: string | false;
}

export interface UploadImagesDeps {
  cwd?: string;
  logger?: Logger;
  print?: (line: string) => void;
  /** Receives the MISSING lines of a validation report. */
  printError?: (line: string) => void;
  env?: NodeJS.ProcessEnv;
  createEngine?: (logger: Logger, bin: string) => ImageEngine;
}

async function resetProgress(
  store: ProgressStore,
  reset: true | string[],
  logger: Logger
): Promise<void> {
  if (reset === true) {
    const removed = await store.reset();
    logger.info(`Resetting all progress (${removed.length} entries)`);
    return;
  }
  const removed = await store.reset(reset);
  for (const name of reset) {
    logger.info(
      removed.includes(name) ? `Reset: ${name}` : `Reset: ${name} (not tracked)`
    );
  }
}

/** Returns the process exit code. Configuration problems throw ConfigError. */
export async function uploadImages(
  opts: UploadImagesOptions,
  deps: UploadImagesDeps = {}
): Promise<number> {
  const cwd = deps.cwd ?? process.cwd();
  // eslint-disable-next-line no-console
  const print = deps.print ?? ((line: string) => console.log(line));
  // eslint-disable-next-line no-console
  const printError = deps.printError ?? ((line: string) => console.error(line));
  const logger =
    deps.logger ??
    createLogger(
      opts,
      opts.logFile === false
        ? undefined
        : path.resolve(cwd, opts.logFile ?? DEFAULT_LOG_FILE)
    );
  const progressPath = progressFile(opts.progress, cwd);

  if (opts.reset !== undefined && opts.reset !== false) {
    const store = await ProgressStore.load(progressPath);
    await resetProgress(store, opts.reset, logger);
    if (!opts.validate) {
      return 0;
    }
  }

  const loaded = await loadConfig({
    configPath: opts.config,
    cwd,
    env: deps.env
  });
  logger.verbose(`config: ${loaded.path}`);

  const manifestFile = resolveAssetsFile(loaded.config, cwd);
  if (!(await fileExists(manifestFile))) {
    throw new ConfigError(`Assets file not found: ${manifestFile}`);
  }
  const directory = path.resolve(cwd, opts.dir);
  if (!(await fileExists(directory))) {
    throw new ConfigError(`Directory not found: ${directory}`);
  }

  const sections = await parseManifest(manifestFile);

  if (opts.validate) {
    logger.info(`=== Validating manifest: ${manifestFile} ===`);
    const report = await validateManifest(sections, directory, logger);
    const lines = formatValidationReport(report);
    lines.found.forEach((line) => print(line));
    lines.missing.forEach((line) => printError(line));
    print(lines.result);
    return report.missing.length > 0 ? 1 : 0;
  }

  const swr = requireSwr(loaded);
  const patterns = selectImageSection(
    sections,
    loaded.config.images_section,
    logger
  );
  if (patterns.length === 0) {
    logger.error("No image patterns found in manifest");
    return 1;
  }

  const bin = loaded.config.docker_bin;
  const engine = opts.dryRun
    ? new DryRunEngine(logger, bin)
    : deps.createEngine?.(logger, bin) ?? new DockerCliEngine({ logger, bin });

  const progress = await ProgressStore.load(progressPath);
  logger.info(
    `Starting: ${patterns.length} images, dry_run=${Boolean(opts.dryRun)}`
  );
  if (opts.dryRun) {
    logger.warn("DRY RUN MODE: no docker commands will be executed");
  }

  const pipeline = new ImagePipeline({
    engine,
    progress,
    logger,
    swr,
    directory,
    cleanupAfterPush: loaded.config.cleanup_after_push
  });
  const summary = await pipeline.run(patterns);

  logger.info(
    `=== Summary: ${summary.done} done, ${summary.failed} failed, ${summary.missing} missing ===`
  );
  return 0;
}

export function registerDockerCommand(program: Command): void {
  const docker = program
    .command("docker")
    .description("Docker image management");

  const cmd = docker
    .command("upload-images")
    .description(
      "Load image tarballs listed in the assets manifest and push them to SWR"
    );

  addGlobalOptions(cmd)
    .option("-d, --dir <path>", "Directory containing asset tarballs", ".")
    .option("--dry-run", "Print docker commands without executing them")
    .option("--validate", "Check that every manifest asset exists, then exit")
    .option(
      "-r, --reset [names...]",
      "Reset progress: everything, or only the named entries"
    )
    .option("--progress <path>", "Progress file", DEFAULT_PROGRESS_FILE)
    .option("--log-file <path>", "Append log lines to this file", DEFAULT_LOG_FILE)
    .option("--no-log-file", "Do not write a log file")
    .addHelpText(
      "after",
      [
        "",
        "Examples:",
        "  sdh docker upload-images --config config.yaml --dir /data/assets",
        "  sdh docker upload-images --dir /data/assets --dry-run",
        "  sdh docker upload-images --dir /data/assets --validate",
        "  sdh docker upload-images --reset",
        '  sdh docker upload-images --reset "name:tag"',
        "",
        "Only one upload may use a progress file at a time."
      ].join("\n")
    )
    .action(async (opts: UploadImagesOptions) => {
      process.exitCode = await uploadImages(opts);
    });
}
