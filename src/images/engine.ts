import path from "node:path";
import { LoadOutputError } from "../errors";
import type { Logger } from "../utils/logger";
import { formatCommand, runCommand, type CommandRunner } from "../utils/shell";

/**
 * The container engine as the pipeline sees it. Every operation throws when
 * the underlying tool fails.
 */
export interface ImageEngine {
  /** Image references contained in the tarball; never empty. */
  load(tarball: string): Promise<string[]>;
  tag(source: string, target: string): Promise<void>;
  push(target: string): Promise<void>;
  remove(ref: string): Promise<void>;
}

const LOADED_IMAGE_LINE = /^Loaded image(?:\s+ID)?:\s*(.+)/i;

export function parseLoadOutput(stdout: string): string[] {
  const images: string[] = [];
  for (const line of stdout.split(/\r?\n/)) {
    const m = LOADED_IMAGE_LINE.exec(line);
    const ref = m?.[1]?.trim();
    if (ref) images.push(ref);
  }
  if (images.length === 0) {
    throw new LoadOutputError(stdout);
  }
  return images;
}

export const dockerArgs = {
  load: (tarball: string) => ["load", "-i", tarball],
  tag: (source: string, target: string) => ["tag", source, target],
  push: (target: string) => ["push", target],
  remove: (ref: string) => ["rmi", ref]
};

export interface DockerCliEngineOptions {
  logger: Logger;
  bin?: string;
  runner?: CommandRunner;
}

export class DockerCliEngine implements ImageEngine {
  private readonly logger: Logger;
  private readonly bin: string;
  private readonly runner: CommandRunner;

  constructor(opts: DockerCliEngineOptions) {
    this.logger = opts.logger;
    this.bin = opts.bin ?? "docker";
    this.runner = opts.runner ?? runCommand;
  }

  async load(tarball: string): Promise<string[]> {
    const res = await this.exec(dockerArgs.load(tarball), true);
    return parseLoadOutput(res);
  }

  async tag(source: string, target: string): Promise<void> {
    await this.exec(dockerArgs.tag(source, target), false);
  }

  async push(target: string): Promise<void> {
    await this.exec(dockerArgs.push(target), false);
  }

  async remove(ref: string): Promise<void> {
    await this.exec(dockerArgs.remove(ref), false);
  }

  private async exec(args: string[], capture: boolean): Promise<string> {
    this.logger.info(`$ ${formatCommand(this.bin, args)}`);
    const res = await this.runner(this.bin, args, { capture });
    return res.stdout;
  }
}

/**
 * Logs what would run and reports success. Loading yields one synthetic
 * reference per tarball, so progress written in this mode never names a
 * real image.
 */
export class DryRunEngine implements ImageEngine {
  constructor(
    private readonly logger: Logger,
    private readonly bin: string = "docker"
  ) {}

  async load(tarball: string): Promise<string[]> {
    this.announce(dockerArgs.load(tarball));
    return [`dry-run/${path.parse(tarball).name}:latest`];
  }

  async tag(source: string, target: string): Promise<void> {
    this.announce(dockerArgs.tag(source, target));
  }

  async push(target: string): Promise<void> {
    this.announce(dockerArgs.push(target));
  }

  async remove(ref: string): Promise<void> {
    this.announce(dockerArgs.remove(ref));
  }

  private announce(args: string[]): void {
    this.logger.info(`$ ${formatCommand(this.bin, args)} [dry-run]`);
  }
}
