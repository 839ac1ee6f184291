import type { Command } from "commander";
import { Logger } from "../utils/logger";

export interface GlobalOptions {
  config?: string;
  verbose?: boolean;
}

export function createLogger(opts: GlobalOptions, logFile?: string): Logger {
  return new Logger({
    enabled: true,
    verbose: Boolean(opts.verbose),
    logFile
  });
}

export function addGlobalOptions(cmd: Command): Command {
  return cmd
    .option("-c, --config <path>", "Path to config file (default: config.yaml)")
    .option("--verbose", "Verbose logging");
}
