import fs from "node:fs";
import path from "node:path";
import kleur from "kleur";

export type LogLevel = "INFO" | "WARNING" | "ERROR" | "DEBUG";

export interface LoggerOptions {
  enabled: boolean;
  verbose: boolean;
  /** Every emitted line is also appended here, timestamped. */
  logFile?: string;
}

export class Logger {
  private readonly enabled: boolean;
  private readonly verboseEnabled: boolean;
  private readonly logFile?: string;

  constructor(opts: LoggerOptions) {
    this.enabled = opts.enabled;
    this.verboseEnabled = opts.verbose;
    this.logFile = opts.logFile;
    if (this.logFile) {
      fs.mkdirSync(path.dirname(path.resolve(this.logFile)), {
        recursive: true
      });
    }
  }

  info(msg: string): void {
    this.append("INFO", msg);
    if (!this.enabled) return;
    // eslint-disable-next-line no-console
    console.log(kleur.cyan("[sdh]"), msg);
  }

  warn(msg: string): void {
    this.append("WARNING", msg);
    if (!this.enabled) return;
    // eslint-disable-next-line no-console
    console.warn(kleur.yellow("[sdh]"), msg);
  }

  error(msg: string): void {
    this.append("ERROR", msg);
    if (!this.enabled) return;
    // eslint-disable-next-line no-console
    console.error(kleur.red("[sdh]"), msg);
  }

  verbose(msg: string): void {
    if (!this.verboseEnabled) return;
    this.append("DEBUG", msg);
    if (!this.enabled) return;
    // eslint-disable-next-line no-console
    console.log(kleur.gray("[sdh:verbose]"), msg);
  }

  private append(level: LogLevel, msg: string): void {
    if (!this.logFile) return;
    fs.appendFileSync(
      this.logFile,
      `${new Date().toISOString()} [${level}] ${msg}\n`,
      "utf8"
    );
  }
}

export function silentLogger(): Logger {
  return new Logger({ enabled: false, verbose: false });
}
