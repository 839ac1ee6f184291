/** Missing or invalid configuration. Fatal before any pipeline work starts. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** An external command exited non-zero. */
export class CommandFailedError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly command: string[],
    public readonly detail: string
  ) {
    super(message);
    this.name = "CommandFailedError";
  }
}

/** `docker load` succeeded but printed no recognizable image line. */
export class LoadOutputError extends Error {
  constructor(public readonly output: string) {
    super(`Could not parse loaded image from output:\n${output}`);
    this.name = "LoadOutputError";
  }
}

export class ProgressFormatError extends Error {
  constructor(
    public readonly filePath: string,
    reason: string
  ) {
    super(`Malformed progress file ${filePath}: ${reason}`);
    this.name = "ProgressFormatError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
