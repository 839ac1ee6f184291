import { spawn } from "node:child_process";
import { CommandFailedError } from "../errors";

export interface ExecResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  /**
   * Keep output to ourselves instead of echoing it to the terminal. Only
   * captured invocations can report their stderr on failure.
   */
  capture?: boolean;
  cwd?: string;
}

export type CommandRunner = (
  command: string,
  args: string[],
  opts?: RunOptions
) => Promise<ExecResult>;

export function execStreaming(
  command: string,
  args: string[],
  cwd: string,
  onStdout?: (chunk: string) => void,
  onStderr?: (chunk: string) => void
): Promise<ExecResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { cwd, windowsHide: true });

    let stdout = "";
    let stderr = "";

    child.stdout.on("data", (buf) => {
      const s = String(buf);
      stdout += s;
      onStdout?.(s);
    });

    child.stderr.on("data", (buf) => {
      const s = String(buf);
      stderr += s;
      onStderr?.(s);
    });

    child.on("error", (err) => reject(err));
    child.on("close", (code) => resolve({ code, stdout, stderr }));
  });
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].join(" ");
}

/**
 * Runs to completion and throws CommandFailedError on a non-zero exit.
 * There is no timeout.
 */
export const runCommand: CommandRunner = async (command, args, opts = {}) => {
  const capture = Boolean(opts.capture);
  const res = await execStreaming(
    command,
    args,
    opts.cwd ?? process.cwd(),
    capture ? undefined : (s) => process.stdout.write(s),
    capture ? undefined : (s) => process.stderr.write(s)
  );

  if (res.code !== 0) {
    const detail = capture ? res.stderr.trim() : "(see above)";
    throw new CommandFailedError(
      `Command failed (exit ${res.code ?? -1}): ${formatCommand(command, args)}\n${detail}`,
      res.code,
      [command, ...args],
      detail
    );
  }
  return res;
};
