import os from "node:os";
import path from "node:path";

export const DEFAULT_CONFIG_FILE = "config.yaml";
export const DEFAULT_PROGRESS_FILE = ".progress.json";
export const DEFAULT_LOG_FILE = "upload_images.log";

export function expandHome(inputPath: string): string {
  if (inputPath !== "~" && !inputPath.startsWith("~/")) {
    return inputPath;
  }
  return path.join(os.homedir(), inputPath.slice(1));
}

export function resolveConfigPath(
  explicit?: string,
  cwd: string = process.cwd()
): string[] {
  if (explicit) {
    return [path.resolve(cwd, expandHome(explicit))];
  }
  return [
    path.resolve(cwd, DEFAULT_CONFIG_FILE),
    path.resolve(cwd, "config.yml")
  ];
}

export function progressFile(
  explicit?: string,
  cwd: string = process.cwd()
): string {
  return path.resolve(cwd, expandHome(explicit ?? DEFAULT_PROGRESS_FILE));
}
