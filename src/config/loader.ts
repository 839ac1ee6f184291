import path from "node:path";
import yaml from "js-yaml";
import type { ZodError } from "zod";
import { AppConfigSchema, type AppConfig, type SwrConfig } from "./schema";
import { ConfigError } from "../errors";
import { resolveConfigPath } from "../utils/paths";
import { fileExists, readTextFile } from "../utils/fs";

export interface LoadConfigOptions {
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface LoadedConfig {
  path: string;
  config: AppConfig;
}

function formatIssues(err: ZodError): string {
  return err.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

function applySwrOverrides(
  swr: SwrConfig | undefined,
  env: NodeJS.ProcessEnv
): SwrConfig | undefined {
  const endpoint = env.SDH_SWR_ENDPOINT?.trim();
  const org = env.SDH_SWR_ORG?.trim();

  if (swr) {
    return {
      endpoint: endpoint || swr.endpoint,
      org: org || swr.org
    };
  }
  if (endpoint && org) {
    return { endpoint, org };
  }
  return undefined;
}

function parseYaml(file: string, content: string): unknown {
  try {
    return yaml.load(content);
  } catch (err) {
    if (err instanceof yaml.YAMLException) {
      throw new ConfigError(`Error parsing YAML file ${file}: ${err.message}`);
    }
    throw err;
  }
}

export async function loadConfig(
  opts: LoadConfigOptions = {}
): Promise<LoadedConfig> {
  const cwd = opts.cwd ?? process.cwd();
  const candidates = resolveConfigPath(opts.configPath, cwd);

  for (const full of candidates) {
    if (!(await fileExists(full))) {
      continue;
    }
    const raw = parseYaml(full, await readTextFile(full));
    const parsed = AppConfigSchema.safeParse(raw ?? {});
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid config ${full}: ${formatIssues(parsed.error)}`
      );
    }

    const config: AppConfig = {
      ...parsed.data,
      swr: applySwrOverrides(parsed.data.swr, opts.env ?? process.env)
    };
    return { path: full, config };
  }

  throw new ConfigError(
    `Config file not found. Tried: ${candidates.join(", ")}. Use --config <path>.`
  );
}

/** Registry settings are only needed once images are actually pushed. */
export function requireSwr(loaded: LoadedConfig): SwrConfig {
  const swr = loaded.config.swr;
  if (!swr) {
    throw new ConfigError(
      `'swr.endpoint' and 'swr.org' must be set in ${loaded.path}`
    );
  }
  return swr;
}

export function resolveAssetsFile(
  config: AppConfig,
  cwd: string = process.cwd()
): string {
  return path.resolve(cwd, config.assets_file);
}
