import { existsSync, readFileSync } from "node:fs";
import { dirname, isAbsolute, resolve } from "node:path";

import { isJsonObject } from "../core/json-extraction.js";
import { ConfigurationError } from "../utils/errors.js";
import { createDefaultConfig, DEFAULT_CONFIG_PATH } from "./defaults.js";
import { formatAjvErrors, validateConfig } from "./schema-validation.js";
import type { MusweepConfig, MusweepConfigInput, ResolvedConfig } from "./types.js";

export interface ResolveConfigOptions {
  configPath?: string;
  rootDir?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: MusweepConfigInput;
  requireCredential?: boolean;
}

export interface ResolveConfigResult {
  config: ResolvedConfig;
  configPath: string;
  apiKey: string | null;
  warnings: string[];
}

const readJsonFile = (path: string): unknown => {
  const raw = readFileSync(path, "utf8");
  try {
    return JSON.parse(raw) as unknown;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Config is not valid JSON: ${path}`, [message]);
  }
};

const deepMerge = (base: unknown, override: unknown): unknown => {
  if (override === undefined) {
    return base;
  }
  if (!isJsonObject(base) || !isJsonObject(override)) {
    return override;
  }
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    merged[key] = deepMerge(base[key], value);
  }
  return merged;
};

const deepFreeze = <T>(value: T): T => {
  if (typeof value === "object" && value !== null) {
    Object.values(value).forEach((child) => deepFreeze(child));
    Object.freeze(value);
  }
  return value;
};

const checkRanges = (config: MusweepConfig): string[] => {
  const errors: string[] = [];
  const { grid } = config;

  grid.beta.forEach((beta) => {
    if (beta < 0 || beta > 1) {
      errors.push(`grid.beta values must lie within [0, 1], got ${beta}`);
    }
  });
  grid.alpha.forEach((alpha) => {
    if (alpha <= 0) {
      errors.push(`grid.alpha values must be > 0, got ${alpha}`);
    }
  });
  grid.k.forEach((k) => {
    if (k <= 0) {
      errors.push(`grid.k values must be > 0, got ${k}`);
    }
  });
  if (config.inference.max_backoff_ms < config.inference.backoff_ms) {
    errors.push("inference.max_backoff_ms must be >= inference.backoff_ms");
  }
  const { seed_scores: seedScores } = config.feedback;
  [...seedScores.cooperative, ...seedScores.adversarial].forEach((entry) => {
    if (entry.to === entry.from) {
      errors.push(`feedback.seed_scores: ${entry.from} -> ${entry.to} is not a peer pair`);
    }
  });

  return errors;
};

export const resolveConfigPath = (configPath: string | undefined, rootDir: string): string => {
  const target = configPath ?? DEFAULT_CONFIG_PATH;
  return isAbsolute(target) ? target : resolve(rootDir, target);
};

/**
 * Loads a config file, merges it over the defaults and validates it.
 * Output paths in the result are absolute, relative to the config file.
 */
export const resolveConfig = (options: ResolveConfigOptions = {}): ResolveConfigResult => {
  const rootDir = options.rootDir ?? process.cwd();
  const env = options.env ?? process.env;
  const configPath = resolveConfigPath(options.configPath, rootDir);
  const warnings: string[] = [];

  if (!existsSync(configPath)) {
    throw new ConfigurationError(`Config not found: ${configPath} (run "musweep init" first)`);
  }

  const raw = readJsonFile(configPath);
  if (!isJsonObject(raw)) {
    throw new ConfigurationError(`Config must be a JSON object: ${configPath}`);
  }

  let merged = deepMerge(createDefaultConfig(), raw);
  const envModel = env.MUSWEEP_MODEL?.trim();
  if (envModel) {
    merged = deepMerge(merged, { inference: { model: envModel } });
  }
  merged = deepMerge(merged, options.overrides);

  if (!validateConfig(merged)) {
    throw new ConfigurationError("Invalid config", formatAjvErrors("config", validateConfig.errors));
  }
  const config = merged;

  const rangeErrors = checkRanges(config);
  if (rangeErrors.length > 0) {
    throw new ConfigurationError("Invalid parameter range", rangeErrors);
  }

  const configDir = dirname(configPath);
  config.output.ledger_path = resolve(configDir, config.output.ledger_path);
  if (config.output.transcripts_path) {
    config.output.transcripts_path = resolve(configDir, config.output.transcripts_path);
  }
  if (config.output.log_path) {
    config.output.log_path = resolve(configDir, config.output.log_path);
  }

  const apiKeyValue = env[config.inference.api_key_env]?.trim();
  const apiKey = apiKeyValue && apiKeyValue.length > 0 ? apiKeyValue : null;
  if (!apiKey) {
    if (options.requireCredential) {
      throw new ConfigurationError(
        `${config.inference.api_key_env} is not set (add it to the environment or a .env file)`
      );
    }
    warnings.push(`${config.inference.api_key_env} is not set; only --mock runs are possible`);
  }

  return {
    config: deepFreeze<ResolvedConfig>(config),
    configPath,
    apiKey,
    warnings
  };
};
