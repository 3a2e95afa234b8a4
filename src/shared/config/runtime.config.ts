import { readFile } from "fs/promises";
import {
  ingestionCaps,
  ingestionConfigKeys,
  resolveIngestionConfig,
  type IngestionConfig,
  type IngestionConfigInput
} from "../../application/ingest-assets/ingestion.config";
import { ConfigError, toErrorMessage } from "../../core/errors/ingestion.errors";
import { isLogLevel } from "../logging/logger";

export type IngestionConfigKey = (typeof ingestionConfigKeys)[number];
type IntegerKey = keyof typeof ingestionCaps;

export type RawConfigValues = Partial<Record<IngestionConfigKey, string>>;

const toSnakeCase = (key: string) => key.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`);

export const ENV_PREFIX = "FINGERPRINT_";

export const envVarName = (key: IngestionConfigKey): string => `${ENV_PREFIX}${toSnakeCase(key).toUpperCase()}`;

export const configFileKey = (key: IngestionConfigKey): string => toSnakeCase(key);

const isIntegerKey = (key: IngestionConfigKey): key is IntegerKey => key in ingestionCaps;

const parseInteger = (name: string, raw: string, range: { min: number; max: number }): number => {
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new ConfigError(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`, { field: name });
  }
  return value;
};

const parseBoolean = (name: string, raw: string): boolean => {
  const normalized = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  throw new ConfigError(`${name}=${raw} must be a boolean (true/false)`, { field: name });
};

/**
 * Converts string-valued settings (environment, command line) into typed config
 * input. Blank values are treated as unset.
 */
export const parseRawConfigValues = (
  values: RawConfigValues,
  nameOf: (key: IngestionConfigKey) => string
): IngestionConfigInput => {
  const input: IngestionConfigInput = {};

  for (const key of ingestionConfigKeys) {
    const raw = values[key];
    if (raw == null || raw.trim() === "") continue;
    const name = nameOf(key);

    if (isIntegerKey(key)) {
      input[key] = parseInteger(name, raw, ingestionCaps[key]);
    } else if (key === "secure") {
      input.secure = parseBoolean(name, raw);
    } else if (key === "logLevel") {
      const level = raw.trim().toLowerCase();
      if (!isLogLevel(level)) {
        throw new ConfigError(`${name}=${raw} must be one of debug, info, warn, error`, { field: name });
      }
      input.logLevel = level;
    } else if (key === "password") {
      input.password = raw;
    } else {
      input[key] = raw.trim();
    }
  }

  return input;
};

export const readEnvConfig = (env: NodeJS.ProcessEnv = process.env): IngestionConfigInput => {
  const values: RawConfigValues = {};
  for (const key of ingestionConfigKeys) {
    const raw = env[envVarName(key)];
    if (raw != null) values[key] = raw;
  }
  return parseRawConfigValues(values, envVarName);
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Parses a JSON config file with snake_case keys (`poll_interval_seconds`, ...).
 * Unknown keys and non-scalar values are rejected.
 */
export const parseConfigFile = (content: string, source: string): IngestionConfigInput => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`Config file ${source} is not valid JSON: ${toErrorMessage(err)}`);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${source} must contain a JSON object`);
  }

  const keyByFileKey = new Map(ingestionConfigKeys.map((key) => [configFileKey(key), key]));
  const values: RawConfigValues = {};

  for (const [fileKey, value] of Object.entries(parsed)) {
    const key = keyByFileKey.get(fileKey);
    if (!key) {
      throw new ConfigError(`Unknown config key "${fileKey}" in ${source}`, { field: fileKey });
    }
    if (value == null) continue;
    if (typeof value !== "string" && typeof value !== "number" && typeof value !== "boolean") {
      throw new ConfigError(`Config key "${fileKey}" in ${source} must be a string, number or boolean`, {
        field: fileKey
      });
    }
    values[key] = String(value);
  }

  return parseRawConfigValues(values, configFileKey);
};

export const loadConfigFile = async (path: string): Promise<IngestionConfigInput> => {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (err) {
    throw new ConfigError(`Config file ${path} could not be read: ${toErrorMessage(err)}`);
  }
  return parseConfigFile(content, path);
};

/**
 * Precedence: command line > config file > environment > defaults.
 */
export const loadRuntimeConfig = async (args: {
  env?: NodeJS.ProcessEnv;
  configPath?: string;
  cli?: IngestionConfigInput;
}): Promise<IngestionConfig> => {
  const fromEnv = readEnvConfig(args.env ?? process.env);
  const fromFile = args.configPath ? await loadConfigFile(args.configPath) : {};
  return resolveIngestionConfig(fromEnv, fromFile, args.cli ?? {});
};
