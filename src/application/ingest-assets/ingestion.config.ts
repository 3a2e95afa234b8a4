import { ConfigError } from "../../core/errors/ingestion.errors";
import { isLogLevel, type LogLevel } from "../../shared/logging/logger";

export type IngestionConfig = {
  host: string;
  port: number;
  secure: boolean;
  username: string;
  password: string;
  pollIntervalSeconds: number;
  batchSize: number;
  chunkSizeBytes: number;
  namespace: string;
  webhookUrl?: string;
  logLevel: LogLevel;
  checkpointPath?: string;
  checkpointMongoUri?: string;
  maxConnectAttempts: number; // 0 = unlimited; applies until the first successful connection
  reconnectInitialDelayMs: number;
  reconnectMaxDelayMs: number;
  requestTimeoutMs: number;
  processor: string;
  statusPort?: number;
  fingerprintCacheSize: number; // 0 disables the content-hash cache
};

export type IngestionConfigInput = Partial<IngestionConfig>;

export const SERVICE_NAME = "asset-fingerprint-service";
export const SERVICE_VERSION = "0.1.0";

export const defaultIngestionConfig: IngestionConfig = {
  host: "localhost",
  port: 4064,
  secure: true,
  username: "",
  password: "",
  pollIntervalSeconds: 60,
  batchSize: 100,
  chunkSizeBytes: 1024 * 1024,
  // Kept for compatibility with existing records; see sha256Algorithm for the code format.
  namespace: "org.iscc.omero.sum",
  logLevel: "info",
  maxConnectAttempts: 30,
  reconnectInitialDelayMs: 2000,
  reconnectMaxDelayMs: 30000,
  requestTimeoutMs: 30000,
  processor: `${SERVICE_NAME}/${SERVICE_VERSION}`,
  fingerprintCacheSize: 1000
};

export const ingestionCaps = {
  port: { min: 1, max: 65535 },
  pollIntervalSeconds: { min: 1, max: 86400 },
  batchSize: { min: 1, max: 10000 },
  chunkSizeBytes: { min: 1, max: 64 * 1024 * 1024 },
  maxConnectAttempts: { min: 0, max: 1_000_000 },
  reconnectInitialDelayMs: { min: 0, max: 600_000 },
  reconnectMaxDelayMs: { min: 0, max: 3_600_000 },
  requestTimeoutMs: { min: 100, max: 600_000 },
  statusPort: { min: 1, max: 65535 },
  fingerprintCacheSize: { min: 0, max: 1_000_000 }
} as const;

export const RECONNECT_MULTIPLIER = 1.5;
export const RECONNECT_JITTER_RATIO = 0.2;

type IntegerField = keyof typeof ingestionCaps;

const assertIntegerInRange = (name: IntegerField, value: number) => {
  const { min, max } = ingestionCaps[name];
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(`${name}=${String(value)} is out of allowed range [${min}..${max}]`, { field: name });
  }
};

const assertNonEmpty = (name: keyof IngestionConfig, value: string) => {
  if (value.trim() === "") {
    throw new ConfigError(`${name} is required`, { field: name });
  }
};

export const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new ConfigError(`${name} must be a valid absolute http/https URL. Received: ${value}`, { field: name });
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigError(`${name} must use http or https scheme. Received: ${value}`, { field: name });
  }

  return value;
};

export const validateIngestionConfig = (config: IngestionConfig): IngestionConfig => {
  assertNonEmpty("host", config.host);
  assertIntegerInRange("port", config.port);
  assertNonEmpty("username", config.username);
  assertNonEmpty("password", config.password);
  assertIntegerInRange("pollIntervalSeconds", config.pollIntervalSeconds);
  assertIntegerInRange("batchSize", config.batchSize);
  assertIntegerInRange("chunkSizeBytes", config.chunkSizeBytes);
  assertNonEmpty("namespace", config.namespace);
  assertNonEmpty("processor", config.processor);
  assertIntegerInRange("maxConnectAttempts", config.maxConnectAttempts);
  assertIntegerInRange("reconnectInitialDelayMs", config.reconnectInitialDelayMs);
  assertIntegerInRange("reconnectMaxDelayMs", config.reconnectMaxDelayMs);
  assertIntegerInRange("requestTimeoutMs", config.requestTimeoutMs);

  if (config.reconnectMaxDelayMs < config.reconnectInitialDelayMs) {
    throw new ConfigError("reconnectMaxDelayMs must be >= reconnectInitialDelayMs", { field: "reconnectMaxDelayMs" });
  }
  if (!isLogLevel(config.logLevel)) {
    throw new ConfigError(`logLevel=${String(config.logLevel)} must be one of debug, info, warn, error`, {
      field: "logLevel"
    });
  }
  if (config.webhookUrl != null) validateHttpUrl("webhookUrl", config.webhookUrl);
  if (config.checkpointMongoUri != null && !/^mongodb(\+srv)?:\/\//.test(config.checkpointMongoUri)) {
    throw new ConfigError("checkpointMongoUri must start with mongodb:// or mongodb+srv://", {
      field: "checkpointMongoUri"
    });
  }
  if (config.statusPort != null) assertIntegerInRange("statusPort", config.statusPort);
  assertIntegerInRange("fingerprintCacheSize", config.fingerprintCacheSize);

  return config;
};

const normalizeOptionalString = (value: string | undefined): string | undefined => {
  if (typeof value !== "string") return undefined;
  const normalized = value.trim();
  return normalized === "" ? undefined : normalized;
};

export const ingestionConfigKeys = [
  "host",
  "port",
  "secure",
  "username",
  "password",
  "pollIntervalSeconds",
  "batchSize",
  "chunkSizeBytes",
  "namespace",
  "webhookUrl",
  "logLevel",
  "checkpointPath",
  "checkpointMongoUri",
  "maxConnectAttempts",
  "reconnectInitialDelayMs",
  "reconnectMaxDelayMs",
  "requestTimeoutMs",
  "processor",
  "statusPort",
  "fingerprintCacheSize"
] as const satisfies readonly (keyof IngestionConfig)[];

const assignDefined = <K extends keyof IngestionConfig>(
  target: IngestionConfig,
  key: K,
  value: IngestionConfig[K] | undefined
) => {
  if (value !== undefined) target[key] = value;
};

/**
 * Layers the given inputs over the defaults (later inputs win; undefined values
 * never override) and validates the result.
 */
export const resolveIngestionConfig = (...inputs: IngestionConfigInput[]): IngestionConfig => {
  const merged: IngestionConfig = { ...defaultIngestionConfig };
  for (const input of inputs) {
    for (const key of ingestionConfigKeys) assignDefined(merged, key, input[key]);
  }

  return validateIngestionConfig({
    ...merged,
    webhookUrl: normalizeOptionalString(merged.webhookUrl),
    checkpointPath: normalizeOptionalString(merged.checkpointPath),
    checkpointMongoUri: normalizeOptionalString(merged.checkpointMongoUri)
  });
};
