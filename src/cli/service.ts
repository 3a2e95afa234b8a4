#!/usr/bin/env node
import { Command, CommanderError } from "commander";
import { SERVICE_NAME, SERVICE_VERSION, type IngestionConfigInput } from "../application/ingest-assets/ingestion.config";
import { runService } from "../composition/root";
import {
  loadRuntimeConfig,
  parseRawConfigValues,
  type IngestionConfigKey,
  type RawConfigValues
} from "../shared/config/runtime.config";
import { StopController } from "../shared/lifecycle/stopController";
import { createJsonLogger } from "../shared/logging/logger";

type CliOption = {
  key: IngestionConfigKey;
  flag: string;
  argument?: string;
  attribute: string;
  description: string;
};

const cliOptions: CliOption[] = [
  { key: "host", flag: "--host", argument: "<host>", attribute: "host", description: "repository host" },
  { key: "port", flag: "--port", argument: "<port>", attribute: "port", description: "repository port" },
  { key: "secure", flag: "--secure", attribute: "secure", description: "use https (default)" },
  { key: "username", flag: "--username", argument: "<name>", attribute: "username", description: "repository user" },
  {
    key: "password",
    flag: "--password",
    argument: "<password>",
    attribute: "password",
    description: "repository password (prefer FINGERPRINT_PASSWORD)"
  },
  {
    key: "pollIntervalSeconds",
    flag: "--poll-interval",
    argument: "<seconds>",
    attribute: "pollInterval",
    description: "seconds between poll cycles"
  },
  { key: "batchSize", flag: "--batch-size", argument: "<n>", attribute: "batchSize", description: "assets per poll" },
  {
    key: "chunkSizeBytes",
    flag: "--chunk-size",
    argument: "<bytes>",
    attribute: "chunkSize",
    description: "read buffer size in bytes"
  },
  {
    key: "namespace",
    flag: "--namespace",
    argument: "<namespace>",
    attribute: "namespace",
    description: "metadata namespace for fingerprint records"
  },
  {
    key: "webhookUrl",
    flag: "--webhook-url",
    argument: "<url>",
    attribute: "webhookUrl",
    description: "POST a notification per committed fingerprint"
  },
  {
    key: "logLevel",
    flag: "--log-level",
    argument: "<level>",
    attribute: "logLevel",
    description: "debug | info | warn | error"
  },
  {
    key: "checkpointPath",
    flag: "--checkpoint",
    argument: "<path>",
    attribute: "checkpoint",
    description: "file that persists the cursor"
  },
  {
    key: "checkpointMongoUri",
    flag: "--checkpoint-mongo-uri",
    argument: "<uri>",
    attribute: "checkpointMongoUri",
    description: "persist the cursor in MongoDB instead"
  },
  {
    key: "maxConnectAttempts",
    flag: "--max-connect-attempts",
    argument: "<n>",
    attribute: "maxConnectAttempts",
    description: "startup connection attempts before giving up (0 = unlimited)"
  },
  {
    key: "statusPort",
    flag: "--status-port",
    argument: "<port>",
    attribute: "statusPort",
    description: "serve GET /status and /healthz on this port"
  },
  {
    key: "fingerprintCacheSize",
    flag: "--fingerprint-cache-size",
    argument: "<n>",
    attribute: "fingerprintCacheSize",
    description: "fingerprints kept per content hash (0 = off)"
  }
];

export type ParsedCli = {
  configPath?: string;
  once: boolean;
  config: IngestionConfigInput;
};

export const buildProgram = (): Command => {
  const program = new Command()
    .name("asset-fingerprint")
    .description("Fingerprints newly imported repository assets and writes the codes back as metadata")
    .version(SERVICE_VERSION)
    .option("-c, --config <path>", "JSON config file")
    .option("--once", "run a single poll cycle, then exit")
    .exitOverride();

  for (const option of cliOptions) {
    program.option(option.argument ? `${option.flag} ${option.argument}` : option.flag, option.description);
  }
  program.option("--no-secure", "use plain http");

  return program;
};

const flagOf = (key: IngestionConfigKey): string => cliOptions.find((option) => option.key === key)?.flag ?? key;

export const parseCliArgs = (argv: string[]): ParsedCli => {
  const program = buildProgram();
  program.parse(argv, { from: "user" });
  const opts: Record<string, unknown> = program.opts();

  const values: RawConfigValues = {};
  for (const option of cliOptions) {
    const value = opts[option.attribute];
    if (typeof value === "string" || typeof value === "boolean") values[option.key] = String(value);
  }

  return {
    configPath: typeof opts.config === "string" ? opts.config : undefined,
    once: opts.once === true,
    config: parseRawConfigValues(values, flagOf)
  };
};

type ErrorContext = Partial<
  Record<"assetId" | "status" | "attempt", number> & Record<"locator" | "namespace" | "field", string>
>;

type CliErrorEnvelope = {
  event: "service.failed";
  service: string;
  name: string;
  message: string;
  code?: string;
  context?: ErrorContext;
  status?: number;
  stack?: string;
};

const numericContextKeys = ["assetId", "status", "attempt"] as const;
const stringContextKeys = ["locator", "namespace", "field"] as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const extractContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const sanitizedContext: ErrorContext = {};
  for (const key of numericContextKeys) {
    const raw = value[key];
    if (typeof raw === "number" && Number.isFinite(raw)) sanitizedContext[key] = raw;
  }
  for (const key of stringContextKeys) {
    const raw = value[key];
    if (typeof raw === "string") sanitizedContext[key] = raw;
  }

  return Object.keys(sanitizedContext).length > 0 ? sanitizedContext : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: "service.failed",
    service: SERVICE_NAME,
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  const context = extractContext(errorRecord.context);
  if (context) {
    envelope.context = context;
    if (context.status != null) envelope.status = context.status;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

export const executeServiceCli = async (
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): Promise<void> => {
  const stopController = new StopController();
  let signalCount = 0;
  let onSignal: ((signal: NodeJS.Signals) => void) | undefined;

  try {
    const cli = parseCliArgs(argv);
    const config = await loadRuntimeConfig({ env, configPath: cli.configPath, cli: cli.config });
    const logger = createJsonLogger({ level: config.logLevel });

    onSignal = (signal) => {
      signalCount += 1;
      if (signalCount > 1) {
        logger.warn("service.forced_exit", { signal });
        process.exit(130);
      }
      logger.info("service.signal_received", { signal });
      stopController.requestStop(signal);
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);

    await runService({ config, once: cli.once, stopController, logger });
  } catch (err) {
    if (err instanceof CommanderError) {
      // Help, version and usage errors are already printed by commander.
      process.exit(err.exitCode);
    }
    const envelope = buildCliErrorEnvelope(err, isDebugMode(env));
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  } finally {
    if (onSignal) {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
    }
  }
};

if (require.main === module) {
  void executeServiceCli();
}
