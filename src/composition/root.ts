import type { Server } from "http";
import type { IngestionConfig } from "../application/ingest-assets/ingestion.config";
import { IngestionOrchestrator } from "../application/ingest-assets/ingestion.orchestrator";
import type { IngestionRunSummary } from "../application/ingest-assets/ingestion.summary";
import { FileCheckpointStore } from "../infrastructure/checkpoint/FileCheckpointStore";
import { MemoryCheckpointStore } from "../infrastructure/checkpoint/MemoryCheckpointStore";
import { SystemClock } from "../infrastructure/clock/SystemClock";
import { HttpRepositoryClient } from "../infrastructure/http/HttpRepositoryClient";
import { WebhookNotificationSink } from "../infrastructure/http/WebhookNotificationSink";
import { MongoCheckpointStore } from "../infrastructure/mongo/MongoCheckpointStore";
import type { CheckpointStore } from "../ports/CheckpointStore";
import { createStatusServer } from "../server";
import { StopController } from "../shared/lifecycle/stopController";
import { createJsonLogger, type Logger } from "../shared/logging/logger";

export type RunServiceOptions = {
  config: IngestionConfig;
  once?: boolean;
  stopController?: StopController;
  logger?: Logger;
};

/**
 * Mongo wins over a file path; without either the cursor lives in memory and
 * every restart begins from the oldest asset.
 */
export const createCheckpointStore = (config: IngestionConfig, logger: Logger): CheckpointStore => {
  if (config.checkpointMongoUri) return new MongoCheckpointStore(config.checkpointMongoUri, config.namespace);
  if (config.checkpointPath) return new FileCheckpointStore(config.checkpointPath, config.namespace, logger);
  return new MemoryCheckpointStore();
};

const listen = (server: Server, port: number) =>
  new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => {
      server.off("error", reject);
      resolve();
    });
  });

const closeServer = (server: Server) =>
  new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });

export const runService = async (options: RunServiceOptions): Promise<IngestionRunSummary> => {
  const { config } = options;
  const logger = options.logger ?? createJsonLogger({ level: config.logLevel });

  const client = new HttpRepositoryClient({ timeoutMs: config.requestTimeoutMs, logger });
  const checkpoints = createCheckpointStore(config, logger);
  const notifier = config.webhookUrl
    ? new WebhookNotificationSink(config.webhookUrl, config.requestTimeoutMs)
    : undefined;

  const orchestrator = new IngestionOrchestrator({
    client,
    config,
    clock: new SystemClock(),
    logger,
    notifier,
    checkpoints,
    stopController: options.stopController ?? new StopController()
  });

  let statusServer: Server | undefined;
  try {
    if (config.statusPort != null) {
      statusServer = createStatusServer(() => orchestrator.status());
      await listen(statusServer, config.statusPort);
      logger.info("status.listening", { port: config.statusPort });
    }

    return await orchestrator.run({ once: options.once });
  } finally {
    try {
      if (statusServer) await closeServer(statusServer);
    } finally {
      await checkpoints.close?.();
    }
  }
};
