import type { AssetReference, Batch, Cursor } from "../../core/asset/asset.types";
import { advanceCursor, initialCursor } from "../../core/asset/cursor";
import {
  CheckpointUnavailableError,
  describeError,
  RepositoryUnavailableError,
  SourceUnreadableError,
  WriteError,
  toErrorMessage,
  wrapRepositoryFailure
} from "../../core/errors/ingestion.errors";
import type { FingerprintAlgorithm, FingerprintResult } from "../../core/fingerprint/fingerprint.types";
import { FingerprintCache } from "../../core/fingerprint/fingerprintCache";
import { buildFingerprintRecord, type FingerprintRecord } from "../../core/fingerprint/fingerprintRecord";
import type { CheckpointStore } from "../../ports/CheckpointStore";
import type { Clock } from "../../ports/Clock";
import type { NotificationSink } from "../../ports/NotificationSink";
import type { RepositoryClient } from "../../ports/RepositoryClient";
import { StopController } from "../../shared/lifecycle/stopController";
import { createJsonLogger, type Logger } from "../../shared/logging/logger";
import { BackoffPolicy } from "../../shared/retry/backoff";
import { AssetMonitor } from "./assetMonitor";
import { DeduplicationFilter } from "./deduplicationFilter";
import { FingerprintComputer } from "./fingerprintComputer";
import {
  RECONNECT_JITTER_RATIO,
  RECONNECT_MULTIPLIER,
  resolveIngestionConfig,
  type IngestionConfig,
  type IngestionConfigInput
} from "./ingestion.config";
import {
  createIngestionSummaryTracker,
  type AssetOutcome,
  type IngestionRunSummary
} from "./ingestion.summary";

export type OrchestratorState = "disconnected" | "connecting" | "polling" | "processing" | "stopping" | "stopped";

export type IngestionOrchestratorDeps<TSession> = {
  client: RepositoryClient<TSession>;
  config: IngestionConfigInput;
  clock: Clock;
  logger?: Logger;
  notifier?: NotificationSink;
  checkpoints?: CheckpointStore;
  algorithm?: FingerprintAlgorithm;
  stopController?: StopController;
  randomFn?: () => number;
  onStateChange?: (from: OrchestratorState, to: OrchestratorState) => void;
};

export type IngestionStatus = {
  state: OrchestratorState;
  connected: boolean;
  stopRequested: boolean;
  cursor: Cursor;
  summary: IngestionRunSummary;
  config: Pick<
    IngestionConfig,
    "host" | "port" | "secure" | "namespace" | "batchSize" | "pollIntervalSeconds" | "chunkSizeBytes"
  >;
};

const WRITE_ATTEMPTS = 2;

type CycleOutcome = "completed" | "connection_fault" | "stopped";

type AssetProcessing =
  | { kind: "handled"; outcome: AssetOutcome }
  | { kind: "connection_fault"; error: RepositoryUnavailableError };

/**
 * Drives connect -> poll -> (dedup -> compute -> write -> advance) per asset ->
 * sleep, one asset at a time. The cursor only moves past assets that were
 * committed, found already processed, or skipped as unreadable.
 */
export class IngestionOrchestrator<TSession> {
  private readonly config: IngestionConfig;
  private readonly client: RepositoryClient<TSession>;
  private readonly monitor: AssetMonitor<TSession>;
  private readonly filter: DeduplicationFilter<TSession>;
  private readonly computer: FingerprintComputer<TSession>;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly notifier?: NotificationSink;
  private readonly checkpoints?: CheckpointStore;
  private readonly stopController: StopController;
  private readonly backoff: BackoffPolicy;
  private readonly onStateChange?: (from: OrchestratorState, to: OrchestratorState) => void;
  private readonly tracker = createIngestionSummaryTracker();

  private state: OrchestratorState = "disconnected";
  private session?: { handle: TSession };
  private cursor: Cursor = initialCursor;
  private everConnected = false;
  private started = false;

  constructor(deps: IngestionOrchestratorDeps<TSession>) {
    this.config = resolveIngestionConfig(deps.config);
    this.client = deps.client;
    this.monitor = new AssetMonitor(deps.client);
    this.filter = new DeduplicationFilter(deps.client);
    this.computer = new FingerprintComputer(
      deps.client,
      deps.algorithm,
      this.config.fingerprintCacheSize > 0 ? new FingerprintCache(this.config.fingerprintCacheSize) : undefined
    );
    this.clock = deps.clock;
    this.logger = deps.logger ?? createJsonLogger({ level: this.config.logLevel });
    this.notifier = deps.notifier;
    this.checkpoints = deps.checkpoints;
    this.stopController = deps.stopController ?? new StopController();
    this.onStateChange = deps.onStateChange;
    this.backoff = new BackoffPolicy({
      initialDelayMs: this.config.reconnectInitialDelayMs,
      maxDelayMs: this.config.reconnectMaxDelayMs,
      multiplier: RECONNECT_MULTIPLIER,
      jitterRatio: RECONNECT_JITTER_RATIO,
      randomFn: deps.randomFn
    });
  }

  get currentState(): OrchestratorState {
    return this.state;
  }

  get currentCursor(): Cursor {
    return this.cursor;
  }

  requestStop(reason = "requested"): void {
    if (!this.stopController.stopRequested) {
      this.logger.info("ingestion.stop_requested", { reason, state: this.state });
    }
    this.stopController.requestStop(reason);
  }

  status(): IngestionStatus {
    const { host, port, secure, namespace, batchSize, pollIntervalSeconds, chunkSizeBytes } = this.config;
    return {
      state: this.state,
      connected: this.session != null,
      stopRequested: this.stopController.stopRequested,
      cursor: this.cursor,
      summary: this.tracker.summary(),
      config: { host, port, secure, namespace, batchSize, pollIntervalSeconds, chunkSizeBytes }
    };
  }

  /**
   * Runs until a stop is requested, or for exactly one poll cycle with `once`.
   * Rejects when the checkpoint store cannot be read, when the first connection
   * cannot be established within `maxConnectAttempts`, or on an unexpected
   * (non-ingestion) error.
   */
  async run(options: { once?: boolean } = {}): Promise<IngestionRunSummary> {
    if (this.started) throw new Error("IngestionOrchestrator.run may only be called once");
    this.started = true;

    try {
      this.cursor = await this.loadCheckpoint();
    } catch (err) {
      this.transition("stopped");
      throw err;
    }
    this.logger.info("ingestion.started", {
      namespace: this.config.namespace,
      once: options.once === true,
      cursor: this.cursor
    });

    try {
      while (!this.stopController.stopRequested) {
        const session = this.session ?? (await this.connect());
        if (!session) break;

        const outcome = await this.runCycle(session.handle);
        if (options.once || outcome === "stopped") break;
        if (outcome === "connection_fault") {
          // Reconnect on the backoff schedule, not in a tight loop.
          await this.clock.sleep(this.backoff.next(), this.stopController.signal);
          continue;
        }

        await this.clock.sleep(this.config.pollIntervalSeconds * 1000, this.stopController.signal);
      }
    } finally {
      await this.shutdown();
    }

    const summary = this.tracker.summary();
    this.logger.info("ingestion.completed", { ...summary, cursor: this.cursor });
    return summary;
  }

  private transition(next: OrchestratorState): void {
    if (this.state === next) return;
    const previous = this.state;
    this.state = next;
    this.logger.debug("ingestion.state_changed", { from: previous, to: next });
    this.onStateChange?.(previous, next);
  }

  private async connect(): Promise<{ handle: TSession } | undefined> {
    this.transition("connecting");
    const { host, port, secure, username, password, maxConnectAttempts } = this.config;

    while (!this.stopController.stopRequested) {
      try {
        const handle = await this.client.connect({ host, port, secure, username, password });
        this.session = { handle };
        this.everConnected = true;
        this.backoff.reset();
        this.logger.info("repository.connected", { host, port });
        return this.session;
      } catch (err) {
        const error = wrapRepositoryFailure(err, "connect");
        const attempt = this.backoff.attempts + 1;
        if (!this.everConnected && maxConnectAttempts > 0 && attempt >= maxConnectAttempts) {
          this.logger.error("repository.connect_gave_up", { host, port, attempt, ...describeError(error) });
          throw error;
        }

        const delayMs = this.backoff.next();
        this.logger.warn("repository.connect_failed", { host, port, attempt, delayMs, ...describeError(error) });
        await this.clock.sleep(delayMs, this.stopController.signal);
      }
    }

    return undefined;
  }

  private async runCycle(session: TSession): Promise<CycleOutcome> {
    this.transition("polling");

    let batch: Batch;
    try {
      batch = await this.monitor.poll(session, this.cursor, this.config.batchSize);
    } catch (err) {
      if (err instanceof RepositoryUnavailableError) {
        await this.handleConnectionFault(err, "poll");
        return "connection_fault";
      }
      throw err;
    }
    this.tracker.addPollCycle();

    if (batch.length === 0) {
      this.logger.debug("ingestion.poll_empty", { cursor: this.cursor });
      return "completed";
    }

    this.logger.info("ingestion.batch_found", {
      count: batch.length,
      firstAssetId: batch[0]?.id,
      lastAssetId: batch[batch.length - 1]?.id
    });
    this.transition("processing");

    for (const [index, asset] of batch.entries()) {
      if (this.stopController.stopRequested) {
        this.logger.info("ingestion.stop_observed", { remaining: batch.length - index, cursor: this.cursor });
        return "stopped";
      }

      const processed = await this.processAsset(session, asset);
      if (processed.kind === "connection_fault") {
        await this.handleConnectionFault(processed.error, "processing");
        return "connection_fault";
      }

      this.tracker.addOutcome(processed.outcome);
      this.cursor = advanceCursor(this.cursor, asset);
      await this.saveCheckpoint();
    }

    this.transition("polling");
    return "completed";
  }

  private async processAsset(session: TSession, asset: AssetReference): Promise<AssetProcessing> {
    const { namespace } = this.config;

    let alreadyProcessed: boolean;
    try {
      alreadyProcessed = await this.filter.isProcessed(session, asset, namespace);
    } catch (err) {
      if (err instanceof SourceUnreadableError) return this.skip(asset, err);
      if (err instanceof RepositoryUnavailableError) return { kind: "connection_fault", error: err };
      throw err;
    }
    if (alreadyProcessed) {
      this.logger.debug("ingestion.asset_duplicate", { assetId: asset.id, namespace });
      return { kind: "handled", outcome: "duplicate" };
    }

    let result: FingerprintResult;
    try {
      result = await this.computer.compute(session, asset, this.config.chunkSizeBytes);
    } catch (err) {
      if (err instanceof SourceUnreadableError) return this.skip(asset, err);
      throw err;
    }
    if (result.fromCache) this.tracker.addCacheHit();

    const record = buildFingerprintRecord({
      asset,
      result,
      namespace,
      processorIdentity: this.config.processor,
      computedAt: this.clock.now()
    });

    try {
      await this.commit(session, asset, record);
    } catch (err) {
      if (err instanceof SourceUnreadableError) return this.skip(asset, err);
      return { kind: "connection_fault", error: wrapRepositoryFailure(err, "write", { assetId: asset.id, namespace }) };
    }

    this.logger.info("ingestion.asset_committed", {
      assetId: asset.id,
      assetName: asset.name,
      code: record.code,
      sourceFile: record.sourceFileName,
      bytes: result.byteLength,
      cached: result.fromCache
    });
    await this.notify(asset, record);
    return { kind: "handled", outcome: "committed" };
  }

  private skip(asset: AssetReference, err: SourceUnreadableError): AssetProcessing {
    this.logger.warn("ingestion.asset_skipped", {
      assetId: asset.id,
      assetName: asset.name,
      locator: err.context.locator,
      ...describeError(err)
    });
    return { kind: "handled", outcome: "skipped_unreadable" };
  }

  /**
   * Writes the record, retrying once immediately on failure. An asset that no
   * longer exists is not retried.
   */
  private async commit(session: TSession, asset: AssetReference, record: FingerprintRecord): Promise<void> {
    const context = { assetId: asset.id, namespace: record.namespace };
    for (let attempt = 1; ; attempt += 1) {
      try {
        await this.client.writeRecord(session, asset.id, record);
        return;
      } catch (err) {
        if (err instanceof SourceUnreadableError) throw err;
        const error =
          err instanceof WriteError
            ? err
            : new WriteError(`Record write failed for asset ${asset.id}: ${toErrorMessage(err)}`, context, err);
        const fields = { ...context, attempt, maxAttempts: WRITE_ATTEMPTS, ...describeError(error) };
        if (attempt >= WRITE_ATTEMPTS) {
          this.logger.error("ingestion.write_failed", fields);
          throw error;
        }
        this.logger.warn("ingestion.write_retry", fields);
      }
    }
  }

  private async notify(asset: AssetReference, record: FingerprintRecord): Promise<void> {
    if (!this.notifier) return;
    try {
      await this.notifier.notify({
        assetId: asset.id,
        assetName: asset.name,
        code: record.code,
        namespace: record.namespace,
        computedAt: record.computedAt
      });
    } catch (err) {
      this.tracker.addNotificationFailure();
      this.logger.warn("notification.failed", { assetId: asset.id, ...describeError(err) });
    }
  }

  private async handleConnectionFault(error: RepositoryUnavailableError, phase: "poll" | "processing"): Promise<void> {
    this.tracker.addConnectionFault();
    this.logger.warn("repository.connection_fault", {
      phase,
      assetId: error.context.assetId,
      cursor: this.cursor,
      ...describeError(error)
    });
    await this.closeSession();
    this.transition("disconnected");
  }

  private async closeSession(): Promise<void> {
    const session = this.session;
    this.session = undefined;
    if (!session) return;

    try {
      await this.client.close(session.handle);
    } catch (err) {
      this.logger.debug("repository.close_failed", describeError(err));
    }
  }

  private async loadCheckpoint(): Promise<Cursor> {
    if (!this.checkpoints) return initialCursor;
    let loaded: Cursor | undefined;
    try {
      loaded = await this.checkpoints.load();
    } catch (err) {
      const error = new CheckpointUnavailableError(`Checkpoint could not be loaded: ${toErrorMessage(err)}`, {}, err);
      this.logger.error("checkpoint.load_failed", describeError(error));
      throw error;
    }
    if (loaded) this.logger.info("checkpoint.loaded", { cursor: loaded });
    return loaded ?? initialCursor;
  }

  private async saveCheckpoint(): Promise<void> {
    if (!this.checkpoints) return;
    try {
      await this.checkpoints.save(this.cursor);
    } catch (err) {
      this.tracker.addCheckpointFailure();
      this.logger.warn("checkpoint.save_failed", { cursor: this.cursor, ...describeError(err) });
    }
  }

  private async shutdown(): Promise<void> {
    this.transition("stopping");
    await this.closeSession();
    await this.saveCheckpoint();
    this.transition("stopped");
    this.logger.info("ingestion.stopped", { reason: this.stopController.stopReason ?? "run_finished" });
  }
}
