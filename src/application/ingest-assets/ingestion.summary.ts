export type AssetOutcome = "committed" | "duplicate" | "skipped_unreadable";

export type IngestionRunSummary = {
  pollCycles: number;
  committed: number;
  duplicates: number;
  skippedUnreadable: number;
  connectionFaults: number;
  notificationFailures: number;
  checkpointFailures: number;
  cacheHits: number;
};

export const createIngestionSummaryTracker = () => {
  const summary: IngestionRunSummary = {
    pollCycles: 0,
    committed: 0,
    duplicates: 0,
    skippedUnreadable: 0,
    connectionFaults: 0,
    notificationFailures: 0,
    checkpointFailures: 0,
    cacheHits: 0
  };

  return {
    addPollCycle: () => {
      summary.pollCycles += 1;
    },
    addOutcome: (outcome: AssetOutcome) => {
      if (outcome === "committed") summary.committed += 1;
      else if (outcome === "duplicate") summary.duplicates += 1;
      else summary.skippedUnreadable += 1;
    },
    addConnectionFault: () => {
      summary.connectionFaults += 1;
    },
    addNotificationFailure: () => {
      summary.notificationFailures += 1;
    },
    addCheckpointFailure: () => {
      summary.checkpointFailures += 1;
    },
    addCacheHit: () => {
      summary.cacheHits += 1;
    },
    summary: (): IngestionRunSummary => ({ ...summary })
  };
};

export type IngestionSummaryTracker = ReturnType<typeof createIngestionSummaryTracker>;
