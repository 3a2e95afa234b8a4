import type { IngestionStatus } from "../../src/application/ingest-assets/ingestion.orchestrator";
import { createStatusServer } from "../../src/server";

const status: IngestionStatus = {
  state: "polling",
  connected: true,
  stopRequested: false,
  cursor: { lastSeenTimestamp: 1000, lastSeenId: 1 },
  summary: {
    pollCycles: 1,
    committed: 1,
    duplicates: 0,
    skippedUnreadable: 0,
    connectionFaults: 0,
    notificationFailures: 0,
    checkpointFailures: 0,
    cacheHits: 0
  },
  config: {
    host: "localhost",
    port: 4064,
    secure: true,
    namespace: "org.iscc.omero.sum",
    batchSize: 100,
    pollIntervalSeconds: 60,
    chunkSizeBytes: 1048576
  }
};

const invoke = (getStatus: () => IngestionStatus, method: string, url: string) => {
  const server = createStatusServer(getStatus);
  const handler = server.listeners("request")[0] as ((req: unknown, res: unknown) => void) | undefined;
  const response = { writeHead: jest.fn(), end: jest.fn() };

  handler?.({ method, url }, response);
  server.close();
  return response;
};

describe("status server smoke", () => {
  it("serves the orchestrator status", () => {
    const response = invoke(() => status, "GET", "/status");

    expect(response.writeHead).toHaveBeenCalledWith(200, { "content-type": "application/json" });
    expect(response.end).toHaveBeenCalledWith(JSON.stringify(status));
  });

  it("reports health until the loop stops", () => {
    expect(invoke(() => status, "GET", "/healthz?check=1").end).toHaveBeenCalledWith(
      JSON.stringify({ ok: true, state: "polling" })
    );

    const stopped = invoke(() => ({ ...status, state: "stopped" }), "GET", "/healthz");
    expect(stopped.writeHead).toHaveBeenCalledWith(503, { "content-type": "application/json" });
    expect(stopped.end).toHaveBeenCalledWith(JSON.stringify({ ok: false, state: "stopped" }));
  });

  it("answers 404 elsewhere", () => {
    const response = invoke(() => status, "POST", "/status");

    expect(response.writeHead).toHaveBeenCalledWith(404, { "content-type": "application/json" });
  });
});
