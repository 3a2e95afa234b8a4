import http from "http";
import type { IngestionStatus } from "./application/ingest-assets/ingestion.orchestrator";

const sendJson = (res: http.ServerResponse, status: number, body: unknown) => {
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(body));
};

/**
 * Read-only status endpoint:
 * - GET /status  -> current orchestrator status
 * - GET /healthz -> `{ ok }`, false once the loop has stopped
 */
export const createStatusServer = (getStatus: () => IngestionStatus) => {
  return http.createServer((req, res) => {
    const path = (req.url ?? "/").split("?")[0];

    if (req.method === "GET" && path === "/status") {
      return sendJson(res, 200, getStatus());
    }
    if (req.method === "GET" && path === "/healthz") {
      const { state } = getStatus();
      return sendJson(res, state === "stopped" ? 503 : 200, { ok: state !== "stopped", state });
    }

    sendJson(res, 404, { error: "not_found" });
  });
};
