import http from "http";
import { randomUUID } from "crypto";
import { URL } from "url";

/**
 * In-memory media repository speaking the gateway REST contract. Used by the
 * e2e tests and for local runs (`npm run fake-repository`).
 */
export type FakeFile = { id: string; name: string; content: Buffer; hash?: string };

export type FakeAsset = {
  id: number;
  name: string;
  importedAt: string; // ISO-8601
  files: FakeFile[];
};

export type FakeRecord = { namespace: string; values: Record<string, string> };

export type FakeOperation = "session" | "query" | "content" | "lookup" | "write";

export type FakeRepositoryState = {
  username: string;
  password: string;
  assets: FakeAsset[];
  records: Map<number, FakeRecord[]>;
  tokens: Set<string>;
  /** Number of upcoming requests per operation that answer 503. */
  failNext: Partial<Record<FakeOperation, number>>;
  requests: Array<{ method: string; path: string }>;
};

export const createFakeRepositoryState = (
  init: Partial<Pick<FakeRepositoryState, "username" | "password" | "assets">> = {}
): FakeRepositoryState => ({
  username: init.username ?? "test-user",
  password: init.password ?? "test-secret",
  assets: init.assets ?? [],
  records: new Map(),
  tokens: new Set(),
  failNext: {},
  requests: []
});

const sendJson = (res: http.ServerResponse, status: number, body: unknown) => {
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(body));
};

const readJson = async (req: http.IncomingMessage): Promise<unknown> => {
  const chunks: Buffer[] = [];
  for await (const chunk of req) chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  const text = Buffer.concat(chunks).toString("utf8");
  return text === "" ? undefined : JSON.parse(text);
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const shouldFail = (state: FakeRepositoryState, operation: FakeOperation): boolean => {
  const remaining = state.failNext[operation] ?? 0;
  if (remaining <= 0) return false;
  state.failNext[operation] = remaining - 1;
  return true;
};

const isAfter = (asset: FakeAsset, since: number, sinceId: number) => {
  const importedAt = Date.parse(asset.importedAt);
  return importedAt > since || (importedAt === since && asset.id > sinceId);
};

const toListing = (asset: FakeAsset) => ({
  id: asset.id,
  name: asset.name,
  imported_at: asset.importedAt,
  files: asset.files.map((file) => ({ id: file.id, name: file.name, size: file.content.length, hash: file.hash }))
});

const handle = async (state: FakeRepositoryState, req: http.IncomingMessage, res: http.ServerResponse) => {
  const method = req.method ?? "GET";
  const url = new URL(req.url ?? "/", "http://localhost");
  const path = url.pathname;
  state.requests.push({ method, path });

  if (path === "/api/session" && method === "POST") {
    if (shouldFail(state, "session")) return sendJson(res, 503, { error: "unavailable" });
    const body = await readJson(req);
    if (!isRecord(body) || body.username !== state.username || body.password !== state.password) {
      return sendJson(res, 401, { error: "invalid_credentials" });
    }
    const token = randomUUID();
    state.tokens.add(token);
    return sendJson(res, 200, { token });
  }

  const token = (req.headers.authorization ?? "").replace(/^Bearer /, "");
  if (!state.tokens.has(token)) return sendJson(res, 401, { error: "unauthorized" });

  if (path === "/api/session" && method === "DELETE") {
    state.tokens.delete(token);
    res.writeHead(204);
    return res.end();
  }

  if (path === "/api/assets" && method === "GET") {
    if (shouldFail(state, "query")) return sendJson(res, 503, { error: "unavailable" });
    const since = Number(url.searchParams.get("since") ?? "0");
    const sinceId = Number(url.searchParams.get("since_id") ?? "0");
    const limit = Number(url.searchParams.get("limit") ?? "100");
    const listing = state.assets
      .filter((asset) => isAfter(asset, since, sinceId))
      .sort((a, b) => Date.parse(a.importedAt) - Date.parse(b.importedAt) || a.id - b.id)
      .slice(0, limit)
      .map(toListing);
    return sendJson(res, 200, listing);
  }

  const content = /^\/api\/files\/([^/]+)\/content$/.exec(path);
  if (content && method === "GET") {
    if (shouldFail(state, "content")) return sendJson(res, 503, { error: "unavailable" });
    const handleId = decodeURIComponent(content[1] ?? "");
    const file = state.assets.flatMap((asset) => asset.files).find((candidate) => candidate.id === handleId);
    if (!file) return sendJson(res, 404, { error: "file_not_found" });
    res.writeHead(200, { "content-type": "application/octet-stream" });
    return res.end(file.content);
  }

  const records = /^\/api\/assets\/(\d+)\/records$/.exec(path);
  if (records) {
    const assetId = Number(records[1]);
    if (!state.assets.some((asset) => asset.id === assetId)) return sendJson(res, 404, { error: "asset_not_found" });

    if (method === "GET") {
      if (shouldFail(state, "lookup")) return sendJson(res, 503, { error: "unavailable" });
      const namespace = url.searchParams.get("namespace");
      const found = (state.records.get(assetId) ?? []).filter((record) => record.namespace === namespace);
      return sendJson(res, 200, found);
    }

    if (method === "POST") {
      if (shouldFail(state, "write")) return sendJson(res, 503, { error: "unavailable" });
      const body = await readJson(req);
      if (!isRecord(body) || typeof body.namespace !== "string" || !isRecord(body.values)) {
        return sendJson(res, 400, { error: "invalid_record" });
      }
      const values: Record<string, string> = {};
      for (const [key, value] of Object.entries(body.values)) values[key] = String(value);
      const list = state.records.get(assetId) ?? [];
      list.push({ namespace: body.namespace, values });
      state.records.set(assetId, list);
      return sendJson(res, 201, { ok: true });
    }
  }

  sendJson(res, 404, { error: "not_found" });
};

export const createFakeRepositoryServer = (state: FakeRepositoryState) =>
  http.createServer((req, res) => {
    handle(state, req, res).catch(() => sendJson(res, 500, { error: "internal" }));
  });

if (require.main === module) {
  const port = Number(process.env.FAKE_REPOSITORY_PORT ?? 4064);
  const state = createFakeRepositoryState({
    assets: [1, 2, 3].map((id) => ({
      id,
      name: `sample-${id}.tif`,
      importedAt: new Date(Date.UTC(2024, 0, id)).toISOString(),
      files: [{ id: `file-${id}`, name: `sample-${id}.tif`, content: Buffer.from(`sample payload ${id}\n`) }]
    }))
  });

  createFakeRepositoryServer(state).listen(port, () => {
    // eslint-disable-next-line no-console
    console.log(`Fake repository on http://localhost:${port} (user=${state.username})`);
  });
}
