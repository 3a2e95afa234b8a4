import type { AssetReference, RawFileLocator } from "../../core/asset/asset.types";
import {
  RepositoryUnavailableError,
  SourceUnreadableError,
  WriteError,
  toErrorMessage,
  type IngestionErrorContext
} from "../../core/errors/ingestion.errors";
import { toMetadataMap, type FingerprintRecord } from "../../core/fingerprint/fingerprintRecord";
import type {
  QueryNewAssetsParams,
  RepositoryClient,
  RepositoryConnectParams
} from "../../ports/RepositoryClient";
import { silentLogger, type Logger } from "../../shared/logging/logger";
import { InvalidAssetListingError, parseAssetListing } from "./assetListing";

export type HttpRepositorySession = {
  readonly baseUrl: string;
  readonly token: string;
};

type FailureFactory = (message: string, context: IngestionErrorContext, cause?: unknown) => Error;

const unavailable: FailureFactory = (message, context, cause) => new RepositoryUnavailableError(message, context, cause);
const writeFailed: FailureFactory = (message, context, cause) => new WriteError(message, context, cause);
const unreadable: FailureFactory = (message, context, cause) => new SourceUnreadableError(message, context, cause);

type RequestSpec = {
  operation: string;
  url: string;
  method?: "GET" | "POST" | "DELETE";
  token?: string;
  json?: unknown;
  fail: FailureFactory;
  // Used instead of `fail` for a 404 on an asset-scoped endpoint.
  notFound?: FailureFactory;
  context?: IngestionErrorContext;
  controller?: AbortController;
};

const nextWithin = <T>(iterator: AsyncIterator<T>, ms: number, onIdle: () => Error): Promise<IteratorResult<T>> =>
  new Promise((resolve, reject) => {
    const timer = setTimeout(() => reject(onIdle()), ms);
    void iterator.next().then(
      (result) => {
        clearTimeout(timer);
        resolve(result);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      }
    );
  });

/**
 * Yields the response body, failing when no data arrives for `idleTimeoutMs`.
 * The request is aborted whenever iteration ends early or fails.
 */
async function* readBody(
  body: AsyncIterable<Uint8Array> | null,
  controller: AbortController,
  idleTimeoutMs: number,
  onIdle: () => Error
): AsyncGenerator<Uint8Array> {
  if (!body) return;
  const iterator = body[Symbol.asyncIterator]();
  let finished = false;
  try {
    for (;;) {
      const next = await nextWithin(iterator, idleTimeoutMs, onIdle);
      if (next.done) {
        finished = true;
        return;
      }
      yield next.value;
    }
  } finally {
    if (!finished) controller.abort();
  }
}

/**
 * Repository gateway client over HTTP(S) using native fetch (Node 20).
 * No retries here: reconnect and retry policy belong to the orchestrator.
 */
export class HttpRepositoryClient implements RepositoryClient<HttpRepositorySession> {
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: { timeoutMs?: number; logger?: Logger } = {}) {
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.logger = options.logger ?? silentLogger;
  }

  async connect(params: RepositoryConnectParams): Promise<HttpRepositorySession> {
    const baseUrl = `${params.secure ? "https" : "http"}://${params.host}:${params.port}`;
    const res = await this.send({
      operation: "connect",
      url: `${baseUrl}/api/session`,
      method: "POST",
      json: { username: params.username, password: params.password },
      fail: unavailable
    });

    const body: unknown = await res.json().catch(() => undefined);
    const token = typeof body === "object" && body != null && "token" in body ? body.token : undefined;
    if (typeof token !== "string" || token === "") {
      throw new RepositoryUnavailableError("Repository connect failed: session response has no token", {
        status: res.status
      });
    }
    return { baseUrl, token };
  }

  async queryNewAssets(session: HttpRepositorySession, params: QueryNewAssetsParams): Promise<AssetReference[]> {
    const url = new URL(`${session.baseUrl}/api/assets`);
    url.searchParams.set("since", String(params.sinceTimestamp));
    url.searchParams.set("since_id", String(params.sinceId));
    url.searchParams.set("limit", String(params.limit));

    const res = await this.send({
      operation: "query",
      url: url.toString(),
      token: session.token,
      fail: unavailable
    });

    const body: unknown = await res.json().catch(() => undefined);
    if (!Array.isArray(body)) {
      throw new RepositoryUnavailableError("Repository query failed: asset listing is not an array", {
        status: res.status
      });
    }

    return body.flatMap((entry: unknown, index) => {
      try {
        return [parseAssetListing(entry)];
      } catch (err) {
        if (!(err instanceof InvalidAssetListingError)) throw err;
        this.logger.warn("repository.asset_invalid", { index, reason: err.message });
        return [];
      }
    });
  }

  async openRawStream(session: HttpRepositorySession, locator: RawFileLocator): Promise<AsyncIterable<Uint8Array>> {
    const context = { locator: locator.handle };
    const controller = new AbortController();
    const res = await this.send({
      operation: "content",
      url: `${session.baseUrl}/api/files/${encodeURIComponent(locator.handle)}/content`,
      token: session.token,
      fail: unreadable,
      context,
      controller
    });
    return readBody(
      res.body,
      controller,
      this.timeoutMs,
      () => new SourceUnreadableError(`Repository content stalled: no data for ${this.timeoutMs}ms`, context)
    );
  }

  async recordExists(session: HttpRepositorySession, assetId: number, namespace: string): Promise<boolean> {
    const url = new URL(`${session.baseUrl}/api/assets/${assetId}/records`);
    url.searchParams.set("namespace", namespace);

    const res = await this.send({
      operation: "record lookup",
      url: url.toString(),
      token: session.token,
      fail: unavailable,
      notFound: unreadable,
      context: { assetId, namespace }
    });

    const body: unknown = await res.json().catch(() => undefined);
    if (!Array.isArray(body)) {
      throw new RepositoryUnavailableError("Repository record lookup failed: response is not an array", {
        assetId,
        namespace,
        status: res.status
      });
    }
    return body.length > 0;
  }

  async writeRecord(session: HttpRepositorySession, assetId: number, record: FingerprintRecord): Promise<void> {
    const res = await this.send({
      operation: "write",
      url: `${session.baseUrl}/api/assets/${assetId}/records`,
      method: "POST",
      token: session.token,
      json: { namespace: record.namespace, values: toMetadataMap(record) },
      fail: writeFailed,
      notFound: unreadable,
      context: { assetId, namespace: record.namespace }
    });
    await res.text().catch(() => "");
  }

  async close(session: HttpRepositorySession): Promise<void> {
    const res = await this.send({
      operation: "close",
      url: `${session.baseUrl}/api/session`,
      method: "DELETE",
      token: session.token,
      fail: unavailable
    });
    await res.text().catch(() => "");
  }

  private async send(spec: RequestSpec): Promise<Response> {
    const context = spec.context ?? {};
    const headers: Record<string, string> = {};
    if (spec.token) headers.authorization = `Bearer ${spec.token}`;
    if (spec.json !== undefined) headers["content-type"] = "application/json";

    const controller = spec.controller ?? new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    let res: Response;
    try {
      res = await fetch(spec.url, {
        method: spec.method ?? "GET",
        headers,
        body: spec.json !== undefined ? JSON.stringify(spec.json) : undefined,
        signal: controller.signal
      });
    } catch (err) {
      if (controller.signal.aborted) {
        throw spec.fail(`Repository ${spec.operation} timeout after ${this.timeoutMs}ms`, context);
      }
      throw spec.fail(`Repository ${spec.operation} request failed: ${toErrorMessage(err)}`, context, err);
    } finally {
      // Bounds the wait for response headers only; streamed bodies use an idle timeout.
      clearTimeout(timeout);
    }

    if (!res.ok) {
      // Drain the body; it is never copied into the error.
      await res.text().catch(() => "");
      if (res.status === 404 && spec.notFound) {
        throw spec.notFound(`Repository ${spec.operation} failed: asset no longer exists (404)`, {
          ...context,
          status: res.status
        });
      }
      const reason = res.status === 401 || res.status === 403 ? "authentication failed" : "failed";
      throw spec.fail(`Repository ${spec.operation} ${reason}: ${res.status}`, { ...context, status: res.status });
    }

    return res;
  }
}
