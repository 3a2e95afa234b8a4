import {
  resolveIngestionConfig,
  type IngestionConfigInput
} from "../../src/application/ingest-assets/ingestion.config";
import { ConfigError } from "../../src/core/errors/ingestion.errors";

const credentials = { username: "test-user", password: "test-secret" };

describe("ingestion config", () => {
  it("fills defaults around the required credentials", () => {
    expect(resolveIngestionConfig(credentials)).toEqual({
      host: "localhost",
      port: 4064,
      secure: true,
      username: "test-user",
      password: "test-secret",
      pollIntervalSeconds: 60,
      batchSize: 100,
      chunkSizeBytes: 1048576,
      namespace: "org.iscc.omero.sum",
      logLevel: "info",
      maxConnectAttempts: 30,
      reconnectInitialDelayMs: 2000,
      reconnectMaxDelayMs: 30000,
      requestTimeoutMs: 30000,
      processor: "asset-fingerprint-service/0.1.0",
      fingerprintCacheSize: 1000
    });
  });

  it("lets later inputs win and ignores undefined values", () => {
    const config = resolveIngestionConfig(
      { ...credentials, batchSize: 5, host: "first.test" },
      { batchSize: 7, host: undefined },
      { webhookUrl: "   " }
    );

    expect(config.batchSize).toBe(7);
    expect(config.host).toBe("first.test");
    expect(config.webhookUrl).toBeUndefined();
  });

  it.each<[IngestionConfigInput, string]>([
    [{ password: "test-secret" }, "username is required"],
    [{ username: "test-user" }, "password is required"],
    [{ batchSize: 0 }, "batchSize=0 is out of allowed range [1..10000]"],
    [{ port: 70000 }, "port=70000 is out of allowed range [1..65535]"],
    [{ chunkSizeBytes: 0 }, `chunkSizeBytes=0 is out of allowed range [1..${64 * 1024 * 1024}]`],
    [{ pollIntervalSeconds: 0.5 }, "pollIntervalSeconds=0.5 is out of allowed range [1..86400]"],
    [{ namespace: " " }, "namespace is required"],
    [
      { reconnectInitialDelayMs: 5000, reconnectMaxDelayMs: 1000 },
      "reconnectMaxDelayMs must be >= reconnectInitialDelayMs"
    ],
    [{ webhookUrl: "ftp://hooks.test" }, "webhookUrl must use http or https scheme. Received: ftp://hooks.test"],
    [{ webhookUrl: "not a url" }, "webhookUrl must be a valid absolute http/https URL. Received: not a url"],
    [{ checkpointMongoUri: "postgres://db.test" }, "checkpointMongoUri must start with mongodb:// or mongodb+srv://"],
    [{ statusPort: 0 }, "statusPort=0 is out of allowed range [1..65535]"]
  ])("rejects %j", (input, message) => {
    expect(() => resolveIngestionConfig({ ...credentials, ...input })).toThrow(new ConfigError(message));
  });
});
