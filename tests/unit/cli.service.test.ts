import type { StopController } from "../../src/shared/lifecycle/stopController";

const summary = {
  pollCycles: 1,
  committed: 0,
  duplicates: 0,
  skippedUnreadable: 0,
  connectionFaults: 0,
  notificationFailures: 0,
  checkpointFailures: 0,
  cacheHits: 0
};

const credentials = { FINGERPRINT_USERNAME: "test-user", FINGERPRINT_PASSWORD: "test-secret" };

const mockExit = () =>
  jest.spyOn(process, "exit").mockImplementation(((code?: number) => {
    throw new Error(`EXIT:${String(code)}`);
  }) as never);

describe("service CLI", () => {
  afterEach(() => {
    jest.resetModules();
    jest.restoreAllMocks();
  });

  it("maps flags onto config input", async () => {
    const { parseCliArgs } = await import("../../src/cli/service");

    expect(
      parseCliArgs([
        "--host",
        "repository.test",
        "--port",
        "4080",
        "--no-secure",
        "--batch-size",
        "5",
        "--poll-interval",
        "10",
        "--checkpoint",
        "/tmp/cursor.json",
        "--once",
        "--config",
        "svc.json"
      ])
    ).toEqual({
      configPath: "svc.json",
      once: true,
      config: {
        host: "repository.test",
        port: 4080,
        secure: false,
        batchSize: 5,
        pollIntervalSeconds: 10,
        checkpointPath: "/tmp/cursor.json"
      }
    });
  });

  it("leaves unset flags out of the config input", async () => {
    const { parseCliArgs } = await import("../../src/cli/service");

    expect(parseCliArgs([])).toEqual({ configPath: undefined, once: false, config: {} });
  });

  it("names the flag in range errors", async () => {
    const { parseCliArgs } = await import("../../src/cli/service");

    expect(() => parseCliArgs(["--port", "abc"])).toThrow("--port=abc is out of allowed range [1..65535]");
  });

  it("builds a controlled error envelope without stack by default", async () => {
    const { buildCliErrorEnvelope } = await import("../../src/cli/service");

    const error = Object.assign(new Error("Repository connect failed: connection refused"), {
      name: "RepositoryUnavailableError",
      code: "repository_unavailable",
      context: { assetId: 3, locator: "f-1", status: 503, unsafe: "ignored" },
      cause: { raw: "secret payload" }
    });

    const envelope = buildCliErrorEnvelope(error, false);

    expect(envelope).toEqual({
      event: "service.failed",
      service: "asset-fingerprint-service",
      name: "RepositoryUnavailableError",
      message: "Repository connect failed: connection refused",
      code: "repository_unavailable",
      context: { assetId: 3, locator: "f-1", status: 503 },
      status: 503
    });
    expect(JSON.stringify(envelope)).not.toContain("secret payload");
  });

  it("includes stack only when debug mode is enabled", async () => {
    const { buildCliErrorEnvelope, isDebugMode } = await import("../../src/cli/service");

    expect(isDebugMode({ DEBUG: "true" })).toBe(true);
    expect(isDebugMode({})).toBe(false);
    expect(buildCliErrorEnvelope(new Error("boom"), true).stack).toEqual(expect.stringContaining("boom"));
  });

  it("runs the service with the resolved config", async () => {
    const runService = jest.fn().mockResolvedValue(summary);
    jest.doMock("../../src/composition/root", () => ({ runService }));
    const exitSpy = mockExit();
    const sigintListeners = process.listenerCount("SIGINT");

    const { executeServiceCli } = await import("../../src/cli/service");
    await executeServiceCli(["--once", "--namespace", "org.example.ns"], credentials);

    expect(runService).toHaveBeenCalledWith(
      expect.objectContaining({
        once: true,
        config: expect.objectContaining({ username: "test-user", namespace: "org.example.ns" })
      })
    );
    expect(exitSpy).not.toHaveBeenCalled();
    expect(process.listenerCount("SIGINT")).toBe(sigintListeners);
  });

  it("exits 1 with a JSON envelope on configuration errors", async () => {
    const runService = jest.fn();
    jest.doMock("../../src/composition/root", () => ({ runService }));
    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const exitSpy = mockExit();

    const { executeServiceCli } = await import("../../src/cli/service");
    await expect(executeServiceCli([], {})).rejects.toThrow("EXIT:1");

    expect(runService).not.toHaveBeenCalled();
    expect(exitSpy).toHaveBeenCalledWith(1);
    const logged = String(errorSpy.mock.calls[0]?.[0] ?? "");
    expect(JSON.parse(logged)).toEqual({
      event: "service.failed",
      service: "asset-fingerprint-service",
      name: "ConfigError",
      message: "username is required",
      code: "config_invalid",
      context: { field: "username" }
    });
  });

  it("exits with commander's code on usage errors", async () => {
    jest.doMock("../../src/composition/root", () => ({ runService: jest.fn() }));
    jest.spyOn(process.stderr, "write").mockImplementation(() => true);
    const exitSpy = mockExit();

    const { executeServiceCli } = await import("../../src/cli/service");
    await expect(executeServiceCli(["--bogus"], credentials)).rejects.toThrow("EXIT:1");

    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it("requests a graceful stop on the first signal and hard-exits on the second", async () => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    mockExit();
    const observed: { reason?: string; secondSignal?: unknown } = {};
    const runService = jest.fn().mockImplementation(async (options: { stopController: StopController }) => {
      process.emit("SIGTERM", "SIGTERM");
      observed.reason = options.stopController.stopReason;
      try {
        process.emit("SIGINT", "SIGINT");
      } catch (err) {
        observed.secondSignal = err;
      }
      return summary;
    });
    jest.doMock("../../src/composition/root", () => ({ runService }));

    const { executeServiceCli } = await import("../../src/cli/service");
    await executeServiceCli([], credentials);

    expect(observed.reason).toBe("SIGTERM");
    expect(observed.secondSignal).toEqual(new Error("EXIT:130"));
  });
});
