import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import {
  configFileKey,
  envVarName,
  loadRuntimeConfig,
  parseConfigFile,
  readEnvConfig
} from "../../src/shared/config/runtime.config";

describe("runtime config sources", () => {
  it("derives env and file names from field names", () => {
    expect(envVarName("pollIntervalSeconds")).toBe("FINGERPRINT_POLL_INTERVAL_SECONDS");
    expect(envVarName("host")).toBe("FINGERPRINT_HOST");
    expect(configFileKey("reconnectInitialDelayMs")).toBe("reconnect_initial_delay_ms");
  });

  it("reads typed values from FINGERPRINT_* variables", () => {
    expect(
      readEnvConfig({
        FINGERPRINT_HOST: " repository.test ",
        FINGERPRINT_PORT: "4080",
        FINGERPRINT_SECURE: "false",
        FINGERPRINT_BATCH_SIZE: "25",
        FINGERPRINT_LOG_LEVEL: "DEBUG",
        FINGERPRINT_WEBHOOK_URL: "http://hooks.test/x",
        FINGERPRINT_PASSWORD: " test-secret ",
        FINGERPRINT_NAMESPACE: "",
        UNRELATED: "ignored"
      })
    ).toEqual({
      host: "repository.test",
      port: 4080,
      secure: false,
      batchSize: 25,
      logLevel: "debug",
      webhookUrl: "http://hooks.test/x",
      password: " test-secret "
    });
  });

  it.each([
    [{ FINGERPRINT_BATCH_SIZE: "0" }, "FINGERPRINT_BATCH_SIZE=0 is out of allowed range [1..10000]"],
    [{ FINGERPRINT_PORT: "abc" }, "FINGERPRINT_PORT=abc is out of allowed range [1..65535]"],
    [{ FINGERPRINT_SECURE: "maybe" }, "FINGERPRINT_SECURE=maybe must be a boolean (true/false)"],
    [{ FINGERPRINT_LOG_LEVEL: "verbose" }, "FINGERPRINT_LOG_LEVEL=verbose must be one of debug, info, warn, error"]
  ])("rejects invalid env %j", (env, message) => {
    expect(() => readEnvConfig(env)).toThrow(message);
  });

  it("parses a snake_case JSON config file", () => {
    const content = JSON.stringify({ host: "file.test", poll_interval_seconds: 30, secure: true, webhook_url: null });

    expect(parseConfigFile(content, "svc.json")).toEqual({ host: "file.test", pollIntervalSeconds: 30, secure: true });
  });

  it.each([
    ["{", /^Config file svc\.json is not valid JSON: /],
    ["[]", /^Config file svc\.json must contain a JSON object$/],
    [JSON.stringify({ pollInterval: 5 }), /^Unknown config key "pollInterval" in svc\.json$/],
    [JSON.stringify({ host: { name: "x" } }), /^Config key "host" in svc\.json must be a string, number or boolean$/],
    [JSON.stringify({ batch_size: 0 }), /^batch_size=0 is out of allowed range \[1\.\.10000\]$/]
  ])("rejects config file %s", (content, message) => {
    expect(() => parseConfigFile(content, "svc.json")).toThrow(message);
  });

  describe("loadRuntimeConfig", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(os.tmpdir(), "fingerprint-config-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("layers command line over file over environment over defaults", async () => {
      const configPath = path.join(dir, "service.json");
      await writeFile(configPath, JSON.stringify({ host: "file.test", batch_size: 20 }), "utf8");

      const config = await loadRuntimeConfig({
        env: {
          FINGERPRINT_USERNAME: "env-user",
          FINGERPRINT_PASSWORD: "test-secret",
          FINGERPRINT_HOST: "env.test",
          FINGERPRINT_BATCH_SIZE: "10",
          FINGERPRINT_NAMESPACE: "org.example.env"
        },
        configPath,
        cli: { host: "cli.test" }
      });

      expect(config).toMatchObject({
        host: "cli.test",
        batchSize: 20,
        username: "env-user",
        namespace: "org.example.env",
        port: 4064
      });
    });

    it("fails when the config file cannot be read", async () => {
      const configPath = path.join(dir, "missing.json");

      await expect(loadRuntimeConfig({ env: {}, configPath })).rejects.toThrow(
        `Config file ${configPath} could not be read:`
      );
    });

    it("requires credentials", async () => {
      await expect(loadRuntimeConfig({ env: {} })).rejects.toThrow("username is required");
    });
  });
});
