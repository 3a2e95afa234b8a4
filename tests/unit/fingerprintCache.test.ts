import { FingerprintCache } from "../../src/core/fingerprint/fingerprintCache";
import type { FingerprintResult } from "../../src/core/fingerprint/fingerprint.types";

const result = (code: string): FingerprintResult => ({
  code,
  algorithm: "sha256",
  algorithmVersion: "1.0",
  sourceFileName: `${code}.tif`,
  byteLength: 4,
  fileCount: 1,
  fromCache: false
});

describe("FingerprintCache", () => {
  it("stores results without the per-asset file name", () => {
    const cache = new FingerprintCache(2);
    cache.set("k1", result("SHA256:01"));

    expect(cache.get("k1")).toEqual({
      code: "SHA256:01",
      algorithm: "sha256",
      algorithmVersion: "1.0",
      byteLength: 4,
      fileCount: 1
    });
    expect(cache.get("missing")).toBeUndefined();
  });

  it("evicts the least recently used entry", () => {
    const cache = new FingerprintCache(2);
    cache.set("k1", result("SHA256:01"));
    cache.set("k2", result("SHA256:02"));
    cache.get("k1");
    cache.set("k3", result("SHA256:03"));

    expect(cache.size).toBe(2);
    expect(cache.get("k2")).toBeUndefined();
    expect(cache.get("k1")?.code).toBe("SHA256:01");
    expect(cache.get("k3")?.code).toBe("SHA256:03");
  });

  it("rejects a non-positive capacity", () => {
    expect(() => new FingerprintCache(0)).toThrow("FingerprintCache maxEntries must be a positive integer, got 0");
  });
});
