import type { FingerprintResult } from "./fingerprint.types";

type CachedFingerprint = Omit<FingerprintResult, "sourceFileName" | "fromCache">;

/**
 * Least-recently-used map from a content key to a computed fingerprint, so
 * files the repository reports as identical are streamed once per process.
 */
export class FingerprintCache {
  private readonly entries = new Map<string, CachedFingerprint>();

  constructor(readonly maxEntries: number) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`FingerprintCache maxEntries must be a positive integer, got ${maxEntries}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): CachedFingerprint | undefined {
    const entry = this.entries.get(key);
    if (entry === undefined) return undefined;
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry;
  }

  set(key: string, result: FingerprintResult): void {
    const { code, algorithm, algorithmVersion, byteLength, fileCount } = result;
    this.entries.delete(key);
    this.entries.set(key, { code, algorithm, algorithmVersion, byteLength, fileCount });
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }
}
