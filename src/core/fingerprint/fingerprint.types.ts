/**
 * Streaming hash primitive: `update` any number of times, then `finalize` once.
 * The final code must depend only on the bytes fed, never on how they were split.
 */
export interface StreamingHasher {
  update(chunk: Uint8Array): void;
  finalize(): string;
}

export interface FingerprintAlgorithm {
  readonly name: string;
  readonly version: string;
  create(): StreamingHasher;
}

export type FingerprintResult = {
  code: string;
  algorithm: string;
  algorithmVersion: string;
  sourceFileName: string;
  byteLength: number;
  fileCount: number;
  // True when reused from an earlier asset with the same content hashes.
  fromCache: boolean;
};
