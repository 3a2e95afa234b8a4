import type { AssetReference } from "../asset/asset.types";
import type { FingerprintResult } from "./fingerprint.types";

export type FingerprintRecord = {
  code: string;
  algorithmVersion: string;
  sourceFileName: string;
  computedAt: Date;
  processorIdentity: string;
  namespace: string;
  extensions: Record<string, string>;
};

export type MetadataMap = Record<string, string>;

export const buildFingerprintRecord = (args: {
  asset: AssetReference;
  result: FingerprintResult;
  namespace: string;
  processorIdentity: string;
  computedAt: Date;
}): FingerprintRecord => ({
  code: args.result.code,
  algorithmVersion: args.result.algorithmVersion,
  sourceFileName: args.result.sourceFileName,
  computedAt: args.computedAt,
  processorIdentity: args.processorIdentity,
  namespace: args.namespace,
  extensions: {
    algorithm: args.result.algorithm,
    byte_length: String(args.result.byteLength),
    file_count: String(args.result.fileCount)
  }
});

/**
 * Flattens a record into the persisted key/value map. The fixed keys always win
 * over extension keys of the same name.
 */
export const toMetadataMap = (record: FingerprintRecord): MetadataMap => ({
  ...record.extensions,
  code: record.code,
  version: record.algorithmVersion,
  source_file: record.sourceFileName,
  timestamp: record.computedAt.toISOString(),
  processor: record.processorIdentity
});
