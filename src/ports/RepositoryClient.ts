import type { AssetReference, RawFileLocator } from "../core/asset/asset.types";
import type { FingerprintRecord } from "../core/fingerprint/fingerprintRecord";

export type RepositoryConnectParams = {
  host: string;
  port: number;
  secure: boolean;
  username: string;
  password: string;
};

export type QueryNewAssetsParams = {
  sinceTimestamp: number;
  sinceId: number;
  limit: number;
};

/**
 * Remote media repository. `TSession` is whatever handle the adapter needs; the
 * orchestrator only passes it back and never reuses one after a fault.
 * `recordExists` and `writeRecord` reject with SourceUnreadableError when the
 * asset no longer exists.
 */
export interface RepositoryClient<TSession> {
  connect(params: RepositoryConnectParams): Promise<TSession>;
  queryNewAssets(session: TSession, params: QueryNewAssetsParams): Promise<AssetReference[]>;
  openRawStream(session: TSession, locator: RawFileLocator): Promise<AsyncIterable<Uint8Array>>;
  recordExists(session: TSession, assetId: number, namespace: string): Promise<boolean>;
  writeRecord(session: TSession, assetId: number, record: FingerprintRecord): Promise<void>;
  close(session: TSession): Promise<void>;
}
