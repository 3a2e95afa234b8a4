import type { Cursor } from "../core/asset/asset.types";

export interface CheckpointStore {
  load(): Promise<Cursor | undefined>;
  save(cursor: Cursor): Promise<void>;
  close?(): Promise<void>;
}
