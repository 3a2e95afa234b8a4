import type { Cursor } from "../../core/asset/asset.types";
import type { CheckpointStore } from "../../ports/CheckpointStore";

/**
 * Keeps the cursor for the life of the process only.
 */
export class MemoryCheckpointStore implements CheckpointStore {
  private cursor?: Cursor;

  constructor(initial?: Cursor) {
    this.cursor = initial;
  }

  async load(): Promise<Cursor | undefined> {
    return this.cursor;
  }

  async save(cursor: Cursor): Promise<void> {
    this.cursor = cursor;
  }
}
