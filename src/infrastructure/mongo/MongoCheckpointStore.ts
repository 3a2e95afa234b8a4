import { MongoClient, type Collection } from "mongodb";
import type { Cursor } from "../../core/asset/asset.types";
import { isCursor } from "../../core/asset/cursor";
import type { CheckpointStore } from "../../ports/CheckpointStore";

export type CheckpointDoc = {
  _id: string; // namespace
  lastSeenTimestamp: number;
  lastSeenId: number;
  updatedAt: Date;
};

/**
 * One checkpoint document per namespace, upserted by `_id`.
 */
export class MongoCheckpointStore implements CheckpointStore {
  private client?: MongoClient;
  private collection?: Collection<CheckpointDoc>;

  constructor(
    private readonly mongoUri: string,
    private readonly namespace: string,
    private readonly dbName = "asset_fingerprints",
    private readonly collectionName = "checkpoints"
  ) {}

  private async getCollection(): Promise<Collection<CheckpointDoc>> {
    if (this.collection) return this.collection;

    const client = new MongoClient(this.mongoUri);
    try {
      await client.connect();
    } catch (err) {
      await client.close();
      throw err;
    }

    this.client = client;
    this.collection = client.db(this.dbName).collection<CheckpointDoc>(this.collectionName);
    return this.collection;
  }

  async load(): Promise<Cursor | undefined> {
    const col = await this.getCollection();
    const doc = await col.findOne({ _id: this.namespace });
    if (!doc) return undefined;

    const cursor: Cursor = { lastSeenTimestamp: doc.lastSeenTimestamp, lastSeenId: doc.lastSeenId };
    return isCursor(cursor) ? cursor : undefined;
  }

  async save(cursor: Cursor): Promise<void> {
    const col = await this.getCollection();
    await col.updateOne(
      { _id: this.namespace },
      {
        $set: {
          lastSeenTimestamp: cursor.lastSeenTimestamp,
          lastSeenId: cursor.lastSeenId,
          updatedAt: new Date()
        }
      },
      { upsert: true }
    );
  }

  async close(): Promise<void> {
    await this.client?.close();
    this.client = undefined;
    this.collection = undefined;
  }
}
