import type { AssetReference, Batch, Cursor } from "../../core/asset/asset.types";
import { compareAssets, isAfterCursor } from "../../core/asset/cursor";
import { wrapRepositoryFailure } from "../../core/errors/ingestion.errors";
import type { RepositoryClient } from "../../ports/RepositoryClient";

/**
 * Discovers assets imported after the cursor. The cursor filter, ordering and
 * batch bound are re-applied locally so the batch holds whatever the
 * repository answers.
 */
export class AssetMonitor<TSession> {
  constructor(private readonly client: RepositoryClient<TSession>) {}

  async poll(session: TSession, cursor: Cursor, batchSize: number): Promise<Batch> {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new Error("batchSize must be an integer >= 1");
    }

    let found: AssetReference[];
    try {
      found = await this.client.queryNewAssets(session, {
        sinceTimestamp: cursor.lastSeenTimestamp,
        sinceId: cursor.lastSeenId,
        limit: batchSize
      });
    } catch (err) {
      throw wrapRepositoryFailure(err, "query");
    }

    return found
      .filter((asset) => isAfterCursor(asset, cursor))
      .sort(compareAssets)
      .slice(0, batchSize);
  }
}
