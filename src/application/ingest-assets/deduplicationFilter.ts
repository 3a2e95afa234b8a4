import type { AssetReference } from "../../core/asset/asset.types";
import { SourceUnreadableError, wrapRepositoryFailure, wrapSourceFailure } from "../../core/errors/ingestion.errors";
import type { RepositoryClient } from "../../ports/RepositoryClient";

export class DeduplicationFilter<TSession> {
  constructor(private readonly client: RepositoryClient<TSession>) {}

  /**
   * Rejects with SourceUnreadableError when the asset no longer exists, and with
   * RepositoryUnavailableError for any other lookup failure.
   */
  async isProcessed(session: TSession, asset: AssetReference, namespace: string): Promise<boolean> {
    try {
      return await this.client.recordExists(session, asset.id, namespace);
    } catch (err) {
      const context = { assetId: asset.id, namespace };
      if (err instanceof SourceUnreadableError) throw wrapSourceFailure(err, context);
      throw wrapRepositoryFailure(err, "record lookup", context);
    }
  }
}
