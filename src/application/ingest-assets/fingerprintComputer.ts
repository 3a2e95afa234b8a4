import type { AssetReference, RawFileLocator } from "../../core/asset/asset.types";
import { SourceUnreadableError, wrapSourceFailure } from "../../core/errors/ingestion.errors";
import type { FingerprintAlgorithm, FingerprintResult } from "../../core/fingerprint/fingerprint.types";
import type { FingerprintCache } from "../../core/fingerprint/fingerprintCache";
import { rechunk } from "../../core/fingerprint/rechunk";
import { sha256Algorithm } from "../../core/fingerprint/sha256.algorithm";
import type { RepositoryClient } from "../../ports/RepositoryClient";

/**
 * Streams an asset's raw files, in locator order, through the hash primitive in
 * fixed-size chunks. Any failure to open or read a file is a SourceUnreadableError.
 * With a cache, an asset whose files all carry content hashes already seen is
 * not streamed again.
 */
export class FingerprintComputer<TSession> {
  constructor(
    private readonly client: RepositoryClient<TSession>,
    private readonly algorithm: FingerprintAlgorithm = sha256Algorithm,
    private readonly cache?: FingerprintCache
  ) {}

  async compute(session: TSession, asset: AssetReference, chunkSize: number): Promise<FingerprintResult> {
    const [first] = asset.rawFileLocators;
    if (!first) {
      throw new SourceUnreadableError(`Asset ${asset.id} has no raw files`, { assetId: asset.id });
    }

    const key = this.cacheKey(asset);
    const cached = key !== undefined ? this.cache?.get(key) : undefined;
    if (cached) return { ...cached, sourceFileName: first.fileName, fromCache: true };

    const result = await this.stream(session, asset, first.fileName, chunkSize);
    if (key !== undefined) this.cache?.set(key, result);
    return result;
  }

  private cacheKey(asset: AssetReference): string | undefined {
    if (!this.cache) return undefined;
    const hashes: string[] = [];
    for (const locator of asset.rawFileLocators) {
      if (locator.contentHash === undefined) return undefined;
      hashes.push(locator.contentHash);
    }
    return `${this.algorithm.name}/${this.algorithm.version}:${hashes.join(",")}`;
  }

  private async stream(
    session: TSession,
    asset: AssetReference,
    sourceFileName: string,
    chunkSize: number
  ): Promise<FingerprintResult> {
    const hasher = this.algorithm.create();
    let byteLength = 0;
    for await (const chunk of rechunk(this.readAll(session, asset), chunkSize)) {
      hasher.update(chunk);
      byteLength += chunk.length;
    }

    return {
      code: hasher.finalize(),
      algorithm: this.algorithm.name,
      algorithmVersion: this.algorithm.version,
      sourceFileName,
      byteLength,
      fileCount: asset.rawFileLocators.length,
      fromCache: false
    };
  }

  private async *readAll(session: TSession, asset: AssetReference): AsyncGenerator<Uint8Array> {
    for (const locator of asset.rawFileLocators) {
      yield* this.readLocator(session, asset, locator);
    }
  }

  private async *readLocator(
    session: TSession,
    asset: AssetReference,
    locator: RawFileLocator
  ): AsyncGenerator<Uint8Array> {
    const context = { assetId: asset.id, locator: locator.handle };

    let stream: AsyncIterable<Uint8Array>;
    try {
      stream = await this.client.openRawStream(session, locator);
    } catch (err) {
      throw wrapSourceFailure(err, context);
    }

    let read = 0;
    try {
      for await (const piece of stream) {
        read += piece.length;
        yield piece;
      }
    } catch (err) {
      throw wrapSourceFailure(err, context);
    }

    // A declared size that disagrees with what was streamed means a truncated read.
    if (locator.size != null && locator.size !== read) {
      throw new SourceUnreadableError(
        `Source unreadable for asset ${asset.id} (locator=${locator.handle}): expected ${locator.size} bytes, read ${read}`,
        context
      );
    }
  }
}
