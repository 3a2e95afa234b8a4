import { AssetMonitor } from "../../src/application/ingest-assets/assetMonitor";
import { initialCursor } from "../../src/core/asset/cursor";
import { RepositoryUnavailableError } from "../../src/core/errors/ingestion.errors";
import { InMemoryRepositoryClient, memoryAsset, toReference } from "../support/inMemoryRepository";

describe("AssetMonitor", () => {
  it("asks for at most batchSize assets after the cursor", async () => {
    const client = new InMemoryRepositoryClient([memoryAsset(1, 1000), memoryAsset(2, 2000), memoryAsset(3, 3000)]);
    const monitor = new AssetMonitor(client);

    const batch = await monitor.poll(1, { lastSeenTimestamp: 1000, lastSeenId: 1 }, 1);

    expect(batch.map((asset) => asset.id)).toEqual([2]);
    expect(client.queries).toEqual([{ sinceTimestamp: 1000, sinceId: 1, limit: 1 }]);
  });

  it("returns an empty batch when nothing is new", async () => {
    const client = new InMemoryRepositoryClient([memoryAsset(1, 1000)]);

    await expect(new AssetMonitor(client).poll(1, { lastSeenTimestamp: 1000, lastSeenId: 1 }, 5)).resolves.toEqual([]);
  });

  it("re-applies cursor filter, ordering and bound to whatever the repository returns", async () => {
    const client = new InMemoryRepositoryClient();
    jest
      .spyOn(client, "queryNewAssets")
      .mockResolvedValue([
        toReference(memoryAsset(9, 3000)),
        toReference(memoryAsset(1, 500)),
        toReference(memoryAsset(4, 2000)),
        toReference(memoryAsset(3, 2000))
      ]);

    const batch = await new AssetMonitor(client).poll(1, { lastSeenTimestamp: 1000, lastSeenId: 0 }, 2);

    expect(batch.map((asset) => asset.id)).toEqual([3, 4]);
  });

  it("surfaces query failures as RepositoryUnavailableError", async () => {
    const client = new InMemoryRepositoryClient();
    client.queryFailures = 1;

    await expect(new AssetMonitor(client).poll(1, initialCursor, 5)).rejects.toThrow(
      new RepositoryUnavailableError("Repository query failed: query unavailable")
    );
  });

  it("rejects a batch size below one", async () => {
    await expect(new AssetMonitor(new InMemoryRepositoryClient()).poll(1, initialCursor, 0)).rejects.toThrow(
      "batchSize must be an integer >= 1"
    );
  });
});
