import type { AssetReference, Cursor } from "./asset.types";

export const initialCursor: Cursor = { lastSeenTimestamp: 0, lastSeenId: 0 };

const comparePosition = (a: Cursor, b: Cursor): number => {
  if (a.lastSeenTimestamp !== b.lastSeenTimestamp) return a.lastSeenTimestamp - b.lastSeenTimestamp;
  return a.lastSeenId - b.lastSeenId;
};

const positionOf = (asset: AssetReference): Cursor => ({
  lastSeenTimestamp: asset.importedAt,
  lastSeenId: asset.id
});

export const compareAssets = (a: AssetReference, b: AssetReference): number =>
  comparePosition(positionOf(a), positionOf(b));

/**
 * True when the asset sorts strictly after the cursor in (importedAt, id) order.
 */
export const isAfterCursor = (asset: AssetReference, cursor: Cursor): boolean =>
  comparePosition(positionOf(asset), cursor) > 0;

/**
 * Moves the cursor to the asset's position. Never moves backward: an asset at or
 * before the cursor returns the cursor unchanged.
 */
export const advanceCursor = (cursor: Cursor, asset: AssetReference): Cursor =>
  isAfterCursor(asset, cursor) ? positionOf(asset) : cursor;

export const isCursor = (value: unknown): value is Cursor => {
  if (typeof value !== "object" || value == null) return false;
  if (!("lastSeenTimestamp" in value) || !("lastSeenId" in value)) return false;
  const { lastSeenTimestamp, lastSeenId } = value;
  return (
    typeof lastSeenTimestamp === "number" &&
    Number.isSafeInteger(lastSeenTimestamp) &&
    lastSeenTimestamp >= 0 &&
    typeof lastSeenId === "number" &&
    Number.isSafeInteger(lastSeenId) &&
    lastSeenId >= 0
  );
};
