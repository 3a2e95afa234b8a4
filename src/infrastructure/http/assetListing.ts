import type { AssetReference, RawFileLocator } from "../../core/asset/asset.types";

export class InvalidAssetListingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidAssetListingError";
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parsePositiveInteger = (value: unknown, field: string): number => {
  if (typeof value === "number" && Number.isSafeInteger(value) && value > 0) return value;
  if (typeof value === "string" && /^\d+$/.test(value.trim())) {
    const parsed = Number.parseInt(value.trim(), 10);
    if (Number.isSafeInteger(parsed) && parsed > 0) return parsed;
  }
  throw new InvalidAssetListingError(`Invalid asset: ${field} must be a positive integer`);
};

const parseImportedAt = (value: unknown): number => {
  if (typeof value === "number" && Number.isSafeInteger(value) && value >= 0) return value;
  if (typeof value === "string") {
    const parsed = Date.parse(value);
    if (!Number.isNaN(parsed) && parsed >= 0) return parsed;
  }
  throw new InvalidAssetListingError("Invalid asset: imported_at must be an ISO-8601 string or epoch milliseconds");
};

const parseLocator = (value: unknown, index: number): RawFileLocator => {
  if (!isRecord(value)) throw new InvalidAssetListingError(`Invalid asset: files[${index}] is not an object`);

  const { id, name, size, hash } = value;
  const handle = typeof id === "number" || typeof id === "string" ? String(id).trim() : "";
  if (handle === "") throw new InvalidAssetListingError(`Invalid asset: files[${index}].id is missing`);

  const locator: RawFileLocator = {
    handle,
    fileName: typeof name === "string" && name.trim() !== "" ? name : handle
  };
  if (size != null) {
    if (typeof size !== "number" || !Number.isSafeInteger(size) || size < 0) {
      throw new InvalidAssetListingError(`Invalid asset: files[${index}].size must be a non-negative integer`);
    }
    locator.size = size;
  }
  if (hash != null) {
    if (typeof hash !== "string" || hash.trim() === "") {
      throw new InvalidAssetListingError(`Invalid asset: files[${index}].hash must be a non-empty string`);
    }
    locator.contentHash = hash.trim();
  }
  return locator;
};

/**
 * Wire shape of one entry of `GET /api/assets`:
 * `{ id, name, imported_at, files: [{ id, name, size?, hash? }] }`.
 */
export const parseAssetListing = (raw: unknown): AssetReference => {
  if (!isRecord(raw)) throw new InvalidAssetListingError("Invalid asset: entry is not an object");

  const id = parsePositiveInteger(raw.id, "id");
  const files = raw.files ?? [];
  if (!Array.isArray(files)) throw new InvalidAssetListingError("Invalid asset: files must be an array");

  return {
    id,
    name: typeof raw.name === "string" ? raw.name : `asset-${id}`,
    importedAt: parseImportedAt(raw.imported_at),
    rawFileLocators: files.map((file: unknown, index) => parseLocator(file, index))
  };
};
