export type RawFileLocator = {
  handle: string;
  fileName: string;
  size?: number;
  // Repository-supplied digest of the file content, when the listing has one.
  contentHash?: string;
};

export type AssetReference = {
  readonly id: number;
  readonly name: string;
  readonly importedAt: number; // epoch ms
  readonly rawFileLocators: readonly RawFileLocator[];
};

export type Batch = readonly AssetReference[];

export type Cursor = {
  readonly lastSeenTimestamp: number;
  readonly lastSeenId: number;
};
