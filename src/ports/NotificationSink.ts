export type AssetFingerprintedEvent = {
  assetId: number;
  assetName: string;
  code: string;
  namespace: string;
  computedAt: Date;
};

export interface NotificationSink {
  notify(event: AssetFingerprintedEvent): Promise<void>;
}
