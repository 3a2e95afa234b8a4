import { NotificationError, toErrorMessage } from "../../core/errors/ingestion.errors";
import type { AssetFingerprintedEvent, NotificationSink } from "../../ports/NotificationSink";

export type WebhookPayload = {
  event: "fingerprint_generated";
  asset_id: number;
  asset_name: string;
  code: string;
  namespace: string;
  timestamp: string;
};

export const toWebhookPayload = (event: AssetFingerprintedEvent): WebhookPayload => ({
  event: "fingerprint_generated",
  asset_id: event.assetId,
  asset_name: event.assetName,
  code: event.code,
  namespace: event.namespace,
  timestamp: event.computedAt.toISOString()
});

/**
 * POSTs one JSON payload per committed fingerprint. Failures surface as
 * NotificationError; the caller decides to ignore them.
 */
export class WebhookNotificationSink implements NotificationSink {
  constructor(
    private readonly webhookUrl: string,
    private readonly timeoutMs = 10000
  ) {}

  async notify(event: AssetFingerprintedEvent): Promise<void> {
    const context = { assetId: event.assetId, namespace: event.namespace };
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let res: Response;
    try {
      res = await fetch(this.webhookUrl, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(toWebhookPayload(event)),
        signal: controller.signal
      });
    } catch (err) {
      if (controller.signal.aborted) {
        throw new NotificationError(`Webhook timeout after ${this.timeoutMs}ms`, context);
      }
      throw new NotificationError(`Webhook request failed: ${toErrorMessage(err)}`, context, err);
    } finally {
      clearTimeout(timeout);
    }

    await res.text().catch(() => "");
    if (!res.ok) {
      throw new NotificationError(`Webhook returned status ${res.status}`, { ...context, status: res.status });
    }
  }
}
