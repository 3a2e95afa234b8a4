/**
 * Cancellation token for the ingestion loop. Checked at suspension points only;
 * it never interrupts a write in progress.
 */
export class StopController {
  private readonly controller = new AbortController();
  private reason?: string;

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get stopRequested(): boolean {
    return this.controller.signal.aborted;
  }

  get stopReason(): string | undefined {
    return this.reason;
  }

  requestStop(reason: string): void {
    if (this.stopRequested) return;
    this.reason = reason;
    this.controller.abort();
  }
}
