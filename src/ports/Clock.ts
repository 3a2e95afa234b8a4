export interface Clock {
  now(): Date;
  /**
   * Resolves after `ms`, or as soon as `signal` aborts. Never rejects.
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}
