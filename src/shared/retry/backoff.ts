export type BackoffOptions = {
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier?: number;
  jitterRatio?: number;
  randomFn?: () => number;
};

const clamp01 = (value: number) => Math.min(1, Math.max(0, value));

/**
 * Delay before retry number `attempt` (0-based): `initial * multiplier^attempt`,
 * capped at `maxDelayMs`, plus up to `jitterRatio` of that as random jitter.
 */
export const computeBackoffDelay = (attempt: number, opts: BackoffOptions): number => {
  const { initialDelayMs, maxDelayMs, multiplier = 2, jitterRatio = 0.2, randomFn = Math.random } = opts;
  const base = Math.floor(Math.min(maxDelayMs, initialDelayMs * Math.pow(multiplier, attempt)));
  const jitter = Math.floor(base * clamp01(jitterRatio) * clamp01(randomFn()));
  return base + jitter;
};

/**
 * Stateful reconnect schedule consumed by the connecting state: each `next()`
 * grows the delay until `reset()` after a successful handshake.
 */
export class BackoffPolicy {
  private attempt = 0;

  constructor(private readonly opts: BackoffOptions) {
    if (!(opts.initialDelayMs >= 0) || !(opts.maxDelayMs >= opts.initialDelayMs)) {
      throw new Error("backoff requires 0 <= initialDelayMs <= maxDelayMs");
    }
    if (opts.multiplier != null && !(opts.multiplier >= 1)) {
      throw new Error("backoff multiplier must be >= 1");
    }
  }

  get attempts(): number {
    return this.attempt;
  }

  next(): number {
    const delayMs = computeBackoffDelay(this.attempt, this.opts);
    this.attempt += 1;
    return delayMs;
  }

  reset(): void {
    this.attempt = 0;
  }
}
