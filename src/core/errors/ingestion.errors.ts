export type IngestionErrorCode =
  | "config_invalid"
  | "repository_unavailable"
  | "source_unreadable"
  | "write_failed"
  | "notification_failed"
  | "checkpoint_unavailable";

export type IngestionErrorContext = {
  assetId?: number;
  locator?: string;
  namespace?: string;
  field?: string;
  status?: number;
  attempt?: number;
};

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

const unwrapCause = (reason: unknown): unknown =>
  reason instanceof Error && "cause" in reason && reason.cause != null ? reason.cause : reason;

export class IngestionError extends Error {
  readonly code: IngestionErrorCode;
  readonly context: IngestionErrorContext;
  readonly cause?: unknown;

  constructor(args: { code: IngestionErrorCode; message: string; context?: IngestionErrorContext; cause?: unknown }) {
    super(args.message);
    this.name = "IngestionError";
    this.code = args.code;
    this.context = args.context ?? {};
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigError extends IngestionError {
  constructor(message: string, context: IngestionErrorContext = {}) {
    super({ code: "config_invalid", message, context });
    this.name = "ConfigError";
  }
}

/**
 * Connect, query, dedup and (escalated) write failures. Recoverable: the
 * orchestrator reconnects with backoff.
 */
export class RepositoryUnavailableError extends IngestionError {
  constructor(message: string, context: IngestionErrorContext = {}, cause?: unknown) {
    super({ code: "repository_unavailable", message, context, cause });
    this.name = "RepositoryUnavailableError";
  }
}

/**
 * The raw bytes of one asset cannot be read. Never retried.
 */
export class SourceUnreadableError extends IngestionError {
  constructor(message: string, context: IngestionErrorContext = {}, cause?: unknown) {
    super({ code: "source_unreadable", message, context, cause });
    this.name = "SourceUnreadableError";
  }
}

export class WriteError extends IngestionError {
  constructor(message: string, context: IngestionErrorContext = {}, cause?: unknown) {
    super({ code: "write_failed", message, context, cause });
    this.name = "WriteError";
  }
}

export class NotificationError extends IngestionError {
  constructor(message: string, context: IngestionErrorContext = {}, cause?: unknown) {
    super({ code: "notification_failed", message, context, cause });
    this.name = "NotificationError";
  }
}

/**
 * A checkpoint store that exists but cannot be read. Fatal at startup: running
 * from the initial cursor would overwrite the stored position with an older one.
 */
export class CheckpointUnavailableError extends IngestionError {
  constructor(message: string, context: IngestionErrorContext = {}, cause?: unknown) {
    super({ code: "checkpoint_unavailable", message, context, cause });
    this.name = "CheckpointUnavailableError";
  }
}

export const wrapRepositoryFailure = (
  reason: unknown,
  operation: string,
  context: IngestionErrorContext = {}
): RepositoryUnavailableError => {
  if (reason instanceof RepositoryUnavailableError) return reason;
  const status = reason instanceof IngestionError ? reason.context.status : undefined;
  return new RepositoryUnavailableError(
    `Repository ${operation} failed: ${toErrorMessage(reason)}`,
    status != null ? { ...context, status } : context,
    unwrapCause(reason)
  );
};

export const wrapSourceFailure = (
  reason: unknown,
  context: IngestionErrorContext
): SourceUnreadableError => {
  if (reason instanceof SourceUnreadableError) {
    if (reason.context.assetId != null) return reason;
    return new SourceUnreadableError(reason.message, { ...reason.context, ...context }, reason.cause);
  }
  const where = context.locator != null ? ` (locator=${context.locator})` : "";
  return new SourceUnreadableError(
    `Source unreadable for asset ${String(context.assetId)}${where}: ${toErrorMessage(reason)}`,
    context,
    unwrapCause(reason)
  );
};

export const describeError = (reason: unknown): Record<string, unknown> => {
  const described: Record<string, unknown> = {
    name: reason instanceof Error ? reason.name : "Error",
    message: toErrorMessage(reason)
  };
  if (reason instanceof IngestionError) {
    described.code = reason.code;
    if (reason.context.status != null) described.status = reason.context.status;
  }
  return described;
};
