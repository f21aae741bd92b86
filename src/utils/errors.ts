export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type SyncStage = "head" | "fetch" | "receipt" | "commit" | "rollback" | "trim";

/**
 * Failure of one sync step, tagged with the height it was working on so the
 * cycle can be logged and retried without losing context.
 */
export class SyncError extends Error {
  constructor(
    message: string,
    public readonly stage: SyncStage,
    public readonly blockNumber?: number,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "SyncError";
  }
}

export class RpcTimeoutError extends Error {
  constructor(public readonly operation: string, public readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "RpcTimeoutError";
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function causeOf(error: Error): unknown {
  return "cause" in error ? error.cause : undefined;
}

/** Message of the error followed by the messages of its causes. */
export function describeError(error: Error): string {
  const messages = [error.message];
  let cause = causeOf(error);
  while (cause !== undefined && cause !== null && messages.length < 5) {
    const next = toError(cause);
    messages.push(next.message);
    cause = causeOf(next);
  }
  return messages.join(": ");
}
