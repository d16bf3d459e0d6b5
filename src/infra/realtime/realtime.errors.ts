export type RealtimeErrorCode =
  | "TRANSPORT"
  | "OVERSIZED_MESSAGE"
  | "SLOW_CONSUMER"
  | "DEADLINE_EXCEEDED"
  | "HUB_CLOSED";

/**
 * Failures that end a single connection (or, for HUB_CLOSED, a whole room).
 * They never propagate to other connections or to the broadcaster.
 */
export class RealtimeError extends Error {
  constructor(
    public readonly code: RealtimeErrorCode,
    message: string,
    public readonly details?: unknown,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "RealtimeError";
  }
}

export class TransportError extends RealtimeError {
  constructor(message: string, options?: ErrorOptions) {
    super("TRANSPORT", message, undefined, options);
    this.name = "TransportError";
  }
}

export class OversizedMessageError extends RealtimeError {
  constructor(byteLength: number, limit: number) {
    super("OVERSIZED_MESSAGE", `Message of ${byteLength} bytes exceeds the ${limit} byte limit`, {
      byteLength,
      limit,
    });
    this.name = "OversizedMessageError";
  }
}

export class SlowConsumerError extends RealtimeError {
  constructor(connId: string) {
    super("SLOW_CONSUMER", `Outbound queue of ${connId} is full`, { connId });
    this.name = "SlowConsumerError";
  }
}

export class DeadlineExceededError extends RealtimeError {
  constructor(operation: "read" | "write" | "ping" | "close", timeoutMs: number) {
    super("DEADLINE_EXCEEDED", `${operation} deadline of ${timeoutMs}ms exceeded`, {
      operation,
      timeoutMs,
    });
    this.name = "DeadlineExceededError";
  }
}

export type HubClosedReason = "stopped" | "crashed";

export class HubClosedError extends RealtimeError {
  constructor(
    hubName: string,
    public readonly reason: HubClosedReason = "stopped",
  ) {
    super("HUB_CLOSED", `Hub ${hubName} is ${reason}`, { hubName, reason });
    this.name = "HubClosedError";
  }
}

export function toRealtimeError(err: unknown): RealtimeError {
  if (err instanceof RealtimeError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new TransportError(message, { cause: err });
}
