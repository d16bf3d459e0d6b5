import { BoundedQueue } from "./boundedQueue";
import { TransportError } from "./realtime.errors";

/** Opaque frame relayed by the hub: text frames as strings, binary frames as buffers. */
export type HubPayload = string | Buffer;

export function payloadByteLength(payload: HubPayload): number {
  return typeof payload === "string" ? Buffer.byteLength(payload, "utf8") : payload.length;
}

/**
 * Bidirectional message channel owned by one connection agent.
 */
export interface RealtimeTransport {
  /** Next inbound frame, `null` once the peer closed. Rejects on read failure. */
  receive(): Promise<HubPayload | null>;
  /** Writes the frames in order and resolves once all of them are flushed. */
  send(batch: readonly HubPayload[]): Promise<void>;
  ping(): Promise<void>;
  /** Sends a close frame; resolves when the channel is closed. */
  close(code: number, reason?: string): Promise<void>;
  /** Drops the channel without a closing handshake. */
  destroy(): void;
  onPong(listener: () => void): void;
}

/**
 * Minimal socket shape we rely on.
 * We keep this structural (instead of importing `ws` types) so the adapter
 * works with whatever socket object the WebSocket plugin hands over.
 */
export type RealtimeSocket = {
  readonly readyState: number;
  send(data: HubPayload, options: { binary: boolean }, cb?: (err?: Error) => void): void;
  ping(data?: unknown, mask?: boolean, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
  pause?(): void;
  resume?(): void;
  on(event: "message", listener: (data: unknown, isBinary: boolean) => void): void;
  on(event: "pong", listener: () => void): void;
  on(event: "close", listener: () => void): void;
  on(event: "error", listener: (err: Error) => void): void;
};

export const WS_READY_STATE = {
  CONNECTING: 0,
  OPEN: 1,
  CLOSING: 2,
  CLOSED: 3,
} as const;

// frames buffered before the socket is paused
const INBOUND_HIGH_WATER_MARK = 16;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function extractWsSocket(conn: unknown): RealtimeSocket {
  // @fastify/websocket < 10 wrapped the socket in a connection stream
  const candidate = isRecord(conn) && "socket" in conn ? conn.socket : conn;

  if (!isRecord(candidate)) {
    const keys = isRecord(conn) ? Object.keys(conn) : [];
    throw new Error(`WS socket is not an object (connKeys=${keys.join(",")})`);
  }

  const required = ["send", "ping", "close", "terminate", "on"] as const;
  const missing = required.filter((key) => typeof candidate[key] !== "function");
  if (missing.length > 0) {
    throw new Error(`WS socket has invalid shape (missing=${missing.join(",")})`);
  }

  if (typeof candidate.readyState !== "number") {
    throw new Error("WS socket readyState is not a number");
  }

  return candidate as unknown as RealtimeSocket;
}

function toPayload(data: unknown, isBinary: boolean): HubPayload {
  let buf: Buffer;
  if (Buffer.isBuffer(data)) {
    buf = data;
  } else if (Array.isArray(data)) {
    buf = Buffer.concat(data.filter((chunk): chunk is Buffer => Buffer.isBuffer(chunk)));
  } else if (data instanceof ArrayBuffer) {
    buf = Buffer.from(data);
  } else {
    buf = Buffer.from(String(data), "utf8");
  }

  return isBinary ? buf : buf.toString("utf8");
}

function writeOnce(
  write: (cb: (err?: Error) => void) => void,
  operation: string,
): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    write((err) => {
      if (err) reject(new TransportError(`${operation} failed: ${err.message}`, { cause: err }));
      else resolve();
    });
  });
}

export function createWsTransport(socket: RealtimeSocket): RealtimeTransport {
  const inbound = new BoundedQueue<HubPayload>(Number.POSITIVE_INFINITY);
  let failure: Error | undefined;
  let paused = false;

  let markClosed: () => void = () => undefined;
  const closed = new Promise<void>((resolve) => {
    markClosed = resolve;
  });

  socket.on("message", (data, isBinary) => {
    inbound.tryPush(toPayload(data, isBinary));

    if (!paused && socket.pause && inbound.size >= INBOUND_HIGH_WATER_MARK) {
      paused = true;
      socket.pause();
    }
  });

  socket.on("error", (err) => {
    failure ??= err;
    inbound.close();
  });

  socket.on("close", () => {
    inbound.close();
    markClosed();
  });

  const assertOpen = (operation: string) => {
    if (socket.readyState !== WS_READY_STATE.OPEN) {
      throw new TransportError(`${operation} on a socket that is not open`);
    }
  };

  return {
    async receive() {
      const frame = await inbound.shift();

      if (paused && socket.resume && inbound.size < INBOUND_HIGH_WATER_MARK / 2) {
        paused = false;
        socket.resume();
      }

      if (frame !== undefined) return frame;
      if (failure) {
        throw new TransportError(`read failed: ${failure.message}`, { cause: failure });
      }
      return null;
    },

    async send(batch) {
      assertOpen("write");
      await Promise.all(
        batch.map((payload) =>
          writeOnce(
            (cb) => socket.send(payload, { binary: typeof payload !== "string" }, cb),
            "write",
          ),
        ),
      );
    },

    async ping() {
      assertOpen("ping");
      await writeOnce((cb) => socket.ping(undefined, undefined, cb), "ping");
    },

    async close(code, reason) {
      if (socket.readyState === WS_READY_STATE.CLOSED) return;
      if (socket.readyState !== WS_READY_STATE.CLOSING) {
        socket.close(code, reason);
      }
      await closed;
    },

    destroy() {
      socket.terminate();
    },

    onPong(listener) {
      socket.on("pong", listener);
    },
  };
}
