import type { Env } from "@/config/env";

export type HubSettings = {
  /** Largest inbound frame an agent forwards; larger frames close the connection. */
  maxMessageBytes: number;
  /** Per-connection outbound queue size; overflowing it evicts the connection. */
  outboundCapacity: number;
  /** Broadcasts a hub accepts before `broadcast()` starts waiting. */
  broadcastQueueCapacity: number;
  writeWaitMs: number;
  pongWaitMs: number;
  pingIntervalMs: number;
  /** Most messages coalesced into one write. */
  writeBatchSize: number;
  maxRooms: number;
};

export type AgentSettings = Pick<
  HubSettings,
  | "maxMessageBytes"
  | "outboundCapacity"
  | "writeWaitMs"
  | "pongWaitMs"
  | "pingIntervalMs"
  | "writeBatchSize"
>;

const DEFAULT_PONG_WAIT_MS = 60_000;

export const DEFAULT_HUB_SETTINGS: HubSettings = {
  maxMessageBytes: 512 * 1024,
  outboundCapacity: 256,
  broadcastQueueCapacity: 1024,
  writeWaitMs: 10_000,
  pongWaitMs: DEFAULT_PONG_WAIT_MS,
  pingIntervalMs: defaultPingInterval(DEFAULT_PONG_WAIT_MS),
  writeBatchSize: 64,
  maxRooms: 1000,
};

// pings must land well inside the pong window
function defaultPingInterval(pongWaitMs: number): number {
  return Math.max(1, Math.floor((pongWaitMs * 9) / 10));
}

export function hubSettingsFromEnv(env: Env): HubSettings {
  return {
    maxMessageBytes: env.HUB_MAX_MESSAGE_BYTES,
    outboundCapacity: env.HUB_OUTBOUND_CAPACITY,
    broadcastQueueCapacity: env.HUB_BROADCAST_QUEUE_CAPACITY,
    writeWaitMs: env.HUB_WRITE_WAIT_MS,
    pongWaitMs: env.HUB_PONG_WAIT_MS,
    pingIntervalMs: env.HUB_PING_INTERVAL_MS ?? defaultPingInterval(env.HUB_PONG_WAIT_MS),
    writeBatchSize: env.HUB_WRITE_BATCH_SIZE,
    maxRooms: env.HUB_MAX_ROOMS,
  };
}
