export const REALTIME_TYPES = {
  HubSettings: Symbol.for("HubSettings"),
  RoomDirectory: Symbol.for("RoomDirectory"),
} as const;
