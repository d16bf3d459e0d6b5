import type { HubSettings } from "@/infra/realtime/realtime.settings";
import type { RoomDirectory } from "@/infra/realtime/roomDirectory";

export type RoomControllerDeps = {
	rooms: RoomDirectory;
	settings: HubSettings;
};
