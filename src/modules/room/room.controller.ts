import type { FastifyInstance } from "fastify";
import type { Container } from "inversify";

import { REALTIME_TYPES } from "@/infra/realtime/realtime.types";
import type { HubSettings } from "@/infra/realtime/realtime.settings";
import type { RoomDirectory } from "@/infra/realtime/roomDirectory";

import { registerRoomHttpRoutes } from "./controller/room.controller.http";
import { registerRoomWsRoutes } from "./controller/room.controller.ws";
import type { RoomControllerDeps } from "./controller/room.controller.types";

export function registerRoomRoutes(
	app: FastifyInstance,
	container: Container
): void {
	const deps: RoomControllerDeps = {
		rooms: container.get<RoomDirectory>(REALTIME_TYPES.RoomDirectory),
		settings: container.get<HubSettings>(REALTIME_TYPES.HubSettings),
	};

	registerRoomHttpRoutes(app, deps);
	registerRoomWsRoutes(app, deps);
}
