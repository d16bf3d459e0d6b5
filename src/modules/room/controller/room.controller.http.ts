import type { FastifyInstance } from "fastify";

import { safePreview } from "@/infra/observability";
import type { RealtimeHub } from "@/infra/realtime/realtimeHub";
import { UserFacingError } from "@/infra/userFacingError";

import {
	RoomParamsSchema,
	createRoomBroadcastBodySchema,
} from "../room.schemas";
import type { RoomControllerDeps } from "./room.controller.types";

export function registerRoomHttpRoutes(
	app: FastifyInstance,
	deps: RoomControllerDeps
): void {
	const broadcastBodySchema = createRoomBroadcastBodySchema(
		deps.settings.maxMessageBytes
	);

	const requireRoom = (roomId: string): RealtimeHub => {
		const hub = deps.rooms.get(roomId);
		if (!hub) {
			throw new UserFacingError({
				code: "NOT_FOUND",
				userMessage: "Room not found.",
				details: { roomId },
			});
		}
		return hub;
	};

	app.get("/health", async () => ({ ok: true }));

	app.get("/rooms", async () => ({ items: await deps.rooms.list() }));

	app.get("/rooms/:roomId", async (req) => {
		const { roomId } = RoomParamsSchema.parse(req.params);
		const hub = requireRoom(roomId);

		return {
			roomId,
			connections: await hub.count(),
			stats: hub.stats(),
		};
	});

	app.post("/rooms/:roomId/messages", async (req, reply) => {
		const { roomId } = RoomParamsSchema.parse(req.params);
		const { text } = broadcastBodySchema.parse(req.body);
		const hub = requireRoom(roomId);

		await hub.broadcast(text);
		req.log.debug({ roomId, preview: safePreview(text) }, "Server broadcast queued");

		return reply.code(202).send({ accepted: true });
	});
}
