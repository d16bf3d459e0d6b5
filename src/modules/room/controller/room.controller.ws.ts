import type { FastifyInstance } from "fastify";

import { childLogger, type LoggerLike } from "@/infra/observability";
import {
	ConnectionAgent,
	createConnectionId,
} from "@/infra/realtime/connectionAgent";
import {
	createWsTransport,
	extractWsSocket,
	type RealtimeSocket,
} from "@/infra/realtime/realtime.transport";
import type { RealtimeHub } from "@/infra/realtime/realtimeHub";

import { RoomParamsSchema } from "../room.schemas";
import { encodeRoomEvent } from "../room.ws.schemas";
import type { RoomControllerDeps } from "./room.controller.types";

// RFC 6455: policy violation / try again later
const WS_CLOSE_POLICY_VIOLATION = 1008;
const WS_CLOSE_TRY_AGAIN_LATER = 1013;

/**
 * Runs one room connection on an accepted socket. Resolves once the
 * connection is torn down; a refused socket resolves right after its close
 * frame is sent.
 */
export async function acceptRoomSocket(
	socket: RealtimeSocket,
	rawParams: unknown,
	deps: RoomControllerDeps,
	reqLog: LoggerLike
): Promise<void> {
	const params = RoomParamsSchema.safeParse(rawParams);
	if (!params.success) {
		socket.close(WS_CLOSE_POLICY_VIOLATION, "Invalid room id");
		return;
	}
	const { roomId } = params.data;

	let hub: RealtimeHub;
	try {
		hub = deps.rooms.getOrCreate(roomId, reqLog);
	} catch (e) {
		const msg = e instanceof Error ? e.message : String(e);
		reqLog.warn({ roomId, message: msg }, "[ws/rooms] room unavailable");
		socket.close(WS_CLOSE_TRY_AGAIN_LATER, "Room unavailable");
		return;
	}

	const connId = createConnectionId();
	const log = childLogger(reqLog, { room: roomId, connId });

	const agent = new ConnectionAgent({
		id: connId,
		hub,
		transport: createWsTransport(socket),
		settings: deps.settings,
		log,
	});

	// queued ahead of any relayed frame
	agent.offer(
		encodeRoomEvent({
			type: "room.ready",
			payload: { roomId, connId, serverTime: new Date().toISOString() },
		})
	);

	log.info({}, "connection accepted");

	try {
		await agent.start();
		log.info({ cause: agent.closeCause?.code ?? null }, "connection closed");
	} catch (err) {
		log.error({ err }, "connection agent failed");
		socket.terminate();
	}
}

export function registerRoomWsRoutes(
	app: FastifyInstance,
	deps: RoomControllerDeps
): void {
	app.get("/ws/rooms/:roomId", { websocket: true }, (conn, req) => {
		let socket: RealtimeSocket;
		try {
			socket = extractWsSocket(conn);
		} catch (e) {
			const msg = e instanceof Error ? e.message : String(e);
			req.log.warn({ message: msg }, "[ws/rooms] failed to extract socket");
			return;
		}

		void acceptRoomSocket(socket, req.params, deps, req.log);
	});
}
