import { inject, injectable } from "inversify";

import {
	childLogger,
	ensureLogger,
	msSince,
	nowNs,
	type LoggerLike,
} from "@/infra/observability";
import { UserFacingError } from "@/infra/userFacingError";

import { REALTIME_TYPES } from "./realtime.types";
import type { HubSettings } from "./realtime.settings";
import { RealtimeHub } from "./realtimeHub";

export type RoomSummary = {
	roomId: string;
	connections: number;
};

/**
 * One hub per room. Hubs start on first use and stop once their last member
 * leaves; a stopped or crashed room comes back fresh on the next join.
 */
@injectable()
export class RoomDirectory {
	private readonly rooms = new Map<string, RealtimeHub>();
	private closing = false;

	constructor(
		@inject(REALTIME_TYPES.HubSettings)
		private readonly settings: HubSettings
	) {}

	get size(): number {
		return this.rooms.size;
	}

	get(roomId: string): RealtimeHub | undefined {
		return this.rooms.get(roomId);
	}

	getOrCreate(roomId: string, log?: LoggerLike): RealtimeHub {
		if (this.closing) {
			throw new UserFacingError({
				code: "UNAVAILABLE",
				userMessage: "Server is shutting down.",
			});
		}

		const existing = this.rooms.get(roomId);
		if (existing?.state === "running") return existing;
		// an idle hub that just stopped is still mapped until its loop settles
		if (existing) this.rooms.delete(roomId);

		if (this.rooms.size >= this.settings.maxRooms) {
			throw new UserFacingError({
				code: "ROOM_LIMIT",
				userMessage: "Too many active rooms.",
				details: { maxRooms: this.settings.maxRooms },
			});
		}

		const lg = ensureLogger(log);
		const hub = new RealtimeHub({
			name: roomId,
			broadcastQueueCapacity: this.settings.broadcastQueueCapacity,
			stopWhenIdle: true,
			log: childLogger(lg, { room: roomId }),
		});
		this.rooms.set(roomId, hub);

		void hub.done.then(() => {
			if (this.rooms.get(roomId) === hub) this.rooms.delete(roomId);
		});

		lg.info({ roomId, rooms: this.rooms.size }, "Room opened");
		return hub;
	}

	async list(): Promise<RoomSummary[]> {
		const entries = [...this.rooms.entries()];
		const counts = await Promise.all(entries.map(([, hub]) => hub.count()));

		return entries
			.map(([roomId], i) => ({ roomId, connections: counts[i] ?? 0 }))
			.sort((a, b) => a.roomId.localeCompare(b.roomId));
	}

	/**
	 * Ordered shutdown: every hub drains its queued broadcasts and closes its
	 * members before this resolves. New rooms are refused from here on.
	 */
	async stopAll(log?: LoggerLike): Promise<void> {
		const lg = ensureLogger(log);
		const start = nowNs();
		this.closing = true;

		const hubs = [...this.rooms.values()];
		await Promise.all(hubs.map((hub) => hub.stop()));

		lg.info({ rooms: hubs.length, ms: msSince(start) }, "All rooms stopped");
	}
}
