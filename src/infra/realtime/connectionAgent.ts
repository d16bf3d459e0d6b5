import { ensureLogger, type LoggerLike } from "@/infra/observability";

import { BoundedQueue } from "./boundedQueue";
import { withDeadline } from "./deadline";
import {
	DeadlineExceededError,
	HubClosedError,
	OversizedMessageError,
	toRealtimeError,
	type RealtimeError,
} from "./realtime.errors";
import type { AgentSettings } from "./realtime.settings";
import {
	payloadByteLength,
	type HubPayload,
	type RealtimeTransport,
} from "./realtime.transport";
import type { HubMember, HubPort } from "./realtimeHub";

export const CLOSE_CODES = {
	NORMAL: 1000,
	GOING_AWAY: 1001,
	MESSAGE_TOO_BIG: 1009,
	INTERNAL_ERROR: 1011,
} as const;

export type ConnectionAgentOptions = {
	hub: HubPort;
	transport: RealtimeTransport;
	settings: AgentSettings;
	id?: string;
	log?: LoggerLike;
};

type OutboundEvent =
	| { kind: "message"; message: HubPayload | undefined }
	| { kind: "tick" };

let connSeq = 0;

export function createConnectionId(): string {
	connSeq += 1;
	return `${Date.now().toString(36)}-${connSeq.toString(36)}-${Math.random()
		.toString(36)
		.slice(2, 7)}`;
}

/**
 * Close code sent to the peer for a given termination cause. Evicted clients
 * get a plain normal closure, no "too slow" diagnostic.
 */
export function closeCodeFor(cause: RealtimeError | undefined): number {
	if (!cause) return CLOSE_CODES.NORMAL;
	switch (cause.code) {
		case "OVERSIZED_MESSAGE":
			return CLOSE_CODES.MESSAGE_TOO_BIG;
		case "HUB_CLOSED":
			return cause instanceof HubClosedError && cause.reason === "crashed"
				? CLOSE_CODES.INTERNAL_ERROR
				: CLOSE_CODES.GOING_AWAY;
		default:
			return CLOSE_CODES.NORMAL;
	}
}

/**
 * One live connection: an inbound pump forwarding frames to the hub, an
 * outbound pump draining a bounded queue into the transport, and the pings
 * that keep the read deadline moving. Only the outbound pump writes to the
 * transport.
 */
export class ConnectionAgent implements HubMember {
	readonly id: string;

	private readonly hub: HubPort;
	private readonly transport: RealtimeTransport;
	private readonly settings: AgentSettings;
	private readonly log: LoggerLike;
	private readonly outbound: BoundedQueue<HubPayload>;

	private started = false;
	private terminated = false;
	private cause: RealtimeError | undefined;
	private deadlineAt = 0;

	private readonly haltListeners = new Set<() => void>();

	private readTimer: NodeJS.Timeout | undefined;
	private pingTimer: NodeJS.Timeout | undefined;

	// outbound pump wake-ups: a dequeued message or a due ping
	private readyMessage: { message: HubPayload | undefined } | undefined;
	private pingDue = false;
	private wakeOutbound: (() => void) | undefined;

	constructor(options: ConnectionAgentOptions) {
		this.id = options.id ?? createConnectionId();
		this.hub = options.hub;
		this.transport = options.transport;
		this.settings = options.settings;
		this.log = ensureLogger(options.log);
		this.outbound = new BoundedQueue<HubPayload>(options.settings.outboundCapacity);
	}

	/** Epoch ms after which a silent peer is considered dead. */
	get readDeadline(): number {
		return this.deadlineAt;
	}

	get closeCause(): RealtimeError | undefined {
		return this.cause;
	}

	get isTerminated(): boolean {
		return this.terminated;
	}

	/**
	 * Registers with the hub and runs both pumps. Resolves once the connection
	 * is fully torn down; never rejects.
	 */
	async start(): Promise<void> {
		if (this.started) throw new Error(`Agent ${this.id} already started`);
		this.started = true;

		this.hub.register(this);
		this.transport.onPong(() => this.extendReadDeadline());
		this.extendReadDeadline();

		try {
			await Promise.all([this.inboundPump(), this.outboundPump()]);
		} finally {
			clearTimeout(this.readTimer);
			clearInterval(this.pingTimer);
		}
	}

	offer(message: HubPayload): boolean {
		return this.outbound.tryPush(message);
	}

	closeOutbound(cause?: RealtimeError): void {
		this.cause ??= cause;
		this.outbound.close();
	}

	/**
	 * Ends the connection. Emits the single unregister; idempotent.
	 */
	terminate(cause?: RealtimeError): void {
		if (this.terminated) return;
		this.terminated = true;
		this.cause ??= cause;

		this.hub.unregister(this, this.cause);
		this.outbound.close();

		for (const onHalt of this.haltListeners) onHalt();
		this.haltListeners.clear();

		if (this.cause) {
			this.log.debug({ cause: this.cause.code, message: this.cause.message }, "Connection terminated");
		}
	}

	private extendReadDeadline(): void {
		if (this.terminated) return;
		this.deadlineAt = Date.now() + this.settings.pongWaitMs;

		if (this.readTimer) {
			this.readTimer.refresh();
			return;
		}
		this.readTimer = setTimeout(() => {
			this.terminate(new DeadlineExceededError("read", this.settings.pongWaitMs));
		}, this.settings.pongWaitMs);
	}

	private async inboundPump(): Promise<void> {
		try {
			for (;;) {
				const frame = await this.untilHalted(this.transport.receive());
				if (frame === null) break;

				const size = payloadByteLength(frame);
				if (size > this.settings.maxMessageBytes) {
					this.terminate(new OversizedMessageError(size, this.settings.maxMessageBytes));
					break;
				}

				this.extendReadDeadline();

				// waits while the room's broadcast backlog is full
				await this.untilHalted(this.hub.broadcast(frame));
			}
			this.terminate();
		} catch (err) {
			this.terminate(toRealtimeError(err));
		}
	}

	/**
	 * Resolves with the task's value, or `null` as soon as the agent is
	 * terminated. The listener is dropped once the task settles.
	 */
	private untilHalted<T>(task: Promise<T>): Promise<T | null> {
		return new Promise<T | null>((resolve, reject) => {
			const onHalt = () => resolve(null);
			if (this.terminated) onHalt();
			else this.haltListeners.add(onHalt);

			task.then(
				(value) => {
					this.haltListeners.delete(onHalt);
					resolve(value);
				},
				(err: unknown) => {
					this.haltListeners.delete(onHalt);
					reject(err);
				}
			);
		});
	}

	private async outboundPump(): Promise<void> {
		this.pingTimer = setInterval(() => this.onPingTick(), this.settings.pingIntervalMs);
		this.requestMessage();

		try {
			for (;;) {
				const event = await this.nextOutboundEvent();

				if (event.kind === "tick") {
					await withDeadline(
						this.transport.ping(),
						this.settings.writeWaitMs,
						() => new DeadlineExceededError("ping", this.settings.writeWaitMs)
					);
					continue;
				}

				if (event.message === undefined) break;

				// coalesce whatever is already queued, order preserved
				const batch = [
					event.message,
					...this.outbound.drain(this.settings.writeBatchSize - 1),
				];
				this.requestMessage();

				await withDeadline(
					this.transport.send(batch),
					this.settings.writeWaitMs,
					() => new DeadlineExceededError("write", this.settings.writeWaitMs)
				);
			}
		} catch (err) {
			this.terminate(toRealtimeError(err));
		} finally {
			clearInterval(this.pingTimer);
		}

		await this.hangUp();
	}

	private async hangUp(): Promise<void> {
		this.terminate();

		const code = this.cause?.code;
		if (code === "TRANSPORT" || code === "DEADLINE_EXCEEDED") {
			this.transport.destroy();
			return;
		}

		try {
			await withDeadline(
				this.transport.close(closeCodeFor(this.cause)),
				this.settings.writeWaitMs,
				() => new DeadlineExceededError("close", this.settings.writeWaitMs)
			);
		} catch (err) {
			this.log.debug({ err }, "Close handshake did not complete");
			this.transport.destroy();
		}
	}

	/** Asks the queue for one message; at most one request is outstanding. */
	private requestMessage(): void {
		void this.outbound.shift().then((message) => {
			this.readyMessage = { message };
			this.wake();
		});
	}

	private onPingTick(): void {
		this.pingDue = true;
		this.wake();
	}

	private wake(): void {
		const waiter = this.wakeOutbound;
		this.wakeOutbound = undefined;
		waiter?.();
	}

	/**
	 * Next thing for the outbound pump to do. A due ping goes first so a busy
	 * stream cannot starve the keepalive. Each wait parks a single fresh
	 * resolver that is dropped once woken.
	 */
	private async nextOutboundEvent(): Promise<OutboundEvent> {
		for (;;) {
			if (this.pingDue) {
				this.pingDue = false;
				return { kind: "tick" };
			}

			const ready = this.readyMessage;
			if (ready) {
				this.readyMessage = undefined;
				return { kind: "message", message: ready.message };
			}

			await new Promise<void>((resolve) => {
				this.wakeOutbound = resolve;
			});
		}
	}
}
