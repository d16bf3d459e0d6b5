import { vi, type Mock } from "vitest";

import { BoundedQueue } from "@/infra/realtime/boundedQueue";
import type { LoggerLike } from "@/infra/observability";
import type {
	HubPayload,
	RealtimeTransport,
} from "@/infra/realtime/realtime.transport";
import type { HubMember } from "@/infra/realtime/realtimeHub";
import type { RealtimeError } from "@/infra/realtime/realtime.errors";

/**
 * In-process transport. Frames pushed with `deliver` come out of `receive`;
 * writes are recorded batch by batch in `sent`.
 */
export class FakeTransport implements RealtimeTransport {
	readonly sent: HubPayload[][] = [];
	pings = 0;
	closedWith: number | undefined;
	destroyed = false;
	failWrites = false;
	answerPings = false;

	private readonly inbound = new BoundedQueue<HubPayload>(Number.POSITIVE_INFINITY);
	private readonly pongListeners: Array<() => void> = [];
	private writeGate: Promise<void> | undefined;
	private openGate: () => void = () => undefined;

	get frames(): HubPayload[] {
		return this.sent.flat();
	}

	deliver(frame: HubPayload): void {
		this.inbound.tryPush(frame);
	}

	hangUp(): void {
		this.inbound.close();
	}

	/** Makes every write wait until `releaseWrites` is called. */
	stallWrites(): void {
		this.writeGate = new Promise<void>((resolve) => {
			this.openGate = resolve;
		});
	}

	releaseWrites(): void {
		this.openGate();
		this.writeGate = undefined;
	}

	async receive(): Promise<HubPayload | null> {
		const frame = await this.inbound.shift();
		return frame ?? null;
	}

	async send(batch: readonly HubPayload[]): Promise<void> {
		if (this.writeGate) await this.writeGate;
		if (this.failWrites) throw new Error("connection reset by peer");
		this.sent.push([...batch]);
	}

	async ping(): Promise<void> {
		this.pings += 1;
		if (this.answerPings) {
			for (const listener of this.pongListeners) listener();
		}
	}

	async close(code: number): Promise<void> {
		this.closedWith = code;
		this.inbound.close();
	}

	destroy(): void {
		this.destroyed = true;
		this.inbound.close();
	}

	onPong(listener: () => void): void {
		this.pongListeners.push(listener);
	}
}

export type FakeMember = HubMember & {
	readonly queue: BoundedQueue<HubPayload>;
	readonly closeOutbound: Mock<(cause?: RealtimeError) => void>;
	received(): HubPayload[];
};

/**
 * Hub member backed by a bare queue: nothing drains it unless the test does.
 */
export function createMember(id: string, capacity = 256): FakeMember {
	const queue = new BoundedQueue<HubPayload>(capacity);
	return {
		id,
		queue,
		offer: (message) => queue.tryPush(message),
		closeOutbound: vi.fn((_cause?: RealtimeError) => queue.close()),
		received: () => queue.drain(),
	};
}

export type TestLogger = LoggerLike & {
	info: Mock;
	debug: Mock;
	warn: Mock;
	error: Mock;
};

export function createTestLogger(): TestLogger {
	return {
		info: vi.fn(),
		debug: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	};
}
