import { EventEmitter } from "node:events";

import {
	WS_READY_STATE,
	type HubPayload,
} from "@/infra/realtime/realtime.transport";

/**
 * Socket double with the shape the ws adapter expects. Sends complete
 * synchronously; `emit` plays the peer.
 */
export class FakeSocket extends EventEmitter {
	readyState: number = WS_READY_STATE.OPEN;
	readonly sent: Array<{ data: HubPayload; binary: boolean }> = [];
	closeArgs: [number | undefined, string | undefined] | undefined;
	sendError: Error | undefined;
	terminated = false;
	pauseCalls = 0;
	resumeCalls = 0;
	pings = 0;

	send(data: HubPayload, options: { binary: boolean }, cb?: (err?: Error) => void): void {
		this.sent.push({ data, binary: options.binary });
		cb?.(this.sendError);
	}

	ping(_data?: unknown, _mask?: boolean, cb?: (err?: Error) => void): void {
		this.pings += 1;
		cb?.();
	}

	close(code?: number, reason?: string): void {
		this.closeArgs = [code, reason];
		this.readyState = WS_READY_STATE.CLOSING;
	}

	terminate(): void {
		this.terminated = true;
		this.readyState = WS_READY_STATE.CLOSED;
		this.emit("close");
	}

	pause(): void {
		this.pauseCalls += 1;
	}

	resume(): void {
		this.resumeCalls += 1;
	}
}
