import { describe, expect, it, vi } from "vitest";

import { createMember, createTestLogger } from "@/test/fakeTransport";

import { HubClosedError, SlowConsumerError } from "./realtime.errors";
import type { HubPayload } from "./realtime.transport";
import { RealtimeHub, type HubMember } from "./realtimeHub";

function createHub(broadcastQueueCapacity?: number) {
	const log = createTestLogger();
	const hub = new RealtimeHub({ name: "lobby", broadcastQueueCapacity, log });
	return { hub, log };
}

describe("RealtimeHub", () => {
	it("delivers a broadcast to every registered member exactly once", async () => {
		const { hub } = createHub();
		const members = ["A", "B", "C"].map((id) => createMember(id));
		for (const m of members) hub.register(m);

		await hub.broadcast("hello");

		expect(await hub.count()).toBe(3);
		for (const m of members) {
			expect(m.received()).toEqual(["hello"]);
		}
	});

	it("does not replay earlier broadcasts to a late joiner", async () => {
		const { hub } = createHub();
		const a = createMember("A");
		const b = createMember("B");

		hub.register(a);
		await hub.broadcast("m1");
		hub.register(b);
		await hub.broadcast("m2");

		expect(await hub.count()).toBe(2);
		expect(a.received()).toEqual(["m1", "m2"]);
		expect(b.received()).toEqual(["m2"]);
	});

	it("treats a second unregister as a no-op", async () => {
		const { hub } = createHub();
		const a = createMember("A");

		hub.register(a);
		hub.unregister(a);
		hub.unregister(a);

		expect(await hub.count()).toBe(0);
		expect(a.closeOutbound).toHaveBeenCalledTimes(1);
		expect(hub.stats().unregistered).toBe(1);
	});

	it("never lets an unregistered member back in", async () => {
		const { hub } = createHub();
		const offer = vi.fn((_message: HubPayload) => true);
		const a: HubMember = { id: "A", offer, closeOutbound: vi.fn() };

		hub.register(a);
		hub.unregister(a);
		hub.register(a);
		await hub.broadcast("after-leave");

		expect(await hub.count()).toBe(0);
		expect(offer).not.toHaveBeenCalled();
		expect(hub.stats().registered).toBe(1);
	});

	it("evicts a member whose queue is full without holding up the others", async () => {
		const { hub, log } = createHub();
		const slow = createMember("A", 1);
		const healthy = createMember("B");
		hub.register(slow);
		hub.register(healthy);

		for (let i = 1; i <= 5; i++) {
			await hub.broadcast(`m${i}`);
		}

		expect(await hub.count()).toBe(1);
		expect(healthy.received()).toEqual(["m1", "m2", "m3", "m4", "m5"]);
		expect(slow.received()).toEqual(["m1"]);
		expect(slow.closeOutbound).toHaveBeenCalledTimes(1);
		expect(slow.closeOutbound).toHaveBeenCalledWith(expect.any(SlowConsumerError));
		expect(log.warn).toHaveBeenCalledWith(
			{ hub: "lobby", connId: "A", connections: 1 },
			"Evicting slow consumer"
		);
		expect(hub.stats()).toEqual({
			connections: 1,
			registered: 2,
			unregistered: 0,
			evicted: 1,
			broadcasts: 5,
			delivered: 6,
		});
	});

	it("hands broadcast slots over in call order when the backlog is full", async () => {
		const { hub } = createHub(1);
		const a = createMember("A");
		hub.register(a);

		await Promise.all([
			hub.broadcast("1"),
			hub.broadcast("2"),
			hub.broadcast("3"),
		]);

		expect(await hub.count()).toBe(1);
		expect(a.received()).toEqual(["1", "2", "3"]);
	});

	it("drains queued broadcasts before stopping", async () => {
		const { hub } = createHub();
		const a = createMember("A");
		hub.register(a);

		const queued = hub.broadcast("before");
		const stopped = hub.stop();

		await expect(hub.broadcast("after")).rejects.toBeInstanceOf(HubClosedError);
		await queued;
		await stopped;

		expect(hub.state).toBe("stopped");
		expect(a.received()).toEqual(["before"]);
		expect(a.closeOutbound).toHaveBeenLastCalledWith(expect.any(HubClosedError));
		expect(await hub.count()).toBe(0);
	});

	it("rejects producers still waiting for a slot when stopped", async () => {
		const { hub } = createHub(1);
		const a = createMember("A");
		hub.register(a);

		const accepted = hub.broadcast("kept");
		const waitingRejected = expect(hub.broadcast("dropped")).rejects.toBeInstanceOf(
			HubClosedError
		);

		await hub.stop();
		await accepted;
		await waitingRejected;

		expect(a.received()).toEqual(["kept"]);
	});

	it("stops itself after the last member leaves when idle stop is on", async () => {
		const log = createTestLogger();
		const hub = new RealtimeHub({ name: "lobby", stopWhenIdle: true, log });
		const a = createMember("A");
		const b = createMember("B", 1);
		hub.register(a);
		hub.register(b);

		hub.unregister(a);
		await hub.broadcast("m1");
		await hub.broadcast("m2");
		await hub.done;

		expect(hub.state).toBe("stopped");
		expect(hub.stats()).toMatchObject({ connections: 0, unregistered: 1, evicted: 1 });
		await expect(hub.broadcast("late")).rejects.toBeInstanceOf(HubClosedError);
	});

	it("keeps running with no members unless idle stop is on", async () => {
		const { hub } = createHub();
		const a = createMember("A");
		hub.register(a);
		hub.unregister(a);

		expect(await hub.count()).toBe(0);
		expect(await hub.count()).toBe(0);
		expect(hub.state).toBe("running");
	});

	it("closes members that register after the hub stopped", async () => {
		const { hub } = createHub();
		await hub.stop();

		const late = createMember("late");
		hub.register(late);

		expect(late.closeOutbound).toHaveBeenCalledWith(expect.any(HubClosedError));
		expect(late.queue.closed).toBe(true);
	});

	it("closes every member and refuses work after the loop crashes", async () => {
		const { hub, log } = createHub();
		const good = createMember("good");
		const broken: HubMember = {
			id: "broken",
			offer: () => {
				throw new Error("boom");
			},
			closeOutbound: vi.fn(),
		};
		hub.register(good);
		hub.register(broken);

		await hub.broadcast("x");
		await hub.done;

		expect(hub.state).toBe("crashed");
		expect(good.received()).toEqual(["x"]);

		const cause = good.closeOutbound.mock.calls[0]?.[0];
		expect(cause).toBeInstanceOf(HubClosedError);
		expect(cause instanceof HubClosedError && cause.reason).toBe("crashed");

		expect(log.error).toHaveBeenCalledTimes(1);
		await expect(hub.broadcast("y")).rejects.toBeInstanceOf(HubClosedError);
		expect(await hub.count()).toBe(0);
	});
});
