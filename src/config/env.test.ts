import { afterEach, describe, expect, it, vi } from "vitest";

import { hubSettingsFromEnv } from "@/infra/realtime/realtime.settings";

import { loadEnv } from "./env";

describe("loadEnv", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("applies defaults", () => {
		const env = loadEnv({});

		expect(env.NODE_ENV).toBe("development");
		expect(env.PORT).toBe(3001);
		expect(env.LOG_LEVEL).toBe("info");
		expect(env.HUB_OUTBOUND_CAPACITY).toBe(256);
		expect(env.HUB_MAX_MESSAGE_BYTES).toBe(524288);
		expect(env.HUB_ACCESS_TOKEN).toBeUndefined();
		expect(env.HUB_PING_INTERVAL_MS).toBeUndefined();
	});

	it("coerces numbers and trims secrets", () => {
		const env = loadEnv({
			HUB_OUTBOUND_CAPACITY: "8",
			HUB_ACCESS_TOKEN: "  test-secret  ",
			CORS_ORIGIN: "   ",
		});

		expect(env.HUB_OUTBOUND_CAPACITY).toBe(8);
		expect(env.HUB_ACCESS_TOKEN).toBe("test-secret");
		expect(env.CORS_ORIGIN).toBeUndefined();
	});

	it("throws on invalid values", () => {
		const consoleError = vi.spyOn(console, "error").mockImplementation(() => undefined);

		expect(() => loadEnv({ PORT: "not-a-port" })).toThrow("Invalid environment variables");
		expect(() => loadEnv({ HUB_OUTBOUND_CAPACITY: "0" })).toThrow(
			"Invalid environment variables"
		);
		expect(consoleError).toHaveBeenCalledTimes(2);
	});

	it("requires the ping interval to be inside the pong window", () => {
		expect(() =>
			loadEnv({ HUB_PING_INTERVAL_MS: "1000", HUB_PONG_WAIT_MS: "1000" })
		).toThrow("HUB_PING_INTERVAL_MS must be lower than HUB_PONG_WAIT_MS");
	});
});

describe("hubSettingsFromEnv", () => {
	it("derives the ping interval from the pong wait", () => {
		const settings = hubSettingsFromEnv(loadEnv({ HUB_PONG_WAIT_MS: "1000" }));

		expect(settings.pongWaitMs).toBe(1000);
		expect(settings.pingIntervalMs).toBe(900);
	});

	it("keeps an explicit ping interval", () => {
		const settings = hubSettingsFromEnv(
			loadEnv({ HUB_PONG_WAIT_MS: "1000", HUB_PING_INTERVAL_MS: "250" })
		);

		expect(settings.pingIntervalMs).toBe(250);
	});
});
