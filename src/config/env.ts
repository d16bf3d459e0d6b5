import { z } from "zod";

const optionalTrimmedString = z
	.string()
	.optional()
	.transform((v) => {
		if (typeof v !== "string") return undefined;
		const trimmed = v.trim();
		return trimmed ? trimmed : undefined;
	});

const positiveInt = z.coerce.number().int().positive();

const EnvSchema = z.object({
	NODE_ENV: z
		.enum(["development", "production", "test"])
		.default("development"),
	PORT: z.coerce.number().int().min(0).max(65535).default(3001),
	HOST: z.string().default("0.0.0.0"),
	LOG_LEVEL: z
		.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
		.default("info"),

	// Shared secret checked by the access guard; unset means open access.
	HUB_ACCESS_TOKEN: optionalTrimmedString,
	CORS_ORIGIN: optionalTrimmedString,

	HUB_MAX_MESSAGE_BYTES: positiveInt.default(512 * 1024),
	HUB_OUTBOUND_CAPACITY: positiveInt.default(256),
	HUB_BROADCAST_QUEUE_CAPACITY: positiveInt.default(1024),
	HUB_WRITE_WAIT_MS: positiveInt.default(10_000),
	HUB_PONG_WAIT_MS: positiveInt.default(60_000),
	HUB_PING_INTERVAL_MS: positiveInt.optional(),
	HUB_WRITE_BATCH_SIZE: positiveInt.default(64),
	HUB_MAX_ROOMS: positiveInt.default(1000),
});

export type Env = z.infer<typeof EnvSchema>;

export const loadEnv = (
	source: Record<string, string | undefined> = process.env
): Env => {
	const parsed = EnvSchema.safeParse(source);
	if (!parsed.success) {
		console.error(z.treeifyError(parsed.error));
		throw new Error("Invalid environment variables");
	}

	const pingInterval = parsed.data.HUB_PING_INTERVAL_MS;
	if (
		pingInterval !== undefined &&
		pingInterval >= parsed.data.HUB_PONG_WAIT_MS
	) {
		throw new Error("HUB_PING_INTERVAL_MS must be lower than HUB_PONG_WAIT_MS");
	}

	if (parsed.data.NODE_ENV === "production" && !parsed.data.CORS_ORIGIN) {
		console.warn("[env] CORS_ORIGIN not set; cross-origin requests are refused");
	}

	return parsed.data;
};
