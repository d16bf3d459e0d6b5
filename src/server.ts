import Fastify from "fastify";
import cors from "@fastify/cors";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";

import { websocketPlugin } from "./plugins/websocket";
import { loadEnv, type Env } from "./config/env";
import { createContainer } from "./container";
import { createAccessGuard } from "./infra/auth/accessGuard";
import { createGlobalErrorHandler } from "./infra/http/errorHandler";
import { REALTIME_TYPES } from "./infra/realtime/realtime.types";
import type { HubSettings } from "./infra/realtime/realtime.settings";
import type { RoomDirectory } from "./infra/realtime/roomDirectory";
import { registerRoomRoutes } from "./modules/room/room.controller";

export async function buildServer(envOverride?: Env) {
	const env = envOverride ?? loadEnv();
	const container = createContainer(env);
	const rooms = container.get<RoomDirectory>(REALTIME_TYPES.RoomDirectory);
	const settings = container.get<HubSettings>(REALTIME_TYPES.HubSettings);

	const app = Fastify({
		logger: { level: env.LOG_LEVEL },
	});

	// Added before the websocket plugin so rooms drain (and send their own
	// close frames) before the plugin hangs up on whatever is left.
	app.addHook("preClose", async () => {
		await rooms.stopAll(app.log);
	});

	await app.register(websocketPlugin, {
		maxMessageBytes: settings.maxMessageBytes,
	});
	await app.register(cors, {
		origin:
			env.NODE_ENV === "production"
				? env.CORS_ORIGIN
					? [env.CORS_ORIGIN]
					: false
				: true,
		methods: ["GET", "POST", "OPTIONS"],
		allowedHeaders: ["Authorization", "Content-Type"],
		maxAge: 86400,
	});

	// Swagger should not be exposed in production
	if (env.NODE_ENV !== "production") {
		await app.register(swagger, {
			openapi: {
				info: { title: "Realtime Hub API", version: "0.1.0" },
				components: {
					securitySchemes: {
						bearerAuth: {
							type: "http",
							scheme: "bearer",
						},
					},
				},
			},
		});
		await app.register(swaggerUi, {
			routePrefix: "/docs",
		});
	}

	app.setErrorHandler(createGlobalErrorHandler());
	app.addHook("onRequest", createAccessGuard(env));

	registerRoomRoutes(app, container);

	return { app, env, container };
}
