import fp from "fastify-plugin";
import websocket from "@fastify/websocket";

export type WebsocketPluginOptions = {
	maxMessageBytes: number;
};

/**
 * Registers WebSocket support for Fastify.
 * Must be registered BEFORE WS routes.
 */
export const websocketPlugin = fp<WebsocketPluginOptions>(async (app, opts) => {
	await app.register(websocket, {
		options: {
			// one byte of headroom so the connection agent sees oversized
			// frames itself and closes with 1009
			maxPayload: opts.maxMessageBytes + 1,
		},
	});
});
