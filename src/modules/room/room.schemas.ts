import { z } from "zod";

export const RoomParamsSchema = z.object({
	roomId: z
		.string()
		.regex(/^[A-Za-z0-9_-]{1,64}$/, "roomId must be 1-64 characters of [A-Za-z0-9_-]"),
});

export type RoomParams = z.infer<typeof RoomParamsSchema>;

export function createRoomBroadcastBodySchema(maxMessageBytes: number) {
	return z.object({
		text: z
			.string()
			.min(1)
			.refine((text) => Buffer.byteLength(text, "utf8") <= maxMessageBytes, {
				message: `text must be at most ${maxMessageBytes} bytes`,
			}),
	});
}

export type RoomBroadcastBody = z.infer<
	ReturnType<typeof createRoomBroadcastBodySchema>
>;
