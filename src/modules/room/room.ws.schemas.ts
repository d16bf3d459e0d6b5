/**
 * Server -> Client events emitted by the room itself.
 * Everything else on the socket is relayed verbatim from other members.
 */
export type RoomWsServerEvent = {
	type: "room.ready";
	payload: { roomId: string; connId: string; serverTime: string };
};

export function encodeRoomEvent(event: RoomWsServerEvent): string {
	return JSON.stringify(event);
}
