import type { FastifyError, FastifyReply, FastifyRequest } from "fastify";
import { ZodError } from "zod";

import { RealtimeError } from "@/infra/realtime/realtime.errors";
import { UserFacingError, statusCodeFor } from "@/infra/userFacingError";

type ErrorBody = {
	code: string;
	message: string;
	details?: unknown;
};

/**
 * Global error handler: user-facing and validation errors keep their message,
 * anything else becomes an opaque 500.
 */
export function createGlobalErrorHandler() {
	return async function globalErrorHandler(
		error: FastifyError,
		request: FastifyRequest,
		reply: FastifyReply
	): Promise<FastifyReply> {
		if (error instanceof UserFacingError) {
			return sendError(reply, statusCodeFor(error), {
				code: error.code,
				message: error.userMessage,
				details: error.details,
			});
		}

		if (error instanceof ZodError) {
			return sendError(reply, 400, {
				code: "VALIDATION",
				message: "Invalid request.",
				details: error.issues,
			});
		}

		if (error instanceof RealtimeError && error.code === "HUB_CLOSED") {
			return sendError(reply, 503, {
				code: "UNAVAILABLE",
				message: "Room is closed.",
			});
		}

		const statusCode = error.statusCode ?? 500;
		if (statusCode < 500) {
			request.log.warn({ err: error }, "Request rejected");
			return sendError(reply, statusCode, {
				code: error.code ?? "BAD_REQUEST",
				message: error.message,
			});
		}

		request.log.error({ err: error }, "Unhandled request error");
		return sendError(reply, 500, {
			code: "INTERNAL",
			message: "Internal server error.",
		});
	};
}

function sendError(
	reply: FastifyReply,
	statusCode: number,
	body: ErrorBody
): FastifyReply {
	return reply.code(statusCode).send(body);
}
