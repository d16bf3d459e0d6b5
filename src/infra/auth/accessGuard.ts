import { timingSafeEqual } from "node:crypto";
import type { FastifyReply, FastifyRequest } from "fastify";

import type { Env } from "@/config/env";

const PUBLIC_PREFIXES = ["/health", "/docs"];

function getBearerTokenFromHeader(req: FastifyRequest): string | null {
  const header = req.headers.authorization;
  if (!header) return null;

  const [type, token] = header.split(" ");
  if (type?.toLowerCase() !== "bearer" || !token) return null;

  const t = token.trim();
  return t.length ? t : null;
}

/**
 * WS in browsers usually can't send Authorization header.
 * Allow token via query param ONLY for /ws/* routes:
 *   ws://host/ws/rooms/:roomId?token=...
 */
function getTokenFromQuery(req: FastifyRequest): string | null {
  const url = req.url ?? "";
  const idx = url.indexOf("?");
  if (idx === -1) return null;

  const params = new URLSearchParams(url.slice(idx + 1));
  const token = params.get("token") ?? params.get("access_token");
  const t = (token ?? "").trim();
  return t.length ? t : null;
}

function tokensMatch(candidate: string, expected: string): boolean {
  const a = Buffer.from(candidate, "utf8");
  const b = Buffer.from(expected, "utf8");
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Shared-secret guard in front of the hub. Real identity checks belong to
 * whatever sits before this service; with no token configured every request
 * is let through.
 */
export function createAccessGuard(env: Env) {
  const expected = env.HUB_ACCESS_TOKEN;

  return async function accessGuard(
    request: FastifyRequest,
    reply: FastifyReply,
  ): Promise<FastifyReply | undefined> {
    if (!expected) return;

    // Let CORS preflight pass through.
    if (request.method === "OPTIONS") return;

    const pathname = (request.url.split("?")[0] ?? request.url) || "";
    if (PUBLIC_PREFIXES.some((prefix) => pathname.startsWith(prefix))) return;

    const isWsRoute = pathname.startsWith("/ws/");
    const token =
      getBearerTokenFromHeader(request) ?? (isWsRoute ? getTokenFromQuery(request) : null);

    if (!token || !tokensMatch(token, expected)) {
      request.log.warn({ path: pathname }, "Access denied");
      return reply.code(401).send({ code: "UNAUTHORIZED", message: "Unauthorized" });
    }
  };
}
