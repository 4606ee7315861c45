import type {
  FastifyReply,
  FastifyRequest,
  preHandlerAsyncHookHandler,
} from "fastify";
import * as jwt from "jsonwebtoken";

declare module "fastify" {
  interface FastifyRequest {
    userId: string | null;
  }
}

export type TokenCheck =
  | { status: "anonymous" }
  | { status: "invalid" }
  | { status: "authenticated"; userId: string };

export function checkBearerToken(
  header: string | undefined,
  jwtSecret: string,
): TokenCheck {
  if (!header || !header.startsWith("Bearer ")) {
    return { status: "anonymous" };
  }
  const token = header.replace("Bearer ", "");
  try {
    const payload = jwt.verify(token, jwtSecret);
    if (typeof payload === "string") {
      return { status: "invalid" };
    }
    const userId = payload.user_id;
    if (typeof userId !== "string" && typeof userId !== "number") {
      return { status: "invalid" };
    }
    return { status: "authenticated", userId: String(userId) };
  } catch {
    return { status: "invalid" };
  }
}

/** Records the requester when a valid token is present; never rejects. */
export function identifyRequester(jwtSecret: string): preHandlerAsyncHookHandler {
  return async (req: FastifyRequest) => {
    const check = checkBearerToken(req.headers["authorization"], jwtSecret);
    req.userId = check.status === "authenticated" ? check.userId : null;
  };
}

export function requireAuth(jwtSecret: string): preHandlerAsyncHookHandler {
  return async (req: FastifyRequest, reply: FastifyReply) => {
    const check = checkBearerToken(req.headers["authorization"], jwtSecret);
    if (check.status === "anonymous") {
      return reply
        .status(401)
        .send({ error: "Missing or invalid Authorization header" });
    }
    if (check.status === "invalid") {
      return reply.status(401).send({ error: "Invalid or expired token" });
    }
    req.userId = check.userId;
  };
}
