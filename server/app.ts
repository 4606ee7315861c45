import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";

import type { Env } from "./config/env";
import revisionRoutes from "./routes/revisions";
import type { RevisionStore } from "./services/revisionStore";

export interface BuildAppOptions {
  store: RevisionStore;
  env: Pick<
    Env,
    | "JWT_SECRET"
    | "CLIENT_ORIGIN"
    | "LOG_LEVEL"
    | "REVISIONS_DEFAULT_LIMIT"
    | "REVISIONS_PER_PAGE"
  >;
  logger?: boolean;
  now?: () => Date;
}

export async function buildApp(
  options: BuildAppOptions,
): Promise<FastifyInstance> {
  const { env, store } = options;
  const app = Fastify({
    logger: options.logger === false ? false : { level: env.LOG_LEVEL },
  });

  app.decorateRequest("userId", null);

  await app.register(cors, {
    origin: env.CLIENT_ORIGIN ?? true,
    credentials: true,
  });
  await app.register(revisionRoutes, {
    store,
    jwtSecret: env.JWT_SECRET,
    pagination: {
      defaultLimit: env.REVISIONS_DEFAULT_LIMIT,
      fallbackPerPage: env.REVISIONS_PER_PAGE,
    },
    now: options.now,
  });

  return app;
}
