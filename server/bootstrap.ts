import type { FastifyInstance } from "fastify";
import mongoose from "mongoose";

import { buildApp } from "./app";
import { loadEnv, type Env } from "./config/env";
import { createMongooseRevisionStore } from "./services/revisionStore";

export interface BootstrapDeps {
  loadEnv: () => Env;
  createApp: (env: Env) => Promise<FastifyInstance>;
  connect: (uri: string) => Promise<unknown>;
  disconnect: () => Promise<unknown>;
  /** Used while no app logger exists yet. */
  reportFatal: (message: string, error: unknown) => void;
  exit: (code: number) => never;
}

const defaultDeps: BootstrapDeps = {
  loadEnv: () => loadEnv(),
  createApp: (env) => buildApp({ env, store: createMongooseRevisionStore() }),
  connect: (uri) => mongoose.connect(uri),
  disconnect: () => mongoose.disconnect(),
  reportFatal: (message, error) => console.error(message, error),
  exit: (code) => process.exit(code),
};

export async function bootstrap(
  deps: BootstrapDeps = defaultDeps,
): Promise<FastifyInstance> {
  let env: Env;
  try {
    env = deps.loadEnv();
  } catch (err) {
    deps.reportFatal("[FATAL] Invalid configuration", err);
    return deps.exit(1);
  }

  let app: FastifyInstance | null = null;
  try {
    app = await deps.createApp(env);

    app.log.info("[STARTUP] Connecting to MongoDB...");
    await deps.connect(env.MONGO_URI);
    app.log.info("[STARTUP] MongoDB connected");

    await app.listen({ port: env.PORT, host: env.HOST });
    app.log.info(`[STARTUP] HTTP Server started on port ${env.PORT}`);
    return app;
  } catch (err) {
    if (app) {
      app.log.error(err, "[FATAL] Failed to start server");
    } else {
      deps.reportFatal("[FATAL] Failed to start server", err);
    }
    await deps.disconnect();
    return deps.exit(1);
  }
}
