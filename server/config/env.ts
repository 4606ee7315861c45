// server/config/env.ts
import "dotenv/config";
import { z } from "zod";

const schema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  PORT: z.coerce.number().int().positive().default(8080),
  HOST: z.string().default("0.0.0.0"),
  MONGO_URI: z.string().default("mongodb://127.0.0.1:27017/wiki"),
  JWT_SECRET: z.string().min(1).default("dev_secret"),
  CLIENT_ORIGIN: z.string().optional(),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  REVISIONS_DEFAULT_LIMIT: z.coerce.number().int().positive().default(10),
  REVISIONS_PER_PAGE: z.coerce.number().int().positive().default(100),
});

export type Env = z.infer<typeof schema>;

export const loadEnv = (source: NodeJS.ProcessEnv = process.env): Env =>
  schema.parse(source);
