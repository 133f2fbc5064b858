import { z } from "zod";

export const DEFAULT_PORT = 3000;
export const DEFAULT_DATABASE_URL = "sqlite:data/todos.db";
export const DEFAULT_LOG_FORMAT = "dev";

const configSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).catch(DEFAULT_PORT),
  DATABASE_URL: z.string().trim().min(1).catch(DEFAULT_DATABASE_URL),
  LOG_FORMAT: z.string().trim().min(1).catch(DEFAULT_LOG_FORMAT),
});

export interface AppConfig {
  port: number;
  databaseUrl: string;
  logFormat: string;
}

// Malformed values fall back to the defaults.
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.parse({
    PORT: env.PORT,
    DATABASE_URL: env.DATABASE_URL,
    LOG_FORMAT: env.LOG_FORMAT,
  });
  return {
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    logFormat: parsed.LOG_FORMAT,
  };
}
