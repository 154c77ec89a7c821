import path from "node:path";
import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.string().default("development"),
  PORT: z.coerce.number().int().positive().optional(),
  HOST: z.string().optional(),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  EVENT_DEBOUNCE_SECONDS: z.coerce.number().nonnegative().default(2),
  MAX_FUTURE_SKEW_SECONDS: z.coerce.number().nonnegative().default(5),
  ZONES_CONFIG_PATH: z.string().min(1).default(path.join("configs", "zones.json")),
});

export type ServiceConfig = z.infer<typeof envSchema> & {
  port: number;
  host: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = envSchema.parse({
    ...env,
    NODE_ENV: env.NODE_ENV ?? env.ENV,
    PORT: env.PORT || undefined,
  });

  return {
    ...parsed,
    port: parsed.PORT ?? 4020,
    host: parsed.HOST ?? "0.0.0.0",
  };
}
