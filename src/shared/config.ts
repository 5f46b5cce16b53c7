import { z } from "zod";

const envSchema = z.object({
  APP_ENV: z.enum(["development", "test", "production"]).default("development"),
  APP_VERSION: z.string().default("1.0.0"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  REJECTION_POLICY: z.enum(["log", "silent"]).default("log"),
  WORKER_PARTITIONS: z.coerce.number().int().min(1).max(64).default(4),
  QUEUE_CAPACITY: z.coerce.number().int().min(1).max(100_000).default(1024),
  DISPUTE_WITHDRAWALS: z
    .enum(["true", "false"])
    .default("false")
    .transform((v) => v === "true"),
});

export type Config = z.infer<typeof envSchema>;

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  return envSchema.parse(env);
}

export const config: Config = loadConfig();
