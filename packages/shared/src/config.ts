import { z } from "zod";
import { ConfigurationError } from "./errors.js";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().positive().default(3001),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  REDIS_URL: z.string().default("redis://localhost:6379"),
  STORE_DRIVER: z.enum(["redis", "memory"]).default("redis"),
  STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(25),
  BUCKET_TTL_MARGIN_SECONDS: z.coerce.number().int().nonnegative().default(60),
  KEY_PREFIX: z.string().min(1).default("tollgate"),
  RULES_FILE: z.string().min(1).default("config/rules.json"),
  TRUST_PROXY: booleanFlag,
  ADMIN_TOKEN: z.string().min(1).default("change-me"),
  AUDIT_DATABASE_URL: z.string().optional(),
  OTEL_SERVICE_NAME: z.string().default("tollgate-api"),
  OTEL_EXPORTER_OTLP_ENDPOINT: z.string().optional()
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError("Invalid environment configuration", issues);
  }
  return parsed.data;
}
