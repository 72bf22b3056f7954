import { SessionStoreError } from "@kvsession/core";
import { z } from "zod";
import type { RedisConnectionParams } from "./internal/redisClient";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const redisEnvSchema = z.object({
  SESSION_REDIS_URL: z.string().url().optional(),
  SESSION_REDIS_HOST: z.string().min(1).optional(),
  SESSION_REDIS_PORT: z.coerce.number().int().min(1).max(65535).optional(),
  SESSION_REDIS_USERNAME: z.string().min(1).optional(),
  SESSION_REDIS_PASSWORD: z.string().min(1).optional(),
  SESSION_REDIS_DB: z.coerce.number().int().min(0).optional(),
  SESSION_REDIS_TLS: booleanFlag.optional(),
});

/**
 * Reads Redis connection params from `SESSION_REDIS_*` variables.
 */
export function loadRedisConnectionFromEnv(
  env: Record<string, string | undefined> = process.env,
): RedisConnectionParams {
  const result = redisEnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new SessionStoreError("CONFIGURATION_ERROR", `Invalid Redis configuration: ${issues.join("; ")}`, result.error, {
      issues,
    });
  }

  const parsed = result.data;
  if (!parsed.SESSION_REDIS_URL && !parsed.SESSION_REDIS_HOST) {
    throw new SessionStoreError(
      "CONFIGURATION_ERROR",
      "Either SESSION_REDIS_URL or SESSION_REDIS_HOST must be set.",
    );
  }

  const params: RedisConnectionParams = {};
  if (parsed.SESSION_REDIS_URL) params.url = parsed.SESSION_REDIS_URL;
  if (parsed.SESSION_REDIS_HOST) params.host = parsed.SESSION_REDIS_HOST;
  if (parsed.SESSION_REDIS_PORT !== undefined) params.port = parsed.SESSION_REDIS_PORT;
  if (parsed.SESSION_REDIS_USERNAME) params.username = parsed.SESSION_REDIS_USERNAME;
  if (parsed.SESSION_REDIS_PASSWORD) params.password = parsed.SESSION_REDIS_PASSWORD;
  if (parsed.SESSION_REDIS_DB !== undefined) params.database = parsed.SESSION_REDIS_DB;
  if (parsed.SESSION_REDIS_TLS !== undefined) params.tls = parsed.SESSION_REDIS_TLS;
  return params;
}
