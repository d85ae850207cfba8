import { z } from "zod";

/**
 * Configuration schema for Redis TCP connection using ioredis.
 * Every variable has a default so a local broker works without setup.
 */
export const RedisTCPConfigSchema = z.object({
  /** Redis host (e.g., 'redis.example.com') */
  REDIS_HOST: z.string().min(1, "REDIS_HOST must not be empty").default("127.0.0.1"),
  /** Redis port (default: 6379 or 6380 for TLS) */
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  /** Redis password/auth token, if the broker requires one */
  REDIS_PASSWORD: z.string().min(1).optional(),
  /** Enable TLS/SSL connection */
  REDIS_TLS: z
    .string()
    .optional()
    .transform((val) => val === "true" || val === "1"),
  /** Logical database index */
  REDIS_DB: z.coerce.number().int().min(0).default(0),
});

/** Inferred type from RedisTCPConfigSchema */
export type RedisTCPConfig = z.infer<typeof RedisTCPConfigSchema>;

/**
 * Pick the Redis variables out of an environment and validate them.
 *
 * @throws {z.ZodError} If a variable is malformed
 */
export function parseRedisTCPConfig(
  env: Record<string, string | undefined>
): RedisTCPConfig {
  return RedisTCPConfigSchema.parse({
    REDIS_HOST: env.REDIS_HOST,
    REDIS_PORT: env.REDIS_PORT,
    REDIS_PASSWORD: env.REDIS_PASSWORD,
    REDIS_TLS: env.REDIS_TLS,
    REDIS_DB: env.REDIS_DB,
  });
}
