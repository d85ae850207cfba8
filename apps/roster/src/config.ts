import { DEFAULT_CHANNEL_KEY } from "@relay-roster/protocol";
import { RedisTCPConfigSchema } from "@relay-roster/redis";
import { z } from "zod";
import { ConfigError } from "./utils/errors.js";

/**
 * Variables the logger reads when the module loads
 */
export const LoggerConfigSchema = z.object({
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type LoggerConfig = z.infer<typeof LoggerConfigSchema>;

const ConfigSchema = LoggerConfigSchema.extend({
  // Broker channel namespace
  JUGGERNAUT_KEY: z.string().min(1).default(DEFAULT_CHANNEL_KEY),

  // Presence store
  ROSTER_KEY_PREFIX: z.string().default("juggernaut-roster:"),
  ROSTER_USER_META_KEY: z.string().min(1).default("user_id"),
}).merge(RedisTCPConfigSchema);

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse the runtime configuration from an environment
 *
 * @throws {ConfigError} Listing every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): Config {
  const result = ConfigSchema.safeParse(env);

  if (!result.success) {
    throw toConfigError(result.error);
  }

  return result.data;
}

/**
 * Parse only the logging variables, so that loading the package does not
 * depend on the rest of the environment
 *
 * @throws {ConfigError} Listing every invalid variable
 */
export function loadLoggerConfig(
  env: Record<string, string | undefined> = process.env
): LoggerConfig {
  const result = LoggerConfigSchema.safeParse(env);

  if (!result.success) {
    throw toConfigError(result.error);
  }

  return result.data;
}

function toConfigError(error: z.ZodError): ConfigError {
  return new ConfigError(
    error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
  );
}
