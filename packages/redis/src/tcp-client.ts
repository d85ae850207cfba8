import { Redis } from "ioredis";
import { parseRedisTCPConfig, type RedisTCPConfig } from "./config.js";

/**
 * Minimal logger surface; satisfied by both console and pino
 */
export interface RedisClientLogger {
  info(message: string): void;
  warn(message: string): void;
  error(error: unknown, message: string): void;
}

export interface RedisTCPClientOptions {
  /** Receives connection lifecycle events (default: console) */
  logger?: RedisClientLogger;
  /** Defer connecting until the first command */
  lazyConnect?: boolean;
}

/**
 * Creates a persistent TCP connection to Redis using ioredis.
 * Each call returns a new connection owned by the caller; pass it to the
 * components that need it and close it with closeRedisTCPClient.
 *
 * @param env - Environment variables containing Redis connection details
 * @throws {z.ZodError} If configuration validation fails
 *
 * @example
 * ```typescript
 * const redis = createRedisTCPClient({
 *   REDIS_HOST: 'redis.example.com',
 *   REDIS_PORT: '6379',
 *   REDIS_TLS: 'true'
 * });
 * ```
 */
export function createRedisTCPClient(
  env: Record<string, string | undefined>,
  options: RedisTCPClientOptions = {}
): Redis {
  return createRedisTCPClientFromConfig(parseRedisTCPConfig(env), options);
}

/**
 * Same as createRedisTCPClient, for a configuration that is already parsed
 */
export function createRedisTCPClientFromConfig(
  config: RedisTCPConfig,
  options: RedisTCPClientOptions = {}
): Redis {
  const logger = options.logger ?? console;

  const client = new Redis({
    host: config.REDIS_HOST,
    port: config.REDIS_PORT,
    password: config.REDIS_PASSWORD,
    db: config.REDIS_DB,
    tls: config.REDIS_TLS ? {} : undefined,

    // Connection management
    keepAlive: 30_000,
    connectTimeout: 10_000,
    enableOfflineQueue: true,
    lazyConnect: options.lazyConnect ?? false,

    // Exponential backoff: 50ms, 100ms, 150ms, ..., up to 2s
    retryStrategy: (times) => {
      if (times > 10) {
        return null;
      }
      return Math.min(times * 50, 2000);
    },

    // Reconnect when a replica was promoted to master
    reconnectOnError: (err) => err.message.includes("READONLY"),

    enableReadyCheck: true,
  });

  client.on("connect", () => {
    logger.info("[Redis TCP] Connected to Redis");
  });

  client.on("ready", () => {
    logger.info("[Redis TCP] Redis connection ready");
  });

  client.on("error", (err) => {
    logger.error(err, "[Redis TCP] Redis connection error");
  });

  client.on("close", () => {
    logger.warn("[Redis TCP] Redis connection closed");
  });

  client.on("reconnecting", () => {
    logger.info("[Redis TCP] Reconnecting to Redis...");
  });

  return client;
}

/**
 * Closes a Redis TCP connection, waiting for pending replies.
 */
export async function closeRedisTCPClient(client: Redis): Promise<void> {
  await client.quit();
}
