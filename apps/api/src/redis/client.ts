import type { FastifyBaseLogger } from "fastify";
import { Redis } from "ioredis";

export interface RedisClientOptions {
  commandTimeoutMs: number;
}

export function createRedisClient(url: string, options: RedisClientOptions, logger: FastifyBaseLogger): Redis {
  const redis = new Redis(url, {
    maxRetriesPerRequest: 0,
    commandTimeout: options.commandTimeoutMs,
    enableOfflineQueue: false,
    enableAutoPipelining: true,
    lazyConnect: true
  });

  redis.on("error", (error: unknown) => {
    logger.error({ err: error }, "Redis client error");
  });

  return redis;
}
