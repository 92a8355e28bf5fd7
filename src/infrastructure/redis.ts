import { Redis, type RedisOptions } from "ioredis";
import { config } from "../config/index.js";
import { logger } from "./logger.js";

const MAX_RETRY_DELAY_MS = 2_000;

let redisInstance: Redis | null = null;

function buildOptions(): RedisOptions {
  return {
    host: config.REDIS_HOST,
    port: config.REDIS_PORT,
    db: config.REDIS_DB,
    ...(config.REDIS_USERNAME && { username: config.REDIS_USERNAME }),
    ...(config.REDIS_PASSWORD && { password: config.REDIS_PASSWORD }),
    ...(config.REDIS_TLS && { tls: { rejectUnauthorized: true } }),
    // Shows up in CLIENT LIST next to the subscriber's duplicate
    connectionName: `roster:${config.CALL_ID}`,
    connectTimeout: 10_000,
    commandTimeout: 5_000,
    maxRetriesPerRequest: 3,
    retryStrategy: (times) => Math.min(times * 50, MAX_RETRY_DELAY_MS),
  };
}

/** Shared command connection for the peer directory; pub/sub duplicates it */
export function getRedisClient(): Redis {
  if (redisInstance) return redisInstance;

  const client = new Redis(buildOptions());
  const redisLogger = logger.child({ component: "redis", callId: config.CALL_ID });

  client.on("error", (err) => {
    redisLogger.error({ err }, "Redis connection error");
  });
  client.on("ready", () => {
    redisLogger.info("Redis ready");
  });
  client.on("reconnecting", (delay: number) => {
    redisLogger.warn({ delay }, "Redis reconnecting; peer lookups will fail until ready");
  });

  redisInstance = client;
  return client;
}

export async function closeRedisClient(): Promise<void> {
  if (!redisInstance) return;
  const client = redisInstance;
  redisInstance = null;

  if (client.status === "ready") {
    await client.quit();
  } else {
    client.disconnect();
  }
}
