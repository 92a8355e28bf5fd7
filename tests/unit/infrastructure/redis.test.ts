import { describe, it, expect, vi, beforeEach } from "vitest";

const { RedisMock, redisLogger } = vi.hoisted(() => {
  class RedisMock {
    static instances: RedisMock[] = [];
    status = "ready";
    on = vi.fn();
    quit = vi.fn(async () => "OK");
    disconnect = vi.fn();

    constructor(readonly options: Record<string, unknown>) {
      RedisMock.instances.push(this);
    }
  }
  const redisLogger = { error: vi.fn(), warn: vi.fn(), info: vi.fn() };
  return { RedisMock, redisLogger };
});

vi.mock("ioredis", () => ({ Redis: RedisMock }));

vi.mock("@src/config/index.js", () => ({
  config: {
    REDIS_HOST: "127.0.0.1",
    REDIS_PORT: 6379,
    REDIS_DB: 2,
    REDIS_TLS: false,
    CALL_ID: "call-1",
  },
  isDev: false,
}));

vi.mock("@src/infrastructure/logger.js", () => ({
  logger: { child: () => redisLogger },
}));

import { closeRedisClient, getRedisClient } from "@src/infrastructure/redis.js";

describe("Redis client", () => {
  beforeEach(async () => {
    await closeRedisClient();
    RedisMock.instances.length = 0;
    vi.clearAllMocks();
  });

  it("creates one connection named after the call", () => {
    const first = getRedisClient();
    const second = getRedisClient();

    expect(first).toBe(second);
    expect(RedisMock.instances).toHaveLength(1);
    expect(RedisMock.instances[0]?.options).toMatchObject({
      host: "127.0.0.1",
      port: 6379,
      db: 2,
      connectionName: "roster:call-1",
      maxRetriesPerRequest: 3,
    });
    expect(RedisMock.instances[0]?.options).not.toHaveProperty("tls");
  });

  it("caps the reconnect delay", () => {
    getRedisClient();
    const { retryStrategy } = RedisMock.instances[0]?.options ?? {};

    expect(typeof retryStrategy).toBe("function");
    if (typeof retryStrategy !== "function") return;
    expect(retryStrategy(3)).toBe(150);
    expect(retryStrategy(100)).toBe(2000);
  });

  it("logs reconnects", () => {
    getRedisClient();
    const instance = RedisMock.instances[0];
    const reconnecting = instance?.on.mock.calls.find(([event]) => event === "reconnecting");

    expect(reconnecting).toBeDefined();
    reconnecting?.[1](400);

    expect(redisLogger.warn).toHaveBeenCalledWith(
      { delay: 400 },
      "Redis reconnecting; peer lookups will fail until ready",
    );
  });

  it("quits a ready connection and starts fresh afterwards", async () => {
    const first = getRedisClient();
    const instance = RedisMock.instances[0];

    await closeRedisClient();

    expect(instance?.quit).toHaveBeenCalledTimes(1);
    expect(getRedisClient()).not.toBe(first);
  });

  it("drops a connection that never became ready", async () => {
    getRedisClient();
    const instance = RedisMock.instances[0];
    if (instance) instance.status = "reconnecting";

    await closeRedisClient();

    expect(instance?.quit).not.toHaveBeenCalled();
    expect(instance?.disconnect).toHaveBeenCalledTimes(1);
  });
});
