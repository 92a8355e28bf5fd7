import { config } from "./config/index.js";
import type { AppContext } from "./context.js";
import { ParticipantsContext, createInitialState } from "./domains/participants/index.js";
import { CallApiClient } from "./integrations/calls/call-api.client.js";
import { RedisPeerRepository } from "./integrations/calls/peer.repository.js";
import { CallUpdateSubscriber } from "./integrations/calls/update-subscriber.js";
import { createCallLogger, logger } from "./infrastructure/logger.js";
import { closeRedisClient, getRedisClient } from "./infrastructure/redis.js";
import { bootstrapServer } from "./infrastructure/server.js";

const start = async () => {
  try {
    const redis = getRedisClient();
    const callLogger = createCallLogger(config.CALL_ID);

    const peers = new RedisPeerRepository(redis, logger);
    const callApi = new CallApiClient(peers, logger);

    const firstPage = await callApi.fetchParticipants({
      callId: config.CALL_ID,
      offset: "",
      ssrcs: [],
      limit: config.PARTICIPANTS_PAGE_LIMIT,
    });

    const participants = new ParticipantsContext({
      callId: config.CALL_ID,
      myPeerId: config.MY_PEER_ID,
      initialState: createInitialState(firstPage),
      network: callApi,
      peers,
      logger: callLogger,
      pageLimit: config.PARTICIPANTS_PAGE_LIMIT,
      decayIntervalMs: config.ACTIVITY_DECAY_INTERVAL_MS,
      rankTtlMs: config.ACTIVITY_RANK_TTL_MS,
      onFatalError: () => process.exit(1),
    });

    const subscriber = new CallUpdateSubscriber(
      redis,
      config.CALL_UPDATES_CHANNEL,
      config.CALL_ID,
      peers,
      {
        onUpdates: (updates) => participants.addUpdates(updates),
        onActivities: (activities) => participants.applyPeerActivities(activities),
      },
      callLogger,
    );
    await subscriber.start();

    const ctx: AppContext = { redis, peers, callApi, participants, subscriber };
    const server = await bootstrapServer(ctx);

    const address = await server.listen({
      port: config.PORT,
      host: "0.0.0.0",
    });

    logger.info(`Server listening at ${address}`);
    logger.info(`Environment: ${config.NODE_ENV}`);
    logger.info(
      { callId: config.CALL_ID, version: firstPage.version, participants: firstPage.participants.length },
      "Roster loaded",
    );

    // Graceful Shutdown Logic
    let isShuttingDown = false;

    const gracefulShutdown = async (signal: string) => {
      if (isShuttingDown) return;
      isShuttingDown = true;

      logger.info({ signal }, "Graceful shutdown initiated");

      const timeoutMs = 30_000;
      const shutdownTimeout = setTimeout(() => {
        logger.error("Shutdown timeout exceeded, forcing exit");
        process.exit(1);
      }, timeoutMs);

      try {
        // 1. Stop taking pushes
        await subscriber.stop();

        // 2. Stop timers and abort in-flight requests
        participants.dispose();

        // 3. Close Redis
        await closeRedisClient();

        // 4. Close Fastify
        await server.close();

        clearTimeout(shutdownTimeout);
        logger.info("Graceful shutdown complete");
        process.exit(0);
      } catch (err) {
        logger.error({ err }, "Error during shutdown");
        process.exit(1);
      }
    };

    process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
    process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
  } catch (err) {
    logger.error({ err }, "Failed to start server");
    process.exit(1);
  }
};

// Handle unhandled rejections
process.on("unhandledRejection", (err) => {
  logger.fatal({ err }, "Unhandled Rejection");
  process.exit(1);
});

void start();
