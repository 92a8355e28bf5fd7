import Fastify from "fastify";
import type { AppContext } from "../context.js";
import { createHealthRoutes } from "./health.js";
import { logger } from "./logger.js";
import { createMetricsRoutes } from "./metrics.js";
import { createParticipantsRoutes } from "./participants.routes.js";

export async function bootstrapServer(ctx: AppContext) {
  const fastify = Fastify({ loggerInstance: logger });

  await fastify.register(
    createHealthRoutes({
      redis: ctx.redis,
      subscriber: ctx.subscriber,
      participants: ctx.participants,
    }),
  );
  await fastify.register(createMetricsRoutes(ctx.participants));
  await fastify.register(createParticipantsRoutes(ctx.participants));

  return fastify;
}
