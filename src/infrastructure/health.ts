import type { FastifyPluginAsync } from "fastify";
import type { ParticipantsContext } from "../domains/participants/participants.context.js";

export interface HealthSources {
  redis: { readonly status: string };
  subscriber: { readonly running: boolean };
  participants: Pick<ParticipantsContext, "callId" | "processorStatus">;
}

export const createHealthRoutes = ({
  redis,
  subscriber,
  participants,
}: HealthSources): FastifyPluginAsync => {
  return async (fastify) => {
    fastify.get("/health", async (_request, reply) => {
      const redisOk = redis.status === "ready";
      const pushOk = subscriber.running;
      const processorOk = participants.processorStatus !== "halted";

      const status = redisOk && pushOk && processorOk ? "ok" : "degraded";
      if (status !== "ok") {
        reply.code(503);
      }

      return {
        status,
        redis: redis.status,
        subscriber: pushOk ? "running" : "stopped",
        roster: {
          callId: participants.callId,
          processor: participants.processorStatus,
        },
        uptime: process.uptime(),
        timestamp: new Date().toISOString(),
      };
    });
  };
};
