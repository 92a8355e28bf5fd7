/**
 * Prometheus-compatible metrics for observability
 * Provides both JSON metrics (/metrics) and Prometheus format (/metrics/prometheus)
 */
import type { FastifyPluginAsync } from "fastify";
import os from "os";
import {
  Counter,
  Gauge,
  Histogram,
  Registry,
  collectDefaultMetrics,
} from "prom-client";
import type { ParticipantsContext } from "../domains/participants/participants.context.js";

// Create a custom registry
export const metricsRegistry = new Registry();

// Add default Node.js metrics (memory, CPU, event loop, etc.)
collectDefaultMetrics({ register: metricsRegistry });

/**
 * Application-specific metrics
 */
export const metrics = {
  // Delta stream
  callUpdatesTotal: new Counter({
    name: "roster_call_updates_total",
    help: "Participant deltas by processing outcome",
    labelNames: ["outcome"] as const, // applied, stale, gap
    registers: [metricsRegistry],
  }),

  participantUpdatesSkipped: new Counter({
    name: "roster_participant_updates_skipped_total",
    help: "Participant updates skipped because the peer could not be resolved",
    registers: [metricsRegistry],
  }),

  // Snapshot fetches
  rosterFetches: new Counter({
    name: "roster_fetches_total",
    help: "Participant list fetches",
    labelNames: ["purpose", "status"] as const, // resync|load_more|backfill, success|failed
    registers: [metricsRegistry],
  }),

  resyncsDeferred: new Counter({
    name: "roster_resyncs_deferred_total",
    help: "Resyncs postponed behind an outstanding fetch",
    registers: [metricsRegistry],
  }),

  // Optimistic mutations
  mutationRequests: new Counter({
    name: "roster_mutation_requests_total",
    help: "Participant mutation requests",
    labelNames: ["status"] as const, // success, failed, cancelled
    registers: [metricsRegistry],
  }),

  // Roster size
  participantsKnown: new Gauge({
    name: "roster_participants_known",
    help: "Participants currently held in the local roster",
    registers: [metricsRegistry],
  }),

  participantsTotal: new Gauge({
    name: "roster_participants_total",
    help: "Participant count reported by the server",
    registers: [metricsRegistry],
  }),

  // Push stream
  pushMessagesReceived: new Counter({
    name: "roster_push_messages_received_total",
    help: "Messages received on the call updates channel",
    labelNames: ["type", "valid"] as const,
    registers: [metricsRegistry],
  }),

  // Call API
  callApiCalls: new Counter({
    name: "roster_call_api_calls_total",
    help: "Total call API calls",
    labelNames: ["endpoint", "status"] as const,
    registers: [metricsRegistry],
  }),

  callApiLatency: new Histogram({
    name: "roster_call_api_latency_seconds",
    help: "Call API latency in seconds",
    labelNames: ["endpoint"] as const,
    buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
    registers: [metricsRegistry],
  }),
};

/**
 * Metrics Fastify routes plugin
 */
export const createMetricsRoutes = (
  participants: ParticipantsContext,
): FastifyPluginAsync => {
  return async (fastify) => {
    // Prometheus format endpoint
    fastify.get("/metrics/prometheus", async (_request, reply) => {
      updateRosterMetrics(participants);

      reply.header("Content-Type", metricsRegistry.contentType);
      return metricsRegistry.metrics();
    });

    // JSON format endpoint
    fastify.get("/metrics", async () => {
      const memoryUsage = process.memoryUsage();
      const state = participants.getState();

      return {
        system: {
          uptime: process.uptime(),
          memory: {
            rss: memoryUsage.rss,
            heapTotal: memoryUsage.heapTotal,
            heapUsed: memoryUsage.heapUsed,
            external: memoryUsage.external,
          },
          loadAverage: os.loadavg(),
        },
        application: {
          callId: participants.callId,
          version: state.version,
          participantsKnown: state.participants.length,
          participantsTotal: state.totalCount,
          processorStatus: participants.processorStatus,
        },
        timestamp: new Date().toISOString(),
      };
    });
  };
};

function updateRosterMetrics(participants: ParticipantsContext): void {
  const state = participants.getState();
  metrics.participantsKnown.set(state.participants.length);
  metrics.participantsTotal.set(state.totalCount);
}
