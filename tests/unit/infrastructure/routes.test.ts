import { describe, it, expect, vi, beforeEach } from "vitest";
import Fastify from "fastify";
import { createHealthRoutes } from "@src/infrastructure/health.js";
import { createParticipantsRoutes } from "@src/infrastructure/participants.routes.js";
import type { ProcessorStatus } from "@src/domains/participants/update.processor.js";
import { makeParticipant, makeState } from "../domains/participants/fixtures.js";

// ─── Helpers ────────────────────────────────────────────────────────

function createHealthSources(
  redisStatus: string,
  running: boolean,
  processorStatus: ProcessorStatus = "idle",
) {
  return {
    redis: { status: redisStatus },
    subscriber: { running },
    participants: { callId: "call-1", processorStatus },
  };
}

// ─── Tests ──────────────────────────────────────────────────────────

describe("HTTP routes", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe("GET /health", () => {
    it("reports ok when Redis and the subscriber are up", async () => {
      const app = Fastify();
      await app.register(createHealthRoutes(createHealthSources("ready", true)));

      const response = await app.inject({ method: "GET", url: "/health" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        status: "ok",
        redis: "ready",
        subscriber: "running",
        roster: { callId: "call-1", processor: "idle" },
      });
      await app.close();
    });

    it("reports degraded with 503 when Redis is not ready", async () => {
      const app = Fastify();
      await app.register(createHealthRoutes(createHealthSources("reconnecting", true)));

      const response = await app.inject({ method: "GET", url: "/health" });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toMatchObject({ status: "degraded", redis: "reconnecting" });
      await app.close();
    });

    it("reports degraded when the update processor has halted", async () => {
      const app = Fastify();
      await app.register(createHealthRoutes(createHealthSources("ready", true, "halted")));

      const response = await app.inject({ method: "GET", url: "/health" });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toMatchObject({
        status: "degraded",
        roster: { processor: "halted" },
      });
      await app.close();
    });
  });

  describe("GET /participants", () => {
    it("serves the effective roster with sets flattened", async () => {
      const state = makeState({
        participants: [makeParticipant("A", { ssrc: 5 })],
        adminIds: new Set(["A"]),
        totalCount: 1,
        version: 7,
      });
      const app = Fastify();
      await app.register(
        createParticipantsRoutes({ callId: "call-1", getState: () => state }),
      );

      const response = await app.inject({ method: "GET", url: "/participants" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        callId: "call-1",
        version: 7,
        totalCount: 1,
        nextFetchOffset: null,
        sortAscending: true,
        title: null,
        recordingStartTimestamp: null,
        isCreator: false,
        adminIds: ["A"],
        defaultParticipantsAreMuted: { isMuted: false, canChange: true },
        participants: [
          {
            peerId: "A",
            ssrc: 5,
            joinTimestamp: 100,
            activityTimestamp: null,
            activityRank: null,
            raiseHandRating: null,
            muteState: null,
            volume: null,
            about: null,
          },
        ],
      });
      await app.close();
    });
  });
});
