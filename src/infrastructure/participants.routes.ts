/**
 * Participants Fastify routes plugin
 * Read-only view of the effective roster for operators and dashboards.
 */
import type { FastifyPluginAsync } from "fastify";
import type { ParticipantsContext } from "../domains/participants/participants.context.js";
import type { ParticipantsState } from "../domains/participants/participant.types.js";

export const createParticipantsRoutes = (
  participants: Pick<ParticipantsContext, "callId" | "getState">,
): FastifyPluginAsync => {
  return async (fastify) => {
    fastify.get("/participants", async () => ({
      callId: participants.callId,
      ...toParticipantsView(participants.getState()),
    }));
  };
};

/** JSON-friendly copy of the state; sets become arrays */
export function toParticipantsView(state: ParticipantsState) {
  return {
    version: state.version,
    totalCount: state.totalCount,
    nextFetchOffset: state.nextFetchOffset,
    sortAscending: state.sortAscending,
    title: state.title,
    recordingStartTimestamp: state.recordingStartTimestamp,
    isCreator: state.isCreator,
    adminIds: [...state.adminIds],
    defaultParticipantsAreMuted: state.defaultParticipantsAreMuted,
    participants: state.participants,
  };
}
