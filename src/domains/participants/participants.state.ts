/**
 * Participants State - versioned roster snapshot and its store
 *
 * The store holds the one mutable unit (authoritative state + overlay).
 * Every helper here is pure: it returns the next state, or the same
 * reference when nothing changed so subscribers are not woken needlessly.
 */
import { createStore, type StoreApi } from "zustand/vanilla";
import type { FetchParticipantsResult } from "../../integrations/calls/types.js";
import { sortParticipants } from "./participant.ordering.js";
import type {
  InternalState,
  OverlayState,
  Participant,
  ParticipantsState,
  PeerActivity,
} from "./participant.types.js";

export type ParticipantsStore = StoreApi<InternalState>;

export const EMPTY_OVERLAY: OverlayState = {
  pendingMuteStateChanges: new Map(),
};

export function createParticipantsStore(
  initial: ParticipantsState,
): ParticipantsStore {
  return createStore<InternalState>()(() => ({
    state: initial,
    overlay: EMPTY_OVERLAY,
  }));
}

/**
 * State built from the first fetched page. Call settings and admin rights are
 * not part of the page; they arrive through their own updates.
 */
export function createInitialState(
  page: FetchParticipantsResult,
  overrides: Partial<
    Pick<
      ParticipantsState,
      | "adminIds"
      | "isCreator"
      | "defaultParticipantsAreMuted"
      | "title"
      | "recordingStartTimestamp"
    >
  > = {},
): ParticipantsState {
  return {
    participants: sortParticipants(page.participants, page.sortAscending),
    nextFetchOffset: page.nextOffset,
    adminIds: new Set(),
    isCreator: false,
    defaultParticipantsAreMuted: { isMuted: false, canChange: false },
    sortAscending: page.sortAscending,
    recordingStartTimestamp: null,
    title: null,
    totalCount: Math.max(page.totalCount, page.participants.length),
    version: page.version,
    ...overrides,
  };
}

/** Replace the participant list, re-sorted under the state's own order */
export function withSortedParticipants(
  state: ParticipantsState,
  participants: readonly Participant[],
): ParticipantsState {
  return {
    ...state,
    participants: sortParticipants(participants, state.sortAscending),
  };
}

/**
 * Carry local-only annotations from `previous` onto a freshly fetched snapshot.
 * The server knows nothing about activity ranks, and its activity timestamps
 * may lag behind what was detected locally.
 */
export function mergeActivityFrom(
  fresh: ParticipantsState,
  previous: ParticipantsState,
): ParticipantsState {
  const previousById = new Map(previous.participants.map((p) => [p.peerId, p]));

  const participants = fresh.participants.map((participant) => {
    const known = previousById.get(participant.peerId);
    if (!known) return participant;
    return {
      ...participant,
      activityRank: known.activityRank,
      activityTimestamp: maxNullable(
        participant.activityTimestamp,
        known.activityTimestamp,
      ),
    };
  });

  return {
    ...fresh,
    participants: sortParticipants(participants, fresh.sortAscending),
    adminIds: previous.adminIds,
    isCreator: previous.isCreator,
    defaultParticipantsAreMuted: previous.defaultParticipantsAreMuted,
    title: previous.title,
    recordingStartTimestamp: previous.recordingStartTimestamp,
  };
}

/**
 * Stamp `timestamp` onto the given speakers and hand out a rank to those
 * without one.
 */
export function applySpeakingReport(
  state: ParticipantsState,
  peerIds: Iterable<string>,
  timestamp: number,
  takeNextRank: () => number,
): ParticipantsState {
  const speaking = new Set(peerIds);
  let updated = false;

  const participants = state.participants.map((participant) => {
    if (!speaking.has(participant.peerId)) return participant;
    if (
      participant.activityTimestamp !== null &&
      participant.activityTimestamp >= timestamp
    ) {
      return participant;
    }
    updated = true;
    return {
      ...participant,
      activityTimestamp: timestamp,
      activityRank: participant.activityRank ?? takeNextRank(),
    };
  });

  return updated ? withSortedParticipants(state, participants) : state;
}

/** Raise activity timestamps from the audio activity feed; ranks untouched */
export function applyPeerActivities(
  state: ParticipantsState,
  activities: readonly PeerActivity[],
): ParticipantsState {
  const latest = new Map<string, number>();
  for (const { peerId, timestamp } of activities) {
    latest.set(peerId, Math.max(timestamp, latest.get(peerId) ?? timestamp));
  }

  let updated = false;
  const participants = state.participants.map((participant) => {
    const timestamp = latest.get(participant.peerId);
    if (timestamp === undefined) return participant;
    if (
      participant.activityTimestamp !== null &&
      participant.activityTimestamp >= timestamp
    ) {
      return participant;
    }
    updated = true;
    return { ...participant, activityTimestamp: timestamp };
  });

  return updated ? withSortedParticipants(state, participants) : state;
}

/**
 * Drop ranks whose speaking activity is missing or older than `ttlSeconds`.
 */
export function clearStaleActivityRanks(
  state: ParticipantsState,
  nowSeconds: number,
  ttlSeconds: number,
): ParticipantsState {
  let updated = false;

  const participants = state.participants.map((participant) => {
    if (participant.activityRank === null) return participant;
    const stale =
      participant.activityTimestamp === null ||
      participant.activityTimestamp < nowSeconds - ttlSeconds;
    if (!stale) return participant;
    updated = true;
    return { ...participant, activityRank: null };
  });

  return updated ? withSortedParticipants(state, participants) : state;
}

export function maxNullable(
  lhs: number | null,
  rhs: number | null,
): number | null {
  if (lhs !== null && rhs !== null) return Math.max(lhs, rhs);
  return lhs ?? rhs;
}
