/**
 * Call wire schemas
 * Zod schemas for push messages and call API responses, plus their
 * normalization into roster domain types.
 */
import { z } from "zod";
import type {
  CallSettingsUpdate,
  CallUpdate,
  MuteState,
  Participant,
  ParticipantUpdate,
  ParticipantsUpdate,
  PeerActivity,
} from "../../domains/participants/participant.types.js";
import type { PeerRecord } from "./types.js";

// ─────────────────────────────────────────────────────────────────
// Wire Schemas
// ─────────────────────────────────────────────────────────────────

export const peerWireSchema = z.object({
  id: z.string().min(1),
  display_name: z.string(),
});

export const participantWireSchema = z.object({
  peer_id: z.string().min(1),
  ssrc: z.number().int().nullable().default(null),
  join_date: z.number(),
  active_date: z.number().nullable().default(null),
  raise_hand_rating: z.number().nullable().default(null),
  muted: z.boolean().default(false),
  can_self_unmute: z.boolean().default(true),
  muted_by_you: z.boolean().default(false),
  volume: z.number().int().nullable().default(null),
  about: z.string().nullable().default(null),
  left: z.boolean().default(false),
  just_joined: z.boolean().default(false),
  min: z.boolean().default(false),
});

const participantsMessageSchema = z.object({
  type: z.literal("participants"),
  call_id: z.string().min(1),
  version: z.number().int().nonnegative(),
  participants: z.array(participantWireSchema),
  peers: z.array(peerWireSchema).default([]),
});

const callMessageSchema = z.object({
  type: z.literal("call"),
  call_id: z.string().min(1),
  join_muted: z.boolean(),
  can_change_join_muted: z.boolean(),
  title: z.string().nullable().default(null),
  record_start_date: z.number().nullable().default(null),
});

const activityMessageSchema = z.object({
  type: z.literal("activity"),
  call_id: z.string().min(1),
  activities: z.array(
    z.object({
      peer_id: z.string().min(1),
      date: z.number(),
    }),
  ),
});

/** Anything the server can answer a mutation with */
export const callUpdateWireSchema = z.discriminatedUnion("type", [
  participantsMessageSchema,
  callMessageSchema,
]);

/** Messages published on the call updates channel */
export const pushMessageSchema = z.discriminatedUnion("type", [
  participantsMessageSchema,
  callMessageSchema,
  activityMessageSchema,
]);

export const participantsPageSchema = z.object({
  participants: z.array(participantWireSchema),
  peers: z.array(peerWireSchema).default([]),
  next_offset: z.string().nullable().default(null),
  count: z.number().int().nonnegative(),
  version: z.number().int().nonnegative(),
  sort_ascending: z.boolean().default(false),
});

export const updatesResponseSchema = z.object({
  updates: z.array(callUpdateWireSchema).default([]),
});

export type PeerWire = z.infer<typeof peerWireSchema>;
export type ParticipantWire = z.infer<typeof participantWireSchema>;
export type CallUpdateWire = z.infer<typeof callUpdateWireSchema>;
export type PushMessage = z.infer<typeof pushMessageSchema>;
export type ParticipantsPage = z.infer<typeof participantsPageSchema>;

// ─────────────────────────────────────────────────────────────────
// Normalization
// ─────────────────────────────────────────────────────────────────

export function toPeerRecord(peer: PeerWire): PeerRecord {
  return { id: peer.id, displayName: peer.display_name };
}

/** Unmuted participants nobody muted locally carry no mute state */
export function toMuteState(wire: ParticipantWire): MuteState | null {
  if (!wire.muted && !wire.muted_by_you) return null;
  return { canUnmute: wire.can_self_unmute, mutedByYou: wire.muted_by_you };
}

export function toParticipant(wire: ParticipantWire): Participant {
  return {
    peerId: wire.peer_id,
    ssrc: wire.ssrc,
    joinTimestamp: wire.join_date,
    activityTimestamp: wire.active_date,
    activityRank: null,
    raiseHandRating: wire.raise_hand_rating,
    muteState: toMuteState(wire),
    volume: wire.volume,
    about: wire.about,
  };
}

export function toParticipantUpdate(wire: ParticipantWire): ParticipantUpdate {
  return {
    peerId: wire.peer_id,
    ssrc: wire.ssrc,
    joinTimestamp: wire.join_date,
    activityTimestamp: wire.active_date,
    raiseHandRating: wire.raise_hand_rating,
    muteState: toMuteState(wire),
    status: wire.left ? "left" : wire.just_joined ? "joined" : "none",
    volume: wire.volume,
    about: wire.about,
    isMin: wire.min,
  };
}

export function toCallUpdate(wire: CallUpdateWire): CallUpdate {
  if (wire.type === "participants") {
    return {
      kind: "participants",
      participantUpdates: wire.participants.map(toParticipantUpdate),
      version: wire.version,
      removePendingMuteStates: new Set(),
    } satisfies ParticipantsUpdate;
  }

  return {
    kind: "call",
    defaultParticipantsAreMuted: {
      isMuted: wire.join_muted,
      canChange: wire.can_change_join_muted,
    },
    title: wire.title,
    recordingStartTimestamp: wire.record_start_date,
  } satisfies CallSettingsUpdate;
}

export function toPeerActivities(
  activities: ReadonlyArray<{ peer_id: string; date: number }>,
): PeerActivity[] {
  return activities.map((activity) => ({
    peerId: activity.peer_id,
    timestamp: activity.date,
  }));
}

/** Peers carried alongside a batch of updates */
export function peersOf(updates: readonly CallUpdateWire[]): PeerRecord[] {
  const peers: PeerRecord[] = [];
  for (const update of updates) {
    if (update.type === "participants") {
      peers.push(...update.peers.map(toPeerRecord));
    }
  }
  return peers;
}
