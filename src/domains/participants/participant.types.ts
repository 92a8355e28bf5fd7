/**
 * Participants domain types
 */

export interface MuteState {
  canUnmute: boolean;
  mutedByYou: boolean;
}

export interface Participant {
  peerId: string;
  /** Media source id; null until media is attached */
  ssrc: number | null;
  /** Seconds, assigned by the server and stable for a session */
  joinTimestamp: number;
  /** Seconds (fractional), last detected speaking time */
  activityTimestamp: number | null;
  /** Local recency marker; lower was promoted earlier */
  activityRank: number | null;
  /** Present while the hand is raised; higher was raised more recently */
  raiseHandRating: number | null;
  /** null means unmuted and not muted by you */
  muteState: MuteState | null;
  volume: number | null;
  about: string | null;
}

export interface DefaultParticipantsAreMuted {
  isMuted: boolean;
  canChange: boolean;
}

export interface ParticipantsState {
  participants: readonly Participant[];
  nextFetchOffset: string | null;
  adminIds: ReadonlySet<string>;
  isCreator: boolean;
  defaultParticipantsAreMuted: DefaultParticipantsAreMuted;
  sortAscending: boolean;
  recordingStartTimestamp: number | null;
  title: string | null;
  totalCount: number;
  version: number;
}

export interface PendingMuteStateChange {
  state: MuteState | null;
  volume: number | null;
  controller: AbortController;
}

export interface OverlayState {
  pendingMuteStateChanges: ReadonlyMap<string, PendingMuteStateChange>;
}

export interface InternalState {
  state: ParticipantsState;
  overlay: OverlayState;
}

/** Local bookkeeping that outlives a single context for the same call */
export interface ServiceState {
  nextActivityRank: number;
}

// ─────────────────────────────────────────────────────────────────
// Delta stream
// ─────────────────────────────────────────────────────────────────

export type ParticipationStatusChange = "none" | "joined" | "left";

export interface ParticipantUpdate {
  peerId: string;
  ssrc: number | null;
  joinTimestamp: number;
  activityTimestamp: number | null;
  raiseHandRating: number | null;
  muteState: MuteState | null;
  status: ParticipationStatusChange;
  volume: number | null;
  about: string | null;
  /** Minimal projection: fields private to the viewer are not carried */
  isMin: boolean;
}

export interface ParticipantsUpdate {
  kind: "participants";
  participantUpdates: readonly ParticipantUpdate[];
  version: number;
  removePendingMuteStates: ReadonlySet<string>;
}

export interface CallSettingsUpdate {
  kind: "call";
  defaultParticipantsAreMuted: DefaultParticipantsAreMuted;
  title: string | null;
  recordingStartTimestamp: number | null;
}

export type CallUpdate = ParticipantsUpdate | CallSettingsUpdate;

export interface MemberEvent {
  peerId: string;
  joined: boolean;
}

export interface PeerActivity {
  peerId: string;
  /** Seconds */
  timestamp: number;
}
