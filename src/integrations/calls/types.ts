/**
 * Call collaborator contracts
 * The roster engine only talks to the network and the peer store through these.
 */
import type {
  CallUpdate,
  Participant,
  ParticipantsUpdate,
} from "../../domains/participants/participant.types.js";

export interface PeerRecord {
  id: string;
  displayName: string;
}

/** Read side of the peer store */
export interface PeerDirectory {
  /** Peers that cannot be resolved are absent from the result */
  getPeers(peerIds: readonly string[]): Promise<Map<string, PeerRecord>>;
}

export interface FetchParticipantsRequest {
  callId: string;
  /** Pagination cursor; empty string for the first page */
  offset: string;
  /** Restrict to these media sources; empty for the whole roster */
  ssrcs: readonly number[];
  limit: number;
  /** When omitted the server's own ordering preference is used */
  sortAscending?: boolean;
}

export interface FetchParticipantsResult {
  participants: Participant[];
  nextOffset: string | null;
  totalCount: number;
  version: number;
  sortAscending: boolean;
}

export interface EditParticipantRequest {
  callId: string;
  peerId: string;
  muted: boolean;
  volume: number | null;
  raiseHand: boolean | null;
}

export interface ToggleRecordingRequest {
  callId: string;
  shouldBeRecording: boolean;
  title: string | null;
}

export interface UpdateSettingsRequest {
  callId: string;
  joinMuted?: boolean;
  resetInviteHash?: boolean;
}

export interface CallNetwork {
  fetchParticipants(
    request: FetchParticipantsRequest,
  ): Promise<FetchParticipantsResult>;

  /** Resolves with the participant deltas the server produced for this call */
  editParticipant(
    request: EditParticipantRequest,
    signal: AbortSignal,
  ): Promise<ParticipantsUpdate[]>;

  toggleRecording(request: ToggleRecordingRequest): Promise<CallUpdate[]>;

  updateSettings(request: UpdateSettingsRequest): Promise<CallUpdate[]>;
}
