/**
 * Shared builders for roster tests
 */
import { vi } from "vitest";
import type {
  CallNetwork,
  EditParticipantRequest,
  FetchParticipantsRequest,
  FetchParticipantsResult,
  PeerDirectory,
  PeerRecord,
  ToggleRecordingRequest,
  UpdateSettingsRequest,
} from "@src/integrations/calls/types.js";
import type {
  CallUpdate,
  Participant,
  ParticipantUpdate,
  ParticipantsState,
  ParticipantsUpdate,
} from "@src/domains/participants/participant.types.js";

export function createMockLogger() {
  return {
    fatal: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
  };
}

export function makeParticipant(
  peerId: string,
  overrides: Partial<Participant> = {},
): Participant {
  return {
    peerId,
    ssrc: null,
    joinTimestamp: 100,
    activityTimestamp: null,
    activityRank: null,
    raiseHandRating: null,
    muteState: null,
    volume: null,
    about: null,
    ...overrides,
  };
}

export function makeState(overrides: Partial<ParticipantsState> = {}): ParticipantsState {
  return {
    participants: [],
    nextFetchOffset: null,
    adminIds: new Set(),
    isCreator: false,
    defaultParticipantsAreMuted: { isMuted: false, canChange: true },
    sortAscending: true,
    recordingStartTimestamp: null,
    title: null,
    totalCount: 0,
    version: 1,
    ...overrides,
  };
}

export function makeUpdate(
  peerId: string,
  overrides: Partial<ParticipantUpdate> = {},
): ParticipantUpdate {
  return {
    peerId,
    ssrc: null,
    joinTimestamp: 100,
    activityTimestamp: null,
    raiseHandRating: null,
    muteState: null,
    status: "none",
    volume: null,
    about: null,
    isMin: false,
    ...overrides,
  };
}

export function participantsUpdate(
  version: number,
  participantUpdates: ParticipantUpdate[],
  removePendingMuteStates: string[] = [],
): ParticipantsUpdate {
  return {
    kind: "participants",
    participantUpdates,
    version,
    removePendingMuteStates: new Set(removePendingMuteStates),
  };
}

export function makePage(
  participants: Participant[],
  overrides: Partial<FetchParticipantsResult> = {},
): FetchParticipantsResult {
  return {
    participants,
    nextOffset: null,
    totalCount: participants.length,
    version: 1,
    sortAscending: true,
    ...overrides,
  };
}

export function createMockNetwork() {
  return {
    fetchParticipants: vi.fn<(request: FetchParticipantsRequest) => Promise<FetchParticipantsResult>>(),
    editParticipant: vi.fn<
      (request: EditParticipantRequest, signal: AbortSignal) => Promise<ParticipantsUpdate[]>
    >(),
    toggleRecording: vi.fn<(request: ToggleRecordingRequest) => Promise<CallUpdate[]>>(),
    updateSettings: vi.fn<(request: UpdateSettingsRequest) => Promise<CallUpdate[]>>(),
  } satisfies CallNetwork;
}

/** Directory that resolves exactly the given peer ids */
export function createPeerDirectory(known: Iterable<string>) {
  const peers = new Set(known);
  const directory = {
    peers,
    getPeers: vi.fn<(peerIds: readonly string[]) => Promise<Map<string, PeerRecord>>>(
      async (peerIds) =>
        new Map(
          peerIds
            .filter((id) => peers.has(id))
            .map((id): [string, PeerRecord] => [id, { id, displayName: `Peer ${id}` }]),
        ),
    ),
  };
  return directory satisfies PeerDirectory;
}

/** Let pending promise chains run to completion */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/** A promise whose settlement the test controls */
export function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function peerIds(state: ParticipantsState): string[] {
  return state.participants.map((p) => p.peerId);
}
