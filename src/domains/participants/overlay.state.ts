/**
 * Overlay State - unconfirmed local mutations, projected at read time
 *
 * The authoritative state is never written with optimistic values; readers
 * get `projectEffectiveState`, which lays pending changes over it.
 */
import { sortParticipants } from "./participant.ordering.js";
import type {
  InternalState,
  OverlayState,
  ParticipantsState,
  PendingMuteStateChange,
} from "./participant.types.js";

export function withPendingChange(
  overlay: OverlayState,
  peerId: string,
  change: PendingMuteStateChange,
): OverlayState {
  const pendingMuteStateChanges = new Map(overlay.pendingMuteStateChanges);
  pendingMuteStateChanges.set(peerId, change);
  return { pendingMuteStateChanges };
}

/** Returns `overlay` itself when none of `peerIds` had an entry */
export function withoutPendingChanges(
  overlay: OverlayState,
  peerIds: Iterable<string>,
): OverlayState {
  let pendingMuteStateChanges: Map<string, PendingMuteStateChange> | null = null;

  for (const peerId of peerIds) {
    if (!overlay.pendingMuteStateChanges.has(peerId)) continue;
    pendingMuteStateChanges ??= new Map(overlay.pendingMuteStateChanges);
    pendingMuteStateChanges.delete(peerId);
  }

  return pendingMuteStateChanges ? { pendingMuteStateChanges } : overlay;
}

/** Hand-raise ordering is only meaningful to those who can act on it */
export function canSeeRaisedHands(
  state: ParticipantsState,
  viewerPeerId: string,
): boolean {
  return state.isCreator || state.adminIds.has(viewerPeerId);
}

export function projectEffectiveState(
  internal: InternalState,
  viewerPeerId: string,
): ParticipantsState {
  const { state, overlay } = internal;
  const canSeeHands = canSeeRaisedHands(state, viewerPeerId);
  let sortAgain = false;

  const participants = state.participants.map((participant) => {
    let projected = participant;

    const pending = overlay.pendingMuteStateChanges.get(participant.peerId);
    if (pending) {
      projected = {
        ...projected,
        muteState: pending.state,
        volume: pending.volume,
      };
    }

    if (!canSeeHands && projected.raiseHandRating !== null) {
      projected = { ...projected, raiseHandRating: null };
      sortAgain = true;
    }

    return projected;
  });

  return {
    ...state,
    participants: sortAgain
      ? sortParticipants(participants, state.sortAscending)
      : participants,
  };
}
