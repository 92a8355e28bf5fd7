/**
 * Mutation Coordinator - optimistic participant and call setting changes
 *
 * Mute/volume changes are recorded in the overlay and sent to the server;
 * the overlay entry goes away when the server's own delta names the peer,
 * or when the request fails. A newer request for the same peer cancels the
 * older one.
 */
import type { Logger } from "../../infrastructure/logger.js";
import { metrics } from "../../infrastructure/metrics.js";
import { Errors } from "../../shared/errors.js";
import type {
  CallNetwork,
  EditParticipantRequest,
} from "../../integrations/calls/types.js";
import { withPendingChange, withoutPendingChanges } from "./overlay.state.js";
import type { ParticipantsStore } from "./participants.state.js";
import type {
  CallUpdate,
  MuteState,
  Participant,
} from "./participant.types.js";

export interface MutationCoordinatorOptions {
  callId: string;
  myPeerId: string;
  network: CallNetwork;
  store: ParticipantsStore;
  logger: Logger;
  /** Feeds server responses back through the regular update path */
  addUpdates(updates: readonly CallUpdate[]): void;
}

export class MutationCoordinator {
  private disposed = false;

  constructor(private readonly options: MutationCoordinatorOptions) {}

  /**
   * Request a mute, volume or hand change for `peerId`. Resolves once the
   * request has settled; failures are logged, never thrown.
   */
  updateMuteState(
    peerId: string,
    muteState: MuteState | null,
    volume: number | null = null,
    raiseHand: boolean | null = null,
  ): Promise<void> {
    if (this.disposed) return Promise.resolve();

    const { store } = this.options;
    const { state, overlay } = store.getState();

    const pending = overlay.pendingMuteStateChanges.get(peerId);
    if (pending) {
      if (raiseHand === null && sameMuteState(pending.state, muteState)) {
        return Promise.resolve();
      }
      pending.controller.abort();
      store.setState({ overlay: withoutPendingChanges(overlay, [peerId]) });
    }

    const participant = state.participants.find((p) => p.peerId === peerId);
    if (participant && alreadyMatches(participant, muteState, volume, raiseHand)) {
      return Promise.resolve();
    }

    const controller = new AbortController();
    if (raiseHand === null) {
      store.setState({
        overlay: withPendingChange(store.getState().overlay, peerId, {
          state: muteState,
          volume,
          controller,
        }),
      });
    }

    const muted =
      muteState !== null &&
      (!muteState.canUnmute ||
        peerId === this.options.myPeerId ||
        muteState.mutedByYou);

    return this.sendEdit(
      {
        callId: this.options.callId,
        peerId,
        muted,
        volume: volume !== null && volume > 0 ? volume : null,
        raiseHand,
      },
      controller,
    );
  }

  raiseHand(): Promise<void> {
    return this.updateOwnHand(true);
  }

  lowerHand(): Promise<void> {
    return this.updateOwnHand(false);
  }

  async updateShouldBeRecording(
    shouldBeRecording: boolean,
    title: string | null,
  ): Promise<void> {
    if (this.disposed) return;
    const { callId, network, logger } = this.options;

    try {
      const updates = await network.toggleRecording({
        callId,
        shouldBeRecording,
        title,
      });
      this.feedBack(updates);
    } catch (err) {
      logger.warn({ err, callId, shouldBeRecording }, Errors.SETTINGS_UPDATE_FAILED);
    }
  }

  async updateDefaultParticipantsAreMuted(isMuted: boolean): Promise<void> {
    if (this.disposed) return;
    const { callId, network, logger, store } = this.options;

    const previous = store.getState().state.defaultParticipantsAreMuted;
    if (previous.isMuted === isMuted) return;

    store.setState({
      state: {
        ...store.getState().state,
        defaultParticipantsAreMuted: { ...previous, isMuted },
      },
    });

    try {
      const updates = await network.updateSettings({ callId, joinMuted: isMuted });
      this.feedBack(updates);
    } catch (err) {
      logger.warn({ err, callId, isMuted }, Errors.SETTINGS_UPDATE_FAILED);
      if (this.disposed) return;
      const current = store.getState().state;
      // Only undo our own optimistic value
      if (current.defaultParticipantsAreMuted.isMuted === isMuted) {
        store.setState({
          state: {
            ...current,
            defaultParticipantsAreMuted: {
              ...current.defaultParticipantsAreMuted,
              isMuted: previous.isMuted,
            },
          },
        });
      }
    }
  }

  async resetInviteLinks(): Promise<void> {
    if (this.disposed) return;
    const { callId, network, logger } = this.options;

    try {
      const updates = await network.updateSettings({ callId, resetInviteHash: true });
      this.feedBack(updates);
    } catch (err) {
      logger.warn({ err, callId }, Errors.SETTINGS_UPDATE_FAILED);
    }
  }

  /** Abort every in-flight mutation */
  dispose(): void {
    this.disposed = true;
    for (const pending of this.options.store.getState().overlay.pendingMuteStateChanges.values()) {
      pending.controller.abort();
    }
  }

  // ─────────────────────────────────────────────────────────────────
  // Private Helpers
  // ─────────────────────────────────────────────────────────────────

  private updateOwnHand(raise: boolean): Promise<void> {
    const { myPeerId, store } = this.options;
    const me = store
      .getState()
      .state.participants.find((p) => p.peerId === myPeerId);

    return this.updateMuteState(
      myPeerId,
      me?.muteState ?? null,
      me?.volume ?? null,
      raise,
    );
  }

  private async sendEdit(
    request: EditParticipantRequest,
    controller: AbortController,
  ): Promise<void> {
    const { callId, network, logger } = this.options;
    const { peerId } = request;

    try {
      const updates = await network.editParticipant(request, controller.signal);
      if (controller.signal.aborted || this.disposed) {
        metrics.mutationRequests.inc({ status: "cancelled" });
        return;
      }
      metrics.mutationRequests.inc({ status: "success" });

      if (updates.length === 0) {
        this.discardPending(peerId, controller);
        return;
      }
      this.options.addUpdates(
        updates.map((update) => ({
          ...update,
          removePendingMuteStates: new Set([
            ...update.removePendingMuteStates,
            peerId,
          ]),
        })),
      );
    } catch (err) {
      if (controller.signal.aborted || this.disposed) {
        metrics.mutationRequests.inc({ status: "cancelled" });
        return;
      }
      metrics.mutationRequests.inc({ status: "failed" });
      logger.warn({ err, callId, peerId }, Errors.MUTATION_FAILED);
      this.discardPending(peerId, controller);
    }
  }

  /** Remove the overlay entry only if it still belongs to this request */
  private discardPending(peerId: string, controller: AbortController): void {
    const { store } = this.options;
    const { overlay } = store.getState();
    if (overlay.pendingMuteStateChanges.get(peerId)?.controller !== controller) {
      return;
    }
    store.setState({ overlay: withoutPendingChanges(overlay, [peerId]) });
  }

  private feedBack(updates: readonly CallUpdate[]): void {
    if (this.disposed || updates.length === 0) return;
    this.options.addUpdates(updates);
  }
}

export function sameMuteState(
  lhs: MuteState | null,
  rhs: MuteState | null,
): boolean {
  if (lhs === null || rhs === null) return lhs === rhs;
  return lhs.canUnmute === rhs.canUnmute && lhs.mutedByYou === rhs.mutedByYou;
}

function alreadyMatches(
  participant: Participant,
  muteState: MuteState | null,
  volume: number | null,
  raiseHand: boolean | null,
): boolean {
  const handMatches =
    raiseHand === null || (participant.raiseHandRating !== null) === raiseHand;
  return (
    sameMuteState(participant.muteState, muteState) &&
    participant.volume === volume &&
    handMatches
  );
}
