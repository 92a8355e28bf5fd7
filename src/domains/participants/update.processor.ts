/**
 * Update Processor - version state machine for the participant delta stream
 *
 * Deltas are queued and applied strictly one at a time. A delta at the
 * current version or the next one is applied; older ones are dropped; a
 * skipped version throws the queue away and waits for a resync.
 */
import type { Logger } from "../../infrastructure/logger.js";
import { metrics } from "../../infrastructure/metrics.js";
import { Errors } from "../../shared/errors.js";
import { checkInvariant, InvariantViolation } from "../../shared/invariant.js";
import type { PeerDirectory, PeerRecord } from "../../integrations/calls/types.js";
import { withoutPendingChanges } from "./overlay.state.js";
import { sortParticipants } from "./participant.ordering.js";
import { maxNullable, type ParticipantsStore } from "./participants.state.js";
import type {
  MemberEvent,
  Participant,
  ParticipantUpdate,
  ParticipantsUpdate,
} from "./participant.types.js";

export type ProcessorStatus = "idle" | "processing" | "resyncing" | "halted";

type ProcessOutcome = "applied" | "stale" | "gap" | "peers_unavailable";

export interface UpdateProcessorOptions {
  callId: string;
  store: ParticipantsStore;
  peers: PeerDirectory;
  logger: Logger;
  requestResync(): void;
  onMemberEvent(event: MemberEvent): void;
  /** The processor halted on a violated invariant (development builds only) */
  onInvariantViolation(err: InvariantViolation): void;
}

export class UpdateProcessor {
  private readonly queue: ParticipantsUpdate[] = [];
  private currentStatus: ProcessorStatus = "idle";
  private disposed = false;

  constructor(private readonly options: UpdateProcessorOptions) {}

  get status(): ProcessorStatus {
    return this.currentStatus;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  enqueue(updates: readonly ParticipantsUpdate[]): void {
    if (this.disposed || updates.length === 0) return;
    this.queue.push(...updates);
    void this.drain();
  }

  /** Buffered deltas are superseded by the snapshot being fetched */
  clearQueue(): void {
    this.queue.length = 0;
  }

  /** The resync this processor was waiting on has finished */
  resynced(): void {
    if (this.currentStatus !== "resyncing") return;
    this.currentStatus = "idle";
    void this.drain();
  }

  dispose(): void {
    this.disposed = true;
    this.queue.length = 0;
  }

  // ─────────────────────────────────────────────────────────────────
  // Private Helpers
  // ─────────────────────────────────────────────────────────────────

  private async drain(): Promise<void> {
    if (this.currentStatus !== "idle") return;

    while (this.currentStatus === "idle" && !this.disposed) {
      const update = this.queue.shift();
      if (!update) return;

      this.currentStatus = "processing";
      let outcome: ProcessOutcome;
      try {
        outcome = await this.process(update);
      } catch (err) {
        if (err instanceof InvariantViolation) {
          this.halt(err, update.version);
          return;
        }
        this.currentStatus = "idle";
        this.options.logger.error(
          { err, callId: this.options.callId, version: update.version },
          "Failed to apply participants update",
        );
        continue;
      }

      metrics.callUpdatesTotal.inc({ outcome });

      if (outcome === "gap" || outcome === "peers_unavailable") {
        this.currentStatus = "resyncing";
        this.queue.length = 0;
        this.options.requestResync();
        return;
      }

      this.currentStatus = "idle";
    }
  }

  private halt(err: InvariantViolation, version: number): void {
    this.currentStatus = "halted";
    this.disposed = true;
    this.queue.length = 0;
    this.options.logger.fatal(
      { err, callId: this.options.callId, version },
      "Participants update processing halted",
    );
    this.options.onInvariantViolation(err);
  }

  private async process(update: ParticipantsUpdate): Promise<ProcessOutcome> {
    const { callId, logger } = this.options;
    const { version } = this.options.store.getState().state;

    if (update.version < version) {
      this.dropPendingChanges(update.removePendingMuteStates);
      logger.debug({ callId, version, received: update.version }, "Stale participants update");
      return "stale";
    }

    if (update.version > version + 1) {
      this.dropPendingChanges(update.removePendingMuteStates);
      logger.info(
        { callId, version, received: update.version },
        "Participants update version gap, resynchronizing",
      );
      return "gap";
    }

    const peerIds = [
      ...new Set(
        update.participantUpdates
          .filter((p) => p.status !== "left")
          .map((p) => p.peerId),
      ),
    ];

    let peers: Map<string, PeerRecord>;
    try {
      peers = peerIds.length > 0
        ? await this.options.peers.getPeers(peerIds)
        : new Map();
    } catch (err) {
      this.dropPendingChanges(update.removePendingMuteStates);
      logger.warn({ err, callId, version: update.version }, Errors.PEER_LOOKUP_FAILED);
      return "peers_unavailable";
    }

    if (!this.disposed) {
      this.apply(update, peers, update.version !== version);
    }
    return "applied";
  }

  private apply(
    update: ParticipantsUpdate,
    peers: ReadonlyMap<string, PeerRecord>,
    isVersionUpdate: boolean,
  ): void {
    const { callId, logger, store } = this.options;
    const { state, overlay } = store.getState();
    const participants = [...state.participants];
    const events: MemberEvent[] = [];
    let totalCount = state.totalCount;

    for (const participantUpdate of update.participantUpdates) {
      const { peerId } = participantUpdate;
      const index = participants.findIndex((p) => p.peerId === peerId);

      if (participantUpdate.status === "left") {
        if (index !== -1) {
          participants.splice(index, 1);
          totalCount = Math.max(0, totalCount - 1);
          events.push({ peerId, joined: false });
        } else if (isVersionUpdate) {
          // Already counted out by the server even though we never saw them
          totalCount = Math.max(0, totalCount - 1);
        }
        continue;
      }

      const resolved = checkInvariant(
        peers.has(peerId),
        Errors.PEER_NOT_RESOLVED,
        { callId, peerId, version: update.version },
        logger,
      );
      if (!resolved) {
        metrics.participantUpdatesSkipped.inc();
        continue;
      }

      const previous = index !== -1 ? participants[index] : undefined;
      if (previous) {
        participants.splice(index, 1);
      } else if (participantUpdate.status === "joined") {
        totalCount += 1;
        events.push({ peerId, joined: true });
      }

      participants.push(mergeParticipantUpdate(previous, participantUpdate));
    }

    store.setState({
      state: {
        ...state,
        participants: sortParticipants(participants, state.sortAscending),
        totalCount: Math.max(totalCount, participants.length),
        version: update.version,
      },
      overlay: withoutPendingChanges(overlay, update.removePendingMuteStates),
    });

    for (const event of events) {
      this.options.onMemberEvent(event);
    }
  }

  private dropPendingChanges(peerIds: ReadonlySet<string>): void {
    const { overlay } = this.options.store.getState();
    const next = withoutPendingChanges(overlay, peerIds);
    if (next !== overlay) {
      this.options.store.setState({ overlay: next });
    }
  }
}

/**
 * Fold a server update into what we already knew about the participant.
 * Join time and rank are local facts; speaking time never goes backwards;
 * a minimal update does not carry our own mute/volume choices.
 */
export function mergeParticipantUpdate(
  previous: Participant | undefined,
  update: ParticipantUpdate,
): Participant {
  let muteState = update.muteState;
  let volume = update.volume;

  if (update.isMin && previous) {
    if (previous.muteState?.mutedByYou) {
      muteState = previous.muteState;
    }
    if (previous.volume !== null) {
      volume = previous.volume;
    }
  }

  return {
    peerId: update.peerId,
    ssrc: update.ssrc,
    joinTimestamp: previous?.joinTimestamp ?? update.joinTimestamp,
    activityTimestamp: maxNullable(
      previous?.activityTimestamp ?? null,
      update.activityTimestamp,
    ),
    activityRank: previous?.activityRank ?? null,
    raiseHandRating: update.raiseHandRating,
    muteState,
    volume,
    about: update.about,
  };
}
