/**
 * Missing Participant Resolver - backfills speakers we hear but do not list
 *
 * Media sources that are reported speaking but have no roster entry are
 * collected and fetched in batches through the shared roster fetcher.
 */
import type { Logger } from "../../infrastructure/logger.js";
import type { ParticipantsStore } from "./participants.state.js";
import type { RosterFetcher } from "./roster.fetcher.js";

export interface MissingParticipantResolverOptions {
  callId: string;
  store: ParticipantsStore;
  fetcher: RosterFetcher;
  logger: Logger;
}

export class MissingParticipantResolver {
  private readonly missing = new Set<number>();

  constructor(private readonly options: MissingParticipantResolverOptions) {}

  get pendingSsrcs(): ReadonlySet<number> {
    return this.missing;
  }

  /** Queue sources absent from the roster and start a fetch if the slot is free */
  ensure(ssrcs: Iterable<number>): void {
    const known = new Set<number>();
    for (const participant of this.options.store.getState().state.participants) {
      if (participant.ssrc !== null) known.add(participant.ssrc);
    }

    let added = false;
    for (const ssrc of ssrcs) {
      if (known.has(ssrc) || this.missing.has(ssrc)) continue;
      this.missing.add(ssrc);
      added = true;
    }

    if (added) {
      void this.loadMissing();
    }
  }

  async loadMissing(): Promise<void> {
    if (this.missing.size === 0) return;

    const batch = [...this.missing];
    const request = this.options.fetcher.backfill(batch);
    // Slot taken; we are called again once it frees up
    if (!request) return;

    const succeeded = await request;
    for (const ssrc of batch) {
      this.missing.delete(ssrc);
    }

    if (!succeeded) {
      this.options.logger.debug(
        { callId: this.options.callId, ssrcs: batch },
        "Dropped missing participant batch",
      );
    }

    this.options.fetcher.settle();
  }

  dispose(): void {
    this.missing.clear();
  }
}
