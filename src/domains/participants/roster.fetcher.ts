/**
 * Roster Fetcher - the single outstanding participant list request
 *
 * Resync, pagination and missing-source backfill all go through here and
 * share one in-flight slot. A resync asked for while the slot is taken is
 * remembered and started as soon as the current fetch settles.
 */
import type { Logger } from "../../infrastructure/logger.js";
import { metrics } from "../../infrastructure/metrics.js";
import { Errors } from "../../shared/errors.js";
import type {
  CallNetwork,
  FetchParticipantsRequest,
  FetchParticipantsResult,
} from "../../integrations/calls/types.js";
import { mergeAndSortParticipants } from "./participant.ordering.js";
import {
  mergeActivityFrom,
  type ParticipantsStore,
} from "./participants.state.js";

export type FetchPurpose = "resync" | "load_more" | "backfill";

export interface RosterFetcherHooks {
  /** A resync is about to fetch; buffered deltas are now obsolete */
  onResyncStarted(): void;
  /** The resync finished, successfully or not */
  onResyncFinished(): void;
  /** The slot is free and no resync is waiting */
  onIdle(): void;
}

export interface RosterFetcherOptions {
  callId: string;
  network: CallNetwork;
  store: ParticipantsStore;
  pageLimit: number;
  logger: Logger;
  hooks: RosterFetcherHooks;
}

export class RosterFetcher {
  private isLoading = false;
  private shouldResync = false;
  private disposed = false;

  constructor(private readonly options: RosterFetcherOptions) {}

  get busy(): boolean {
    return this.isLoading;
  }

  get resyncPending(): boolean {
    return this.shouldResync;
  }

  /**
   * Replace the roster with a fresh first page, keeping local activity
   * annotations.
   */
  resync(): void {
    if (this.disposed) return;
    if (this.isLoading) {
      this.shouldResync = true;
      metrics.resyncsDeferred.inc();
      this.options.logger.debug(
        { callId: this.options.callId },
        "Resync deferred behind outstanding fetch",
      );
      return;
    }

    this.isLoading = true;
    this.options.hooks.onResyncStarted();
    void this.runResync();
  }

  /**
   * Fetch the next page. Returns false without side effects when `token` is
   * not the current cursor or another fetch is outstanding.
   */
  loadMore(token: string): boolean {
    const { state } = this.options.store.getState();
    if (token !== state.nextFetchOffset) {
      this.options.logger.warn(
        { callId: this.options.callId, token, expected: state.nextFetchOffset },
        Errors.INVALID_PAGINATION_TOKEN,
      );
      return false;
    }
    if (this.isLoading || this.disposed) return false;

    this.isLoading = true;
    void this.runLoadMore(token, state.sortAscending);
    return true;
  }

  /**
   * Fetch participants by media source. Returns null when another fetch is
   * outstanding; otherwise resolves with whether the fetch succeeded. The
   * caller does its bookkeeping and then calls `settle()`.
   */
  backfill(ssrcs: readonly number[]): Promise<boolean> | null {
    if (this.isLoading || this.disposed) return null;

    this.isLoading = true;
    return this.runBackfill(ssrcs);
  }

  /** Hand the free slot to a waiting resync, or announce it is idle */
  settle(): void {
    if (this.disposed || this.isLoading) return;
    if (this.shouldResync) {
      this.resync();
      return;
    }
    this.options.hooks.onIdle();
  }

  dispose(): void {
    this.disposed = true;
    this.shouldResync = false;
  }

  // ─────────────────────────────────────────────────────────────────
  // Private Helpers
  // ─────────────────────────────────────────────────────────────────

  private async runResync(): Promise<void> {
    const { sortAscending } = this.options.store.getState().state;

    await this.fetch(
      "resync",
      { offset: "", ssrcs: [], sortAscending },
      (result) => {
        const current = this.options.store.getState().state;
        const fresh = {
          ...current,
          participants: result.participants,
          nextFetchOffset: result.nextOffset,
          totalCount: Math.max(result.totalCount, result.participants.length),
          version: result.version,
          sortAscending: result.sortAscending,
        };
        this.options.store.setState({ state: mergeActivityFrom(fresh, current) });
        this.options.logger.info(
          { callId: this.options.callId, version: result.version },
          "Participants resynchronized",
        );
      },
    );

    this.shouldResync = false;
    this.options.hooks.onResyncFinished();
    this.settle();
  }

  private async runLoadMore(token: string, sortAscending: boolean): Promise<void> {
    await this.fetch(
      "load_more",
      { offset: token, ssrcs: [], sortAscending },
      (result) => {
        const current = this.options.store.getState().state;
        const participants = mergeAndSortParticipants(
          current.participants,
          result.participants,
          current.sortAscending,
        );
        this.options.store.setState({
          state: {
            ...current,
            participants,
            nextFetchOffset: result.nextOffset,
            // Pages never move the delta version: a partial page is not a
            // full view of the newer version.
            totalCount: Math.max(current.totalCount, result.totalCount, participants.length),
          },
        });
      },
    );
    this.settle();
  }

  private async runBackfill(ssrcs: readonly number[]): Promise<boolean> {
    const succeeded = await this.fetch(
      "backfill",
      { offset: "", ssrcs, sortAscending: true },
      (result) => {
        const current = this.options.store.getState().state;
        const participants = mergeAndSortParticipants(
          current.participants,
          result.participants,
          current.sortAscending,
        );
        this.options.store.setState({
          state: {
            ...current,
            participants,
            totalCount: Math.max(current.totalCount, result.totalCount, participants.length),
          },
        });
      },
    );
    return succeeded;
  }

  /**
   * Run the request and apply its result. Never rejects; the slot is
   * released before `apply` runs.
   */
  private async fetch(
    purpose: FetchPurpose,
    request: Omit<FetchParticipantsRequest, "callId" | "limit">,
    apply: (result: FetchParticipantsResult) => void,
  ): Promise<boolean> {
    const { callId, network, pageLimit, logger } = this.options;

    try {
      const result = await network.fetchParticipants({
        ...request,
        callId,
        limit: pageLimit,
      });
      this.isLoading = false;
      if (this.disposed) return false;

      apply(result);
      metrics.rosterFetches.inc({ purpose, status: "success" });
      return true;
    } catch (err) {
      this.isLoading = false;
      metrics.rosterFetches.inc({ purpose, status: "failed" });
      logger.warn({ err, callId, purpose }, fetchFailureMessage(purpose));
      return false;
    }
  }
}

function fetchFailureMessage(purpose: FetchPurpose): string {
  switch (purpose) {
    case "resync":
      return Errors.RESYNC_FAILED;
    case "load_more":
      return Errors.LOAD_MORE_FAILED;
    case "backfill":
      return Errors.BACKFILL_FAILED;
  }
}
