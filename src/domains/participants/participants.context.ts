/**
 * Participants Context - the roster of one group call
 *
 * Owns the store and wires together the update processor, roster fetcher,
 * missing participant resolver, mutation coordinator and decay job.
 * Consumers only ever see the effective (overlay-projected) state.
 */
import { createStore, type StoreApi } from "zustand/vanilla";
import type { Logger } from "../../infrastructure/logger.js";
import type { CallNetwork, PeerDirectory } from "../../integrations/calls/types.js";
import { ActivityDecayJob } from "./activity-decay.job.js";
import { MissingParticipantResolver } from "./missing.resolver.js";
import { MutationCoordinator } from "./mutation.coordinator.js";
import { projectEffectiveState } from "./overlay.state.js";
import {
  applyPeerActivities,
  applySpeakingReport,
  createParticipantsStore,
  type ParticipantsStore,
} from "./participants.state.js";
import { RosterFetcher } from "./roster.fetcher.js";
import { UpdateProcessor, type ProcessorStatus } from "./update.processor.js";
import type {
  CallSettingsUpdate,
  CallUpdate,
  InternalState,
  MemberEvent,
  MuteState,
  ParticipantsState,
  ParticipantsUpdate,
  PeerActivity,
  ServiceState,
} from "./participant.types.js";

export interface ParticipantsContextOptions {
  callId: string;
  myPeerId: string;
  initialState: ParticipantsState;
  network: CallNetwork;
  peers: PeerDirectory;
  logger: Logger;
  pageLimit: number;
  decayIntervalMs: number;
  rankTtlMs: number;
  /** Carried over from an earlier context for the same call */
  previousServiceState?: ServiceState;
  /** Seconds; injectable for tests */
  now?: () => number;
  /** Called once the delta stream halts on a violated invariant */
  onFatalError?: (err: Error) => void;
}

type Unsubscribe = () => void;

interface ActiveSpeakersState {
  peerIds: ReadonlySet<string>;
}

export class ParticipantsContext {
  readonly callId: string;
  readonly myPeerId: string;

  private readonly store: ParticipantsStore;
  private readonly activeSpeakers: StoreApi<ActiveSpeakersState>;
  private readonly processor: UpdateProcessor;
  private readonly fetcher: RosterFetcher;
  private readonly resolver: MissingParticipantResolver;
  private readonly mutations: MutationCoordinator;
  private readonly decayJob: ActivityDecayJob;

  private readonly memberListeners = new Set<(event: MemberEvent) => void>();
  private readonly subscriptions = new Set<Unsubscribe>();

  private nextActivityRank: number;
  private hasReceivedSpeakingReport = false;
  private disposed = false;

  private projectedFrom: InternalState | null = null;
  private projected: ParticipantsState | null = null;

  constructor(private readonly options: ParticipantsContextOptions) {
    const { callId, myPeerId, logger, network } = options;
    this.callId = callId;
    this.myPeerId = myPeerId;
    this.nextActivityRank = options.previousServiceState?.nextActivityRank ?? 0;

    this.store = createParticipantsStore(options.initialState);
    this.activeSpeakers = createStore<ActiveSpeakersState>()(() => ({
      peerIds: new Set<string>(),
    }));

    this.fetcher = new RosterFetcher({
      callId,
      network,
      store: this.store,
      pageLimit: options.pageLimit,
      logger,
      hooks: {
        onResyncStarted: () => this.processor.clearQueue(),
        onResyncFinished: () => this.processor.resynced(),
        onIdle: () => void this.resolver.loadMissing(),
      },
    });

    this.processor = new UpdateProcessor({
      callId,
      store: this.store,
      peers: options.peers,
      logger,
      requestResync: () => this.fetcher.resync(),
      onMemberEvent: (event) => this.emitMemberEvent(event),
      onInvariantViolation: (err) => options.onFatalError?.(err),
    });

    this.resolver = new MissingParticipantResolver({
      callId,
      store: this.store,
      fetcher: this.fetcher,
      logger,
    });

    this.mutations = new MutationCoordinator({
      callId,
      myPeerId,
      network,
      store: this.store,
      logger,
      addUpdates: (updates) => this.addUpdates(updates),
    });

    this.decayJob = new ActivityDecayJob({
      store: this.store,
      logger,
      intervalMs: options.decayIntervalMs,
      rankTtlMs: options.rankTtlMs,
      now: options.now,
    });
    this.decayJob.start();
  }

  get processorStatus(): ProcessorStatus {
    return this.processor.status;
  }

  get serviceState(): ServiceState {
    return { nextActivityRank: this.nextActivityRank };
  }

  // ─────────────────────────────────────────────────────────────────
  // Reading
  // ─────────────────────────────────────────────────────────────────

  /** Effective state as the local user should see it */
  getState(): ParticipantsState {
    return this.project(this.store.getState());
  }

  subscribe(listener: (state: ParticipantsState) => void): Unsubscribe {
    return this.track(
      this.store.subscribe((internal) => listener(this.project(internal))),
    );
  }

  onActiveSpeakers(listener: (peerIds: ReadonlySet<string>) => void): Unsubscribe {
    return this.track(
      this.activeSpeakers.subscribe(({ peerIds }) => listener(peerIds)),
    );
  }

  onMemberEvent(listener: (event: MemberEvent) => void): Unsubscribe {
    this.memberListeners.add(listener);
    return () => {
      this.memberListeners.delete(listener);
    };
  }

  // ─────────────────────────────────────────────────────────────────
  // Server updates
  // ─────────────────────────────────────────────────────────────────

  addUpdates(updates: readonly CallUpdate[]): void {
    if (this.disposed) return;

    const participantUpdates: ParticipantsUpdate[] = [];
    for (const update of updates) {
      if (update.kind === "call") {
        this.applyCallSettings(update);
      } else {
        participantUpdates.push(update);
      }
    }
    this.processor.enqueue(participantUpdates);
  }

  updateAdminIds(adminIds: Iterable<string>): void {
    if (this.disposed) return;
    const next = new Set(adminIds);
    const { state } = this.store.getState();
    if (sameMembers(state.adminIds, next)) return;
    this.store.setState({ state: { ...state, adminIds: next } });
  }

  // ─────────────────────────────────────────────────────────────────
  // Speaking activity
  // ─────────────────────────────────────────────────────────────────

  /** Speakers detected locally, keyed by peer id with their media source */
  reportSpeakingParticipants(speakers: ReadonlyMap<string, number>): void {
    if (this.disposed) return;
    if (speakers.size > 0) {
      this.hasReceivedSpeakingReport = true;
    }

    const { state } = this.store.getState();
    const next = applySpeakingReport(
      state,
      speakers.keys(),
      this.nowSeconds(),
      () => this.nextActivityRank++,
    );
    if (next !== state) {
      this.store.setState({ state: next });
    }

    this.ensureHaveParticipants(speakers.values());
  }

  /** Audio activity feed */
  applyPeerActivities(activities: readonly PeerActivity[]): void {
    if (this.disposed) return;

    const peerIds = new Set(activities.map((activity) => activity.peerId));
    if (!sameMembers(this.activeSpeakers.getState().peerIds, peerIds)) {
      this.activeSpeakers.setState({ peerIds });
    }

    // Explicit speaking reports are more precise; once they flow the feed
    // only drives the active speaker set.
    if (this.hasReceivedSpeakingReport) return;

    const { state } = this.store.getState();
    const next = applyPeerActivities(state, activities);
    if (next !== state) {
      this.store.setState({ state: next });
    }
  }

  ensureHaveParticipants(ssrcs: Iterable<number>): void {
    if (this.disposed) return;
    this.resolver.ensure(ssrcs);
  }

  // ─────────────────────────────────────────────────────────────────
  // Mutations
  // ─────────────────────────────────────────────────────────────────

  updateMuteState(
    peerId: string,
    muteState: MuteState | null,
    volume: number | null = null,
    raiseHand: boolean | null = null,
  ): Promise<void> {
    return this.mutations.updateMuteState(peerId, muteState, volume, raiseHand);
  }

  raiseHand(): Promise<void> {
    return this.mutations.raiseHand();
  }

  lowerHand(): Promise<void> {
    return this.mutations.lowerHand();
  }

  updateShouldBeRecording(shouldBeRecording: boolean, title: string | null): Promise<void> {
    return this.mutations.updateShouldBeRecording(shouldBeRecording, title);
  }

  updateDefaultParticipantsAreMuted(isMuted: boolean): Promise<void> {
    return this.mutations.updateDefaultParticipantsAreMuted(isMuted);
  }

  resetInviteLinks(): Promise<void> {
    return this.mutations.resetInviteLinks();
  }

  /** Returns whether a page fetch was started */
  loadMore(token: string): boolean {
    if (this.disposed) return false;
    return this.fetcher.loadMore(token);
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    this.decayJob.stop();
    this.mutations.dispose();
    this.fetcher.dispose();
    this.processor.dispose();
    this.resolver.dispose();

    for (const unsubscribe of this.subscriptions) {
      unsubscribe();
    }
    this.subscriptions.clear();
    this.memberListeners.clear();

    this.options.logger.debug({ callId: this.callId }, "Participants context disposed");
  }

  // ─────────────────────────────────────────────────────────────────
  // Private Helpers
  // ─────────────────────────────────────────────────────────────────

  private applyCallSettings(update: CallSettingsUpdate): void {
    const { state } = this.store.getState();
    this.store.setState({
      state: {
        ...state,
        defaultParticipantsAreMuted: update.defaultParticipantsAreMuted,
        title: update.title,
        recordingStartTimestamp: update.recordingStartTimestamp,
      },
    });
  }

  private emitMemberEvent(event: MemberEvent): void {
    for (const listener of this.memberListeners) {
      listener(event);
    }
  }

  /** Projection is cached per store snapshot */
  private project(internal: InternalState): ParticipantsState {
    if (this.projected && this.projectedFrom === internal) {
      return this.projected;
    }
    this.projectedFrom = internal;
    this.projected = projectEffectiveState(internal, this.myPeerId);
    return this.projected;
  }

  private track(unsubscribe: Unsubscribe): Unsubscribe {
    this.subscriptions.add(unsubscribe);
    return () => {
      this.subscriptions.delete(unsubscribe);
      unsubscribe();
    };
  }

  private nowSeconds(): number {
    return this.options.now ? this.options.now() : Date.now() / 1000;
  }
}

function sameMembers<T>(lhs: ReadonlySet<T>, rhs: ReadonlySet<T>): boolean {
  if (lhs.size !== rhs.size) return false;
  for (const value of lhs) {
    if (!rhs.has(value)) return false;
  }
  return true;
}
