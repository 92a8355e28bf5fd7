import { describe, it, expect, vi, beforeEach } from "vitest";
import { MissingParticipantResolver } from "@src/domains/participants/missing.resolver.js";
import { createParticipantsStore } from "@src/domains/participants/participants.state.js";
import { RosterFetcher } from "@src/domains/participants/roster.fetcher.js";
import type { FetchParticipantsResult } from "@src/integrations/calls/types.js";
import {
  createMockLogger,
  createMockNetwork,
  deferred,
  flush,
  makePage,
  makeParticipant,
  makeState,
  peerIds,
} from "./fixtures.js";

// ─── Helpers ────────────────────────────────────────────────────────

function setup() {
  const store = createParticipantsStore(
    makeState({
      participants: [makeParticipant("a", { ssrc: 1 })],
      totalCount: 1,
    }),
  );
  const network = createMockNetwork();
  const logger = createMockLogger();

  const fetcher: RosterFetcher = new RosterFetcher({
    callId: "call-1",
    network,
    store,
    pageLimit: 50,
    logger,
    hooks: {
      onResyncStarted: vi.fn(),
      onResyncFinished: vi.fn(),
      onIdle: () => void resolver.loadMissing(),
    },
  });
  const resolver = new MissingParticipantResolver({
    callId: "call-1",
    store,
    fetcher,
    logger,
  });

  return { store, network, fetcher, resolver };
}

function requestedSsrcs(network: ReturnType<typeof createMockNetwork>): number[][] {
  return network.fetchParticipants.mock.calls.map(([request]) => [...request.ssrcs]);
}

// ─── Tests ──────────────────────────────────────────────────────────

describe("MissingParticipantResolver", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("fetches only sources absent from the roster", async () => {
    const { store, network, resolver } = setup();
    network.fetchParticipants.mockResolvedValueOnce(
      makePage([makeParticipant("b", { ssrc: 2 })]),
    );

    resolver.ensure([1, 2]);
    await flush();

    expect(requestedSsrcs(network)).toEqual([[2]]);
    expect(peerIds(store.getState().state)).toEqual(["a", "b"]);
    expect(resolver.pendingSsrcs.size).toBe(0);
  });

  it("does nothing when every source is known", () => {
    const { network, resolver } = setup();

    resolver.ensure([1]);

    expect(network.fetchParticipants).not.toHaveBeenCalled();
  });

  it("does not request a source twice while it is outstanding", async () => {
    const { network, resolver } = setup();
    const first = deferred<FetchParticipantsResult>();
    network.fetchParticipants.mockReturnValueOnce(first.promise);

    resolver.ensure([2]);
    resolver.ensure([2]);

    first.resolve(makePage([makeParticipant("b", { ssrc: 2 })]));
    await flush();

    expect(requestedSsrcs(network)).toEqual([[2]]);
  });

  it("batches sources reported during a fetch into the next one", async () => {
    const { store, network, resolver } = setup();
    const first = deferred<FetchParticipantsResult>();
    network.fetchParticipants
      .mockReturnValueOnce(first.promise)
      .mockResolvedValueOnce(
        makePage([makeParticipant("c", { ssrc: 3 }), makeParticipant("d", { ssrc: 4 })]),
      );

    resolver.ensure([2]);
    resolver.ensure([3, 4]);

    first.resolve(makePage([makeParticipant("b", { ssrc: 2 })]));
    await flush();

    expect(requestedSsrcs(network)).toEqual([[2], [3, 4]]);
    expect(peerIds(store.getState().state)).toEqual(["a", "b", "c", "d"]);
    expect(resolver.pendingSsrcs.size).toBe(0);
  });

  it("lets a resync requested during a backfill run before the next batch", async () => {
    const { store, network, fetcher, resolver } = setup();
    const first = deferred<FetchParticipantsResult>();
    network.fetchParticipants
      .mockReturnValueOnce(first.promise)
      .mockResolvedValueOnce(
        makePage(
          [makeParticipant("a", { ssrc: 1 }), makeParticipant("b", { ssrc: 2 })],
          { version: 20 },
        ),
      )
      .mockResolvedValueOnce(makePage([makeParticipant("c", { ssrc: 3 })]));

    resolver.ensure([2]);
    fetcher.resync();
    resolver.ensure([3]);
    expect(fetcher.resyncPending).toBe(true);

    first.resolve(makePage([makeParticipant("b", { ssrc: 2 })]));
    await flush();

    expect(requestedSsrcs(network)).toEqual([[2], [], [3]]);
    expect(network.fetchParticipants.mock.calls[1]?.[0].offset).toBe("");
    const { state } = store.getState();
    expect(state.version).toBe(20);
    expect(peerIds(state)).toEqual(["a", "b", "c"]);
    expect(fetcher.resyncPending).toBe(false);
    expect(resolver.pendingSsrcs.size).toBe(0);
  });

  it("drops a failed batch", async () => {
    const { network, resolver } = setup();
    network.fetchParticipants.mockRejectedValueOnce(new Error("offline"));

    resolver.ensure([2]);
    await flush();

    expect(resolver.pendingSsrcs.size).toBe(0);
    expect(network.fetchParticipants).toHaveBeenCalledTimes(1);
  });
});
