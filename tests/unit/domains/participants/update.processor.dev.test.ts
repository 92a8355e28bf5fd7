import { describe, it, expect, vi, beforeEach } from "vitest";

// Development build: violated invariants are fatal
vi.mock("@src/config/index.js", () => ({
  config: {},
  isDev: true,
}));

import { createParticipantsStore } from "@src/domains/participants/participants.state.js";
import { UpdateProcessor } from "@src/domains/participants/update.processor.js";
import { Errors } from "@src/shared/errors.js";
import { InvariantViolation } from "@src/shared/invariant.js";
import {
  createMockLogger,
  createPeerDirectory,
  flush,
  makeParticipant,
  makeState,
  makeUpdate,
  participantsUpdate,
  peerIds,
} from "./fixtures.js";

function setup() {
  const store = createParticipantsStore(
    makeState({
      participants: [makeParticipant("a")],
      totalCount: 10,
      version: 5,
    }),
  );
  const logger = createMockLogger();
  const onInvariantViolation = vi.fn<(err: InvariantViolation) => void>();
  const processor = new UpdateProcessor({
    callId: "call-1",
    store,
    peers: createPeerDirectory(["a", "b"]),
    logger,
    requestResync: vi.fn(),
    onMemberEvent: vi.fn(),
    onInvariantViolation,
  });
  return { store, logger, onInvariantViolation, processor };
}

describe("UpdateProcessor in development", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("halts on an unresolvable peer without committing the delta", async () => {
    const { store, logger, onInvariantViolation, processor } = setup();

    processor.enqueue([
      participantsUpdate(6, [
        makeUpdate("b", { status: "joined" }),
        makeUpdate("ghost", { status: "joined" }),
      ]),
      participantsUpdate(7, [makeUpdate("b", { status: "joined" })]),
    ]);
    await flush();

    const { state } = store.getState();
    expect(peerIds(state)).toEqual(["a"]);
    expect(state.version).toBe(5);
    expect(state.totalCount).toBe(10);

    expect(processor.status).toBe("halted");
    expect(processor.queuedCount).toBe(0);
    expect(onInvariantViolation).toHaveBeenCalledTimes(1);
    const [violation] = onInvariantViolation.mock.calls[0] ?? [];
    expect(violation).toBeInstanceOf(InvariantViolation);
    expect(violation?.message).toBe(Errors.PEER_NOT_RESOLVED);
    expect(logger.fatal).toHaveBeenCalledWith(
      expect.objectContaining({ callId: "call-1", version: 6 }),
      "Participants update processing halted",
    );
  });

  it("ignores further deltas once halted", async () => {
    const { store, processor } = setup();
    processor.enqueue([participantsUpdate(6, [makeUpdate("ghost", { status: "joined" })])]);
    await flush();

    processor.enqueue([participantsUpdate(6, [makeUpdate("b", { status: "joined" })])]);
    await flush();

    expect(store.getState().state.version).toBe(5);
    expect(processor.queuedCount).toBe(0);
  });
});
