import { describe, it, expect } from "vitest";
import {
  participantWireSchema,
  pushMessageSchema,
  toCallUpdate,
  toMuteState,
  toParticipantUpdate,
} from "@src/integrations/calls/call.schemas.js";

const wire = (input: Record<string, unknown>) =>
  participantWireSchema.parse({ peer_id: "A", join_date: 100, ...input });

describe("call wire schemas", () => {
  describe("toMuteState", () => {
    it("has no mute state for an unmuted participant", () => {
      expect(toMuteState(wire({}))).toBeNull();
    });

    it("carries whether the participant may unmute", () => {
      expect(toMuteState(wire({ muted: true, can_self_unmute: false }))).toEqual({
        canUnmute: false,
        mutedByYou: false,
      });
    });

    it("keeps a local mute even when the server says unmuted", () => {
      expect(toMuteState(wire({ muted_by_you: true }))).toEqual({
        canUnmute: true,
        mutedByYou: true,
      });
    });
  });

  describe("toParticipantUpdate", () => {
    it("maps leave and join flags to a status", () => {
      expect(toParticipantUpdate(wire({ left: true })).status).toBe("left");
      expect(toParticipantUpdate(wire({ just_joined: true })).status).toBe("joined");
      expect(toParticipantUpdate(wire({})).status).toBe("none");
    });

    it("marks minimal updates", () => {
      expect(toParticipantUpdate(wire({ min: true })).isMin).toBe(true);
    });
  });

  describe("pushMessageSchema", () => {
    it("rejects an unknown message type", () => {
      expect(pushMessageSchema.safeParse({ type: "chat", call_id: "call-1" }).success).toBe(false);
    });

    it("normalizes a participants message into a delta", () => {
      const message = pushMessageSchema.parse({
        type: "participants",
        call_id: "call-1",
        version: 3,
        participants: [{ peer_id: "A", join_date: 100, volume: 8000 }],
      });
      if (message.type === "activity") throw new Error("unexpected activity message");

      const update = toCallUpdate(message);

      expect(update).toEqual({
        kind: "participants",
        version: 3,
        removePendingMuteStates: new Set(),
        participantUpdates: [
          {
            peerId: "A",
            ssrc: null,
            joinTimestamp: 100,
            activityTimestamp: null,
            raiseHandRating: null,
            muteState: null,
            status: "none",
            volume: 8000,
            about: null,
            isMin: false,
          },
        ],
      });
    });
  });
});
