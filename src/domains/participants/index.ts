/**
 * Participants Domain - Barrel Export
 */

// Facade
export { ParticipantsContext } from "./participants.context.js";
export type { ParticipantsContextOptions } from "./participants.context.js";

// Types
export type {
  CallSettingsUpdate,
  CallUpdate,
  DefaultParticipantsAreMuted,
  MemberEvent,
  MuteState,
  Participant,
  ParticipantUpdate,
  ParticipantsState,
  ParticipantsUpdate,
  PeerActivity,
  ServiceState,
} from "./participant.types.js";
export type { ProcessorStatus } from "./update.processor.js";

// Pure helpers
export { compareParticipants, sortParticipants } from "./participant.ordering.js";
export { projectEffectiveState } from "./overlay.state.js";
export { createInitialState } from "./participants.state.js";
