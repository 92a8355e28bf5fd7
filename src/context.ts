import type { Redis } from "ioredis";
import type { ParticipantsContext } from "./domains/participants/participants.context.js";
import type { CallApiClient } from "./integrations/calls/call-api.client.js";
import type { RedisPeerRepository } from "./integrations/calls/peer.repository.js";
import type { CallUpdateSubscriber } from "./integrations/calls/update-subscriber.js";

export interface AppContext {
  redis: Redis;
  peers: RedisPeerRepository;
  callApi: CallApiClient;
  participants: ParticipantsContext;
  subscriber: CallUpdateSubscriber;
}
