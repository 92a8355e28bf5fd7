/**
 * Call Update Subscriber
 * Subscribes to the Redis pub/sub channel carrying call pushes and routes
 * the ones for our call into the roster.
 *
 * Messages are handled strictly in arrival order: peers a message carries
 * are saved before its deltas are handed on.
 */
import type { Redis } from "ioredis";
import type { Logger } from "../../infrastructure/logger.js";
import { metrics } from "../../infrastructure/metrics.js";
import { Errors } from "../../shared/errors.js";
import type {
  CallUpdate,
  PeerActivity,
} from "../../domains/participants/participant.types.js";
import {
  peersOf,
  pushMessageSchema,
  toCallUpdate,
  toPeerActivities,
  type PushMessage,
} from "./call.schemas.js";
import type { PeerStore } from "./call-api.client.js";

export interface CallUpdateHandlers {
  onUpdates(updates: CallUpdate[]): void;
  onActivities(activities: PeerActivity[]): void;
}

export class CallUpdateSubscriber {
  private subscriber: Redis | null = null;
  private isRunning = false;
  private pending: Promise<void> = Promise.resolve();

  constructor(
    private readonly redis: Redis,
    private readonly channel: string,
    private readonly callId: string,
    private readonly peers: PeerStore,
    private readonly handlers: CallUpdateHandlers,
    private readonly logger: Logger,
  ) {}

  /**
   * Start subscribing to the call updates channel
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      this.logger.warn("Call update subscriber already running");
      return;
    }

    // Pub/sub needs its own connection
    this.subscriber = this.redis.duplicate();

    this.subscriber.on("error", (err) => {
      this.logger.error({ err }, "Call update subscriber Redis error");
    });

    this.subscriber.on("reconnecting", () => {
      this.logger.warn("Call update subscriber reconnecting to Redis");
    });

    this.subscriber.on("ready", () => {
      this.logger.info("Call update subscriber Redis connection ready");
    });

    this.subscriber.on("message", (channel: string, message: string) => {
      if (channel !== this.channel) return;

      const parsed = this.parseMessage(message);
      if (!parsed || parsed.call_id !== this.callId) return;

      this.pending = this.pending.then(() => this.handle(parsed));
    });

    await this.subscriber.subscribe(this.channel);
    this.isRunning = true;

    this.logger.info(
      { channel: this.channel, callId: this.callId },
      "Call update subscriber started",
    );
  }

  /**
   * Stop subscribing and cleanup
   */
  async stop(): Promise<void> {
    if (!this.isRunning || !this.subscriber) {
      return;
    }

    this.isRunning = false;

    try {
      await this.subscriber.unsubscribe(this.channel);
      await this.subscriber.quit();
      this.subscriber = null;

      this.logger.info("Call update subscriber stopped");
    } catch (err) {
      this.logger.error({ err }, "Error stopping call update subscriber");
    }
  }

  get running(): boolean {
    return this.isRunning;
  }

  /** Resolves once every message received so far has been handed on */
  idle(): Promise<void> {
    return this.pending;
  }

  // ─────────────────────────────────────────────────────────────────
  // Private Helpers
  // ─────────────────────────────────────────────────────────────────

  private async handle(message: PushMessage): Promise<void> {
    try {
      if (message.type === "activity") {
        this.handlers.onActivities(toPeerActivities(message.activities));
        return;
      }

      await this.peers.savePeers(peersOf([message]));
      this.handlers.onUpdates([toCallUpdate(message)]);
    } catch (err) {
      this.logger.error(
        { err, callId: this.callId, type: message.type },
        "Failed to handle call update",
      );
    }
  }

  /**
   * Parse and validate a push message
   */
  private parseMessage(message: string): PushMessage | null {
    let raw: unknown;
    try {
      raw = JSON.parse(message);
    } catch {
      metrics.pushMessagesReceived.inc({ type: "unknown", valid: "false" });
      this.logger.warn(
        { messagePreview: message.substring(0, 100) },
        "Malformed JSON in call update message",
      );
      return null;
    }

    const result = pushMessageSchema.safeParse(raw);
    if (!result.success) {
      metrics.pushMessagesReceived.inc({ type: "unknown", valid: "false" });
      this.logger.warn({ issues: result.error.issues }, Errors.INVALID_PAYLOAD);
      return null;
    }

    metrics.pushMessagesReceived.inc({ type: result.data.type, valid: "true" });
    return result.data;
  }
}
