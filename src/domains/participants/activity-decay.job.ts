/**
 * Activity Decay Job
 * Periodically drops activity ranks of participants who stopped speaking
 */
import type { Logger } from "../../infrastructure/logger.js";
import { clearStaleActivityRanks, type ParticipantsStore } from "./participants.state.js";

export interface ActivityDecayJobOptions {
  store: ParticipantsStore;
  logger: Logger;
  intervalMs: number;
  rankTtlMs: number;
  /** Seconds; injectable for tests */
  now?: () => number;
}

export class ActivityDecayJob {
  private timer: NodeJS.Timeout | null = null;

  constructor(private readonly options: ActivityDecayJobOptions) {}

  get running(): boolean {
    return this.timer !== null;
  }

  /**
   * Start the background job
   */
  start(): void {
    if (this.timer) {
      this.options.logger.warn("Activity decay job already running");
      return;
    }

    this.timer = setInterval(() => this.sweep(), this.options.intervalMs);
    this.options.logger.debug(
      { intervalMs: this.options.intervalMs, rankTtlMs: this.options.rankTtlMs },
      "Activity decay job started",
    );
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Clear ranks whose speaking activity is older than the rank TTL
   */
  sweep(nowSeconds: number = this.currentSeconds()): void {
    const { store } = this.options;
    const { state } = store.getState();
    const next = clearStaleActivityRanks(
      state,
      nowSeconds,
      this.options.rankTtlMs / 1000,
    );
    if (next !== state) {
      store.setState({ state: next });
    }
  }

  private currentSeconds(): number {
    return this.options.now ? this.options.now() : Date.now() / 1000;
  }
}
