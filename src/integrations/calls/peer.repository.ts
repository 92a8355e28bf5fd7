/**
 * Peer Repository - Redis-backed peer directory
 *
 * Peers arrive alongside participant pages and updates; they are stored in a
 * single hash so the update processor can resolve every peer a delta names.
 */
import type { Redis } from "ioredis";
import type { Logger } from "../../infrastructure/logger.js";
import { Errors } from "../../shared/errors.js";
import { peerWireSchema, toPeerRecord } from "./call.schemas.js";
import type { PeerDirectory, PeerRecord } from "./types.js";

const PEERS_KEY = "peers";

export class RedisPeerRepository implements PeerDirectory {
  constructor(
    private readonly redis: Redis,
    private readonly logger: Logger,
  ) {}

  /**
   * Resolve peers by id. Unknown or corrupt entries are left out; a Redis
   * failure rejects so callers can tell "missing" from "unavailable".
   */
  async getPeers(peerIds: readonly string[]): Promise<Map<string, PeerRecord>> {
    const peers = new Map<string, PeerRecord>();
    if (peerIds.length === 0) return peers;

    let values: (string | null)[];
    try {
      values = await this.redis.hmget(PEERS_KEY, ...peerIds);
    } catch (err) {
      this.logger.error({ err, count: peerIds.length }, Errors.PEER_LOOKUP_FAILED);
      throw err;
    }

    values.forEach((raw, index) => {
      const peerId = peerIds[index];
      if (raw === null || peerId === undefined) return;
      const record = this.parseRecord(peerId, raw);
      if (record) peers.set(peerId, record);
    });

    return peers;
  }

  async savePeers(peers: readonly PeerRecord[]): Promise<boolean> {
    if (peers.length === 0) return true;

    const entries: Record<string, string> = {};
    for (const peer of peers) {
      entries[peer.id] = JSON.stringify({
        id: peer.id,
        display_name: peer.displayName,
      });
    }

    try {
      await this.redis.hset(PEERS_KEY, entries);
      this.logger.debug({ count: peers.length }, "Peers saved");
      return true;
    } catch (err) {
      this.logger.error({ err, count: peers.length }, Errors.PEER_SAVE_FAILED);
      return false;
    }
  }

  // ─────────────────────────────────────────────────────────────────
  // Private Helpers
  // ─────────────────────────────────────────────────────────────────

  private parseRecord(peerId: string, raw: string): PeerRecord | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.logger.warn({ peerId }, "Malformed peer record");
      return null;
    }

    const result = peerWireSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn({ peerId, issues: result.error.issues }, "Invalid peer record");
      return null;
    }
    return toPeerRecord(result.data);
  }
}
