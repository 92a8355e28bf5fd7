/**
 * Call API Client
 * HTTP client for the call backend; implements the roster's network contract.
 * Peers returned alongside participants are written to the peer store before
 * the participants are handed back, so every returned participant resolves.
 */
import { z } from "zod";
import { config } from "../../config/index.js";
import type { Logger } from "../../infrastructure/logger.js";
import { metrics } from "../../infrastructure/metrics.js";
import { CallApiError, Errors } from "../../shared/errors.js";
import type {
  CallUpdate,
  ParticipantsUpdate,
} from "../../domains/participants/participant.types.js";
import {
  participantsPageSchema,
  peersOf,
  toCallUpdate,
  toParticipant,
  toPeerRecord,
  updatesResponseSchema,
  type CallUpdateWire,
} from "./call.schemas.js";
import type {
  CallNetwork,
  EditParticipantRequest,
  FetchParticipantsRequest,
  FetchParticipantsResult,
  PeerDirectory,
  PeerRecord,
  ToggleRecordingRequest,
  UpdateSettingsRequest,
} from "./types.js";

/** Peer directory the client can also write to */
export interface PeerStore extends PeerDirectory {
  savePeers(peers: readonly PeerRecord[]): Promise<boolean>;
}

export class CallApiClient implements CallNetwork {
  constructor(
    private readonly peers: PeerStore,
    private readonly logger: Logger,
  ) {}

  /**
   * Fetch a page of participants, optionally restricted to media sources
   */
  async fetchParticipants(
    request: FetchParticipantsRequest,
  ): Promise<FetchParticipantsResult> {
    const page = await this.call(
      "participants",
      `/api/v1/calls/${encodeURIComponent(request.callId)}/participants`,
      {
        offset: request.offset,
        ssrcs: request.ssrcs,
        limit: request.limit,
        ...(request.sortAscending !== undefined && {
          sort_ascending: request.sortAscending,
        }),
      },
      participantsPageSchema,
    );

    const pagePeers = page.peers.map(toPeerRecord);
    await this.peers.savePeers(pagePeers);

    const resolved = new Set(pagePeers.map((peer) => peer.id));
    const unknown = page.participants
      .map((p) => p.peer_id)
      .filter((peerId) => !resolved.has(peerId));
    if (unknown.length > 0) {
      for (const peerId of (await this.peers.getPeers(unknown)).keys()) {
        resolved.add(peerId);
      }
    }

    const participants = page.participants
      .filter((p) => resolved.has(p.peer_id))
      .map(toParticipant);
    if (participants.length < page.participants.length) {
      this.logger.warn(
        {
          callId: request.callId,
          dropped: page.participants.length - participants.length,
        },
        "Dropped participants with unresolvable peers",
      );
    }

    return {
      participants,
      nextOffset: page.next_offset,
      totalCount: page.count,
      version: page.version,
      sortAscending: page.sort_ascending,
    };
  }

  async editParticipant(
    request: EditParticipantRequest,
    signal: AbortSignal,
  ): Promise<ParticipantsUpdate[]> {
    const updates = await this.callForUpdates(
      "edit_participant",
      `/api/v1/calls/${encodeURIComponent(request.callId)}/participants/${encodeURIComponent(request.peerId)}`,
      {
        muted: request.muted,
        ...(request.volume !== null && { volume: request.volume }),
        ...(request.raiseHand !== null && { raise_hand: request.raiseHand }),
      },
      signal,
    );
    return updates.filter(isParticipantsUpdate);
  }

  toggleRecording(request: ToggleRecordingRequest): Promise<CallUpdate[]> {
    return this.callForUpdates(
      "toggle_recording",
      `/api/v1/calls/${encodeURIComponent(request.callId)}/recording`,
      {
        start: request.shouldBeRecording,
        ...(request.title !== null && { title: request.title }),
      },
    );
  }

  updateSettings(request: UpdateSettingsRequest): Promise<CallUpdate[]> {
    return this.callForUpdates(
      "update_settings",
      `/api/v1/calls/${encodeURIComponent(request.callId)}/settings`,
      {
        ...(request.joinMuted !== undefined && { join_muted: request.joinMuted }),
        ...(request.resetInviteHash !== undefined && {
          reset_invite_hash: request.resetInviteHash,
        }),
      },
    );
  }

  // ─────────────────────────────────────────────────────────────────
  // Private Helpers
  // ─────────────────────────────────────────────────────────────────

  private async callForUpdates(
    label: string,
    endpoint: string,
    body: unknown,
    signal?: AbortSignal,
  ): Promise<CallUpdate[]> {
    const { updates } = await this.call(
      label,
      endpoint,
      body,
      updatesResponseSchema,
      signal,
    );
    await this.peers.savePeers(peersOf(updates));
    return updates.map((update: CallUpdateWire) => toCallUpdate(update));
  }

  /**
   * POST, check status, and validate the JSON body against `schema`
   */
  private async call<S extends z.ZodTypeAny>(
    label: string,
    endpoint: string,
    body: unknown,
    schema: S,
    signal?: AbortSignal,
  ): Promise<z.output<S>> {
    const endTimer = metrics.callApiLatency.startTimer({ endpoint: label });

    let response: Response;
    try {
      response = await this.post(endpoint, body, signal);
    } catch (err) {
      metrics.callApiCalls.inc({ endpoint: label, status: "error" });
      throw new CallApiError(`${Errors.CALL_API_FAILED}: ${String(err)}`, label);
    } finally {
      endTimer();
    }

    if (!response.ok) {
      metrics.callApiCalls.inc({ endpoint: label, status: String(response.status) });
      throw new CallApiError(
        `${Errors.CALL_API_FAILED} (status ${response.status})`,
        label,
        response.status,
      );
    }

    const rawBody = await response.text();
    let parsed: unknown;
    try {
      parsed = JSON.parse(rawBody);
    } catch {
      parsed = undefined;
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      metrics.callApiCalls.inc({ endpoint: label, status: "invalid" });
      this.logger.debug(
        { endpoint: label, status: response.status, bodyPreview: this.sanitizeBody(rawBody) },
        "Call API response body (sanitized)",
      );
      throw new CallApiError(Errors.CALL_API_INVALID_RESPONSE, label, response.status);
    }

    metrics.callApiCalls.inc({ endpoint: label, status: "success" });
    return result.data;
  }

  private async post(
    endpoint: string,
    body: unknown,
    signal?: AbortSignal,
  ): Promise<Response> {
    const url = `${config.CALL_API_URL}${endpoint}`;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), config.CALL_API_TIMEOUT_MS);
    const forwardAbort = () => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener("abort", forwardAbort, { once: true });
    }

    try {
      return await fetch(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Accept: "application/json",
          Authorization: `Bearer ${config.CALL_API_KEY}`,
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", forwardAbort);
    }
  }

  /**
   * Whitespace-collapsed, truncated body for logs
   */
  private sanitizeBody(rawBody: string, maxLength = 200): string {
    if (!rawBody) {
      return "[empty body]";
    }

    const collapsed = rawBody.replace(/\s+/g, " ").trim();
    if (collapsed.length <= maxLength) {
      return collapsed;
    }

    return `${collapsed.slice(0, maxLength)}... [truncated]`;
  }
}

function isParticipantsUpdate(update: CallUpdate): update is ParticipantsUpdate {
  return update.kind === "participants";
}
