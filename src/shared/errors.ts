/**
 * Shared error message constants for consistent diagnostics
 */
export const Errors = {
  // General
  INVALID_PAYLOAD: "Invalid payload",

  // Call API
  CALL_API_FAILED: "Call API request failed",
  CALL_API_INVALID_RESPONSE: "Call API returned an unexpected payload",

  // Roster sync
  PEER_NOT_RESOLVED: "Participant update names a peer missing from the peer directory",
  INVALID_PAGINATION_TOKEN: "loadMore called with an invalid token",
  RESYNC_FAILED: "Failed to resynchronize participants",
  BACKFILL_FAILED: "Failed to load missing participants",
  LOAD_MORE_FAILED: "Failed to load more participants",
  MUTATION_FAILED: "Participant update request failed",
  SETTINGS_UPDATE_FAILED: "Call settings request failed",

  // Peer store
  PEER_LOOKUP_FAILED: "Failed to read peers",
  PEER_SAVE_FAILED: "Failed to save peers",
} as const;

/**
 * Error raised by the call API client; `status` is the HTTP status when the
 * server answered at all.
 */
export class CallApiError extends Error {
  constructor(
    message: string,
    readonly endpoint: string,
    readonly status: number | null = null,
  ) {
    super(message);
    this.name = "CallApiError";
  }
}
