/**
 * Participant ordering
 *
 * Speaking rank, then speaking time, then raised hands, then join time,
 * with the peer id as the final tie-break so the order is total.
 */
import type { Participant } from "./participant.types.js";

/** Present values sort before null; two present values go through `order` */
function compareOptional(
  lhs: number | null,
  rhs: number | null,
  order: (lhs: number, rhs: number) => number,
): number {
  if (lhs !== null && rhs !== null) return order(lhs, rhs);
  if (lhs !== null) return -1;
  if (rhs !== null) return 1;
  return 0;
}

const ascending = (lhs: number, rhs: number) => lhs - rhs;
const descending = (lhs: number, rhs: number) => rhs - lhs;

export function compareParticipants(
  lhs: Participant,
  rhs: Participant,
  sortAscending: boolean,
): number {
  const byRank = compareOptional(lhs.activityRank, rhs.activityRank, ascending);
  if (byRank !== 0) return byRank;

  const byActivity = compareOptional(
    lhs.activityTimestamp,
    rhs.activityTimestamp,
    descending,
  );
  if (byActivity !== 0) return byActivity;

  const byHand = compareOptional(
    lhs.raiseHandRating,
    rhs.raiseHandRating,
    descending,
  );
  if (byHand !== 0) return byHand;

  if (lhs.joinTimestamp !== rhs.joinTimestamp) {
    return sortAscending
      ? lhs.joinTimestamp - rhs.joinTimestamp
      : rhs.joinTimestamp - lhs.joinTimestamp;
  }

  if (lhs.peerId < rhs.peerId) return -1;
  if (lhs.peerId > rhs.peerId) return 1;
  return 0;
}

export function sortParticipants(
  participants: readonly Participant[],
  sortAscending: boolean,
): Participant[] {
  return [...participants].sort((lhs, rhs) =>
    compareParticipants(lhs, rhs, sortAscending),
  );
}

/**
 * Union by peer id. Entries already in `current` win; `incoming` only adds.
 */
export function mergeAndSortParticipants(
  current: readonly Participant[],
  incoming: readonly Participant[],
  sortAscending: boolean,
): Participant[] {
  const merged = [...current];
  const known = new Set(current.map((p) => p.peerId));

  for (const participant of incoming) {
    if (known.has(participant.peerId)) continue;
    known.add(participant.peerId);
    merged.push(participant);
  }

  return sortParticipants(merged, sortAscending);
}
