import { diffMinutes, overlap, toMs } from "../utils/core";
import { SchedulingRejection } from "../utils/errors";

export interface PlannedService {
  staffId: string;
  startsAt: string;
  endsAt: string;
}

export interface ServiceSetPolicy {
  /** Largest allowed idle time between consecutive services; unset disables the check. */
  maxServiceGapMin?: number;
}

/**
 * Checks a service set against itself before any store is consulted: rows
 * sharing a staff member must not overlap, and, when a gap limit is
 * configured, consecutive rows must follow each other closely enough.
 */
export function checkServiceSet(
  rows: readonly PlannedService[],
  policy: ServiceSetPolicy,
): SchedulingRejection | null {
  if (!rows.length) {
    return new SchedulingRejection("VALIDATION", "At least one service is required");
  }

  const sorted = [...rows].sort((a, b) => toMs(a.startsAt) - toMs(b.startsAt));

  for (let i = 0; i < sorted.length; i += 1) {
    for (let j = i + 1; j < sorted.length; j += 1) {
      if (
        sorted[i].staffId === sorted[j].staffId &&
        overlap(sorted[i].startsAt, sorted[i].endsAt, sorted[j].startsAt, sorted[j].endsAt)
      ) {
        return new SchedulingRejection(
          "DOUBLE_BOOKING",
          "Services of one appointment overlap for the same staff member",
        );
      }
    }
  }

  if (policy.maxServiceGapMin !== undefined) {
    for (let i = 0; i < sorted.length - 1; i += 1) {
      const gap = diffMinutes(sorted[i + 1].startsAt, sorted[i].endsAt);
      if (gap > policy.maxServiceGapMin) {
        return new SchedulingRejection(
          "SERVICE_GAP",
          `Gap between services exceeds ${policy.maxServiceGapMin} minutes`,
        );
      }
    }
  }

  return null;
}
