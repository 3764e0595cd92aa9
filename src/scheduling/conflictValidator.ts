import type { Clock } from "../utils/clock";
import { dateAtTimeInTimeZoneIso, toDateKeyInTimeZone, toMs } from "../utils/core";
import { SchedulingRejection } from "../utils/errors";
import type { SchedulingReader } from "./ports";

export interface SlotProposal {
  staffId: string;
  /** Zone of the owning business; working hours are read in it. */
  timeZone: string;
  startsAt: string;
  endsAt: string;
  /** Rows that may overlap the proposal because they are being moved or replaced. */
  excludeServiceIds?: readonly string[];
}

/**
 * Decides whether a staff member can take [startsAt, endsAt). Returns null
 * when admissible, otherwise the first failed check: past start, empty
 * range, no covering working interval, overlap with an active booking.
 *
 * Read-only. Callers that write afterwards must pass their transaction as
 * the reader so the check and the write see the same state.
 */
export async function validateSlot(
  reader: SchedulingReader,
  clock: Clock,
  proposal: SlotProposal,
): Promise<SchedulingRejection | null> {
  const start = toMs(proposal.startsAt);
  const end = toMs(proposal.endsAt);

  if (start < clock.now().getTime()) {
    return new SchedulingRejection("PAST_DATE", "Cannot book appointments in the past");
  }

  if (Number.isNaN(start) || Number.isNaN(end) || start >= end) {
    return new SchedulingRejection("INVALID_RANGE", "End time must be after start time");
  }

  const date = toDateKeyInTimeZone(proposal.startsAt, proposal.timeZone);
  const workingRows = await reader.findFor(proposal.staffId, date);
  const covered = workingRows.some((row) => {
    const rowStart = toMs(dateAtTimeInTimeZoneIso(date, row.startTime, proposal.timeZone));
    const rowEnd = toMs(dateAtTimeInTimeZoneIso(date, row.endTime, proposal.timeZone));
    return start >= rowStart && end <= rowEnd;
  });
  if (!covered) {
    return new SchedulingRejection(
      "OUTSIDE_WORKING_HOURS",
      "Selected time is outside of staff working hours",
    );
  }

  const conflicts = await reader.findActiveOverlapping(
    proposal.staffId,
    proposal.startsAt,
    proposal.endsAt,
    proposal.excludeServiceIds,
  );
  if (conflicts.length) {
    return new SchedulingRejection(
      "DOUBLE_BOOKING",
      "Time slot conflicts with an existing appointment",
    );
  }

  return null;
}
