import type { Logger } from "pino";
import type { Clock } from "../utils/clock";
import {
  addMinutes,
  dateAtTimeInTimeZoneIso,
  formatTimeSlot,
  isValidDateKey,
  overlap,
  toMs,
} from "../utils/core";
import { SchedulingRejection, runOperation } from "../utils/errors";
import type { Result } from "../utils/errors";
import type { Service, StaffMember } from "../utils/types";
import type { CatalogStore, SchedulingReader } from "./ports";

// Minimum scheduling granularity; candidate starts are this far apart.
export const SLOT_STEP_MIN = 30;

export interface Slot {
  startsAt: string;
  endsAt: string;
  label: string;
}

export interface StaffSlot extends Slot {
  staffId: string;
  staffName: string;
}

export interface SlotQuery {
  staffId: string;
  timeZone: string;
  date: string;
  durationMin: number;
  /** Candidates starting before this instant are skipped. */
  notBefore?: string;
}

/**
 * Candidate slots of one staff member on one date. Each working interval is
 * walked from its start in fixed steps; a candidate is kept when it ends
 * inside the interval and no active booking overlaps it. Slots can overlap
 * each other and are returned in chronological order.
 */
export async function generateSlots(reader: SchedulingReader, query: SlotQuery): Promise<Slot[]> {
  if (!Number.isFinite(query.durationMin) || query.durationMin <= 0) {
    return [];
  }

  const workingRows = await reader.findFor(query.staffId, query.date);
  const notBefore = query.notBefore ? toMs(query.notBefore) : Number.NEGATIVE_INFINITY;
  const slots: Slot[] = [];

  for (const row of workingRows) {
    const windowStart = dateAtTimeInTimeZoneIso(query.date, row.startTime, query.timeZone);
    const windowEnd = dateAtTimeInTimeZoneIso(query.date, row.endTime, query.timeZone);
    const booked = await reader.findActiveOverlapping(query.staffId, windowStart, windowEnd);

    let cursor = windowStart;
    while (toMs(cursor) < toMs(windowEnd)) {
      const end = addMinutes(cursor, query.durationMin);
      if (toMs(end) > toMs(windowEnd)) {
        break;
      }
      const free = !booked.some((item) => overlap(item.startsAt, item.endsAt, cursor, end));
      if (free && toMs(cursor) >= notBefore) {
        slots.push({
          startsAt: cursor,
          endsAt: end,
          label: formatTimeSlot(cursor, end, query.timeZone),
        });
      }
      cursor = addMinutes(cursor, SLOT_STEP_MIN);
    }
  }

  return slots.sort((a, b) => toMs(a.startsAt) - toMs(b.startsAt));
}

export interface AvailabilityDependencies {
  catalog: CatalogStore;
  reader: SchedulingReader;
  clock: Clock;
  logger: Logger;
}

export interface AvailabilityService {
  getAvailableSlots(staffId: string, serviceId: string, date: string): Promise<Result<Slot[]>>;
  getBusinessAvailability(input: {
    businessId: string;
    serviceId: string;
    date: string;
    staffId?: string;
  }): Promise<Result<StaffSlot[]>>;
}

function requireDate(date: string): void {
  if (!isValidDateKey(date)) {
    throw new SchedulingRejection("VALIDATION", "date must use YYYY-MM-DD");
  }
}

function requireServiceOf(service: Service | undefined, businessId: string): Service {
  if (!service || service.businessId !== businessId) {
    throw new SchedulingRejection("NOT_FOUND", "service not found");
  }
  return service;
}

export function createAvailabilityService(deps: AvailabilityDependencies): AvailabilityService {
  const { catalog, reader, clock, logger } = deps;

  async function slotsFor(staff: StaffMember, service: Service, date: string, timeZone: string) {
    return generateSlots(reader, {
      staffId: staff.id,
      timeZone,
      date,
      durationMin: service.durationMin,
      notBefore: clock.now().toISOString(),
    });
  }

  return {
    getAvailableSlots(staffId, serviceId, date) {
      return runOperation(logger, "getAvailableSlots", async () => {
        requireDate(date);
        const staff = await catalog.findStaff(staffId);
        if (!staff || !staff.isActive) {
          throw new SchedulingRejection("NOT_FOUND", "staff member not found");
        }
        const business = await catalog.findBusiness(staff.businessId);
        if (!business) {
          throw new SchedulingRejection("NOT_FOUND", "business not found");
        }
        const service = requireServiceOf(await catalog.findService(serviceId), business.id);
        return slotsFor(staff, service, date, business.timezone);
      });
    },

    getBusinessAvailability(input) {
      return runOperation(logger, "getBusinessAvailability", async () => {
        requireDate(input.date);
        const business = await catalog.findBusiness(input.businessId);
        if (!business) {
          throw new SchedulingRejection("NOT_FOUND", "business not found");
        }
        const service = requireServiceOf(await catalog.findService(input.serviceId), business.id);

        let staffMembers = (await catalog.listStaff(business.id)).filter((item) => item.isActive);
        if (input.staffId) {
          staffMembers = staffMembers.filter((item) => item.id === input.staffId);
          if (!staffMembers.length) {
            throw new SchedulingRejection("NOT_FOUND", "staff member not found");
          }
        }

        const slots: StaffSlot[] = [];
        for (const staff of staffMembers) {
          const staffSlots = await slotsFor(staff, service, input.date, business.timezone);
          slots.push(
            ...staffSlots.map((slot) => ({ ...slot, staffId: staff.id, staffName: staff.name })),
          );
        }

        return slots.sort(
          (a, b) =>
            toMs(a.startsAt) - toMs(b.startsAt) || a.staffName.localeCompare(b.staffName),
        );
      });
    },
  };
}
