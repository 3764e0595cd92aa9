import type { Logger } from "pino";
import type { Clock } from "../utils/clock";
import { nowIso } from "../utils/clock";
import {
  addDaysToDateKey,
  createId,
  dateAtTimeInTimeZoneIso,
  isValidDateKey,
  isValidTime,
  timesOverlap,
  toDateKeyInTimeZone,
} from "../utils/core";
import { SchedulingRejection, runOperation } from "../utils/errors";
import type { Result } from "../utils/errors";
import type { AppointmentStatus, StaffMember, WorkingSchedule } from "../utils/types";
import type { CatalogStore, SchedulingStore } from "./ports";

export interface WorkingScheduleInput {
  date: string;
  startTime: string;
  endTime: string;
}

export interface AgendaEntry {
  appointmentId: string;
  appointmentServiceId: string;
  serviceId: string;
  status: AppointmentStatus;
  clientName: string;
  startsAt: string;
  endsAt: string;
}

export interface StaffAgenda {
  staffId: string;
  fromDate: string;
  toDate: string;
  workingSchedules: WorkingSchedule[];
  appointments: AgendaEntry[];
}

export interface ScheduleManager {
  addWorkingSchedule(staffId: string, input: WorkingScheduleInput): Promise<Result<WorkingSchedule>>;
  /** All rows are written or none are. */
  addWorkingSchedules(
    staffId: string,
    inputs: WorkingScheduleInput[],
  ): Promise<Result<WorkingSchedule[]>>;
  removeWorkingSchedule(scheduleId: string): Promise<Result<WorkingSchedule>>;
  listWorkingSchedules(
    staffId: string,
    fromDate: string,
    toDate: string,
  ): Promise<Result<WorkingSchedule[]>>;
  /** Working rows and booked services of the staff member in the date range, any status. */
  getStaffAgenda(staffId: string, fromDate: string, toDate: string): Promise<Result<StaffAgenda>>;
}

export interface ScheduleManagerDependencies {
  catalog: CatalogStore;
  store: SchedulingStore;
  clock: Clock;
  logger: Logger;
}

// Longest range a single listing may cover.
const MAX_LIST_DAYS = 93;

function requireDate(value: string, field: string): void {
  if (!isValidDateKey(value)) {
    throw new SchedulingRejection("VALIDATION", `${field} must use YYYY-MM-DD`);
  }
}

function checkRange(fromDate: string, toDate: string): void {
  requireDate(fromDate, "from");
  requireDate(toDate, "to");
  if (fromDate > toDate) {
    throw new SchedulingRejection("INVALID_RANGE", "from must not be after to");
  }
  if (addDaysToDateKey(fromDate, MAX_LIST_DAYS) < toDate) {
    throw new SchedulingRejection("INVALID_RANGE", `Range must not exceed ${MAX_LIST_DAYS} days`);
  }
}

function describe(row: WorkingScheduleInput): string {
  return `${row.date} ${row.startTime}-${row.endTime}`;
}

export function createScheduleManager(deps: ScheduleManagerDependencies): ScheduleManager {
  const { catalog, store, clock, logger } = deps;

  async function requireStaff(staffId: string): Promise<{ staff: StaffMember; timeZone: string }> {
    const staff = await catalog.findStaff(staffId);
    if (!staff) {
      throw new SchedulingRejection("NOT_FOUND", "staff member not found");
    }
    const business = await catalog.findBusiness(staff.businessId);
    if (!business) {
      throw new SchedulingRejection("NOT_FOUND", "business not found");
    }
    return { staff, timeZone: business.timezone };
  }

  function checkInput(input: WorkingScheduleInput, today: string): void {
    requireDate(input.date, "date");
    if (!isValidTime(input.startTime) || !isValidTime(input.endTime)) {
      throw new SchedulingRejection("VALIDATION", "startTime and endTime must use HH:mm");
    }
    if (input.startTime >= input.endTime) {
      throw new SchedulingRejection("INVALID_RANGE", "End time must be after start time");
    }
    if (input.date < today) {
      throw new SchedulingRejection("PAST_DATE", "Cannot add working hours in the past");
    }
  }

  async function addMany(staffId: string, inputs: WorkingScheduleInput[]): Promise<WorkingSchedule[]> {
    if (!inputs.length) {
      throw new SchedulingRejection("VALIDATION", "At least one working schedule is required");
    }
    const { staff, timeZone } = await requireStaff(staffId);
    const today = toDateKeyInTimeZone(nowIso(clock), timeZone);

    inputs.forEach((input) => checkInput(input, today));
    inputs.forEach((input, index) => {
      const clash = inputs
        .slice(index + 1)
        .find(
          (other) =>
            other.date === input.date &&
            timesOverlap(input.startTime, input.endTime, other.startTime, other.endTime),
        );
      if (clash) {
        throw new SchedulingRejection(
          "SCHEDULE_OVERLAP",
          `Working hours ${describe(input)} overlap ${describe(clash)}`,
        );
      }
    });

    const rows = await store.transaction(async (tx) => {
      for (const input of inputs) {
        const existing = await tx.findFor(staff.id, input.date);
        const clash = existing.find((row) =>
          timesOverlap(input.startTime, input.endTime, row.startTime, row.endTime),
        );
        if (clash) {
          throw new SchedulingRejection(
            "SCHEDULE_OVERLAP",
            `Working hours ${describe(input)} overlap existing ${describe(clash)}`,
          );
        }
      }
      const now = nowIso(clock);
      const created: WorkingSchedule[] = inputs.map((input) => ({
        id: createId(),
        businessId: staff.businessId,
        staffId: staff.id,
        date: input.date,
        startTime: input.startTime,
        endTime: input.endTime,
        createdAt: now,
        updatedAt: now,
      }));
      await tx.insertSchedules(created);
      return created;
    });

    logger.info({ staffId: staff.id, count: rows.length }, "working schedules added");
    return rows;
  }

  return {
    addWorkingSchedule(staffId, input) {
      return runOperation(logger, "addWorkingSchedule", async () => {
        const [row] = await addMany(staffId, [input]);
        return row;
      });
    },

    addWorkingSchedules(staffId, inputs) {
      return runOperation(logger, "addWorkingSchedules", () => addMany(staffId, inputs));
    },

    removeWorkingSchedule(scheduleId) {
      return runOperation(logger, "removeWorkingSchedule", async () => {
        const schedule = await store.findScheduleById(scheduleId);
        if (!schedule) {
          throw new SchedulingRejection("NOT_FOUND", "working schedule not found");
        }
        const { timeZone } = await requireStaff(schedule.staffId);
        const windowStart = dateAtTimeInTimeZoneIso(schedule.date, schedule.startTime, timeZone);
        const windowEnd = dateAtTimeInTimeZoneIso(schedule.date, schedule.endTime, timeZone);

        await store.transaction(async (tx) => {
          // Reading the day's rows claims them for this transaction.
          const rows = await tx.findFor(schedule.staffId, schedule.date);
          if (!rows.some((row) => row.id === schedule.id)) {
            throw new SchedulingRejection("NOT_FOUND", "working schedule not found");
          }
          const booked = await tx.findActiveOverlapping(schedule.staffId, windowStart, windowEnd);
          if (booked.length) {
            throw new SchedulingRejection(
              "SCHEDULE_IN_USE",
              "Working hours contain active appointments",
            );
          }
          await tx.deleteSchedule(schedule.id);
        });

        logger.info({ scheduleId, staffId: schedule.staffId }, "working schedule removed");
        return schedule;
      });
    },

    listWorkingSchedules(staffId, fromDate, toDate) {
      return runOperation(logger, "listWorkingSchedules", async () => {
        checkRange(fromDate, toDate);
        const { staff } = await requireStaff(staffId);
        return store.listForStaff(staff.id, fromDate, toDate);
      });
    },

    getStaffAgenda(staffId, fromDate, toDate) {
      return runOperation(logger, "getStaffAgenda", async () => {
        checkRange(fromDate, toDate);
        const { staff, timeZone } = await requireStaff(staffId);
        const rangeStart = dateAtTimeInTimeZoneIso(fromDate, "00:00", timeZone);
        const rangeEnd = dateAtTimeInTimeZoneIso(addDaysToDateKey(toDate, 1), "00:00", timeZone);

        const [workingSchedules, rows] = await Promise.all([
          store.listForStaff(staff.id, fromDate, toDate),
          store.listStaffServices(staff.id, rangeStart, rangeEnd),
        ]);

        const appointments: AgendaEntry[] = [];
        for (const row of rows) {
          const appointment = await store.findAppointment(row.appointmentId);
          if (!appointment) {
            continue;
          }
          appointments.push({
            appointmentId: appointment.id,
            appointmentServiceId: row.id,
            serviceId: row.serviceId,
            status: appointment.status,
            clientName: appointment.clientName,
            startsAt: row.startsAt,
            endsAt: row.endsAt,
          });
        }

        return { staffId: staff.id, fromDate, toDate, workingSchedules, appointments };
      });
    },
  };
}
