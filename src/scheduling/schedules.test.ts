import { beforeEach, describe, expect, it } from "vitest";
import { DAY, at, createHarness, seedSalon, unwrap } from "../testing/fixtures";
import type { Salon, TestHarness } from "../testing/fixtures";
import type { Result } from "../utils/errors";

function errorOf<T>(result: Result<T>): { code: string; message: string } | null {
  return result.ok ? null : { code: result.error.code, message: result.error.message };
}

describe("schedule manager", () => {
  let harness: TestHarness;
  let salon: Salon;

  const schedules = () => harness.services.schedules;

  beforeEach(async () => {
    harness = createHarness();
    salon = await seedSalon(harness.services);
  });

  it("adds a working interval for the staff member's business", async () => {
    const row = unwrap(
      await schedules().addWorkingSchedule(salon.alice.id, {
        date: "2024-06-04",
        startTime: "13:00",
        endTime: "17:30",
      }),
    );
    expect(row).toMatchObject({
      businessId: salon.business.id,
      staffId: salon.alice.id,
      date: "2024-06-04",
      startTime: "13:00",
      endTime: "17:30",
    });
  });

  it("allows intervals that touch", async () => {
    const result = await schedules().addWorkingSchedule(salon.alice.id, {
      date: DAY,
      startTime: "12:00",
      endTime: "13:00",
    });
    expect(result.ok).toBe(true);
  });

  it("rejects an interval overlapping an existing one", async () => {
    const result = await schedules().addWorkingSchedule(salon.alice.id, {
      date: DAY,
      startTime: "11:00",
      endTime: "13:00",
    });
    expect(errorOf(result)).toEqual({
      code: "SCHEDULE_OVERLAP",
      message: `Working hours ${DAY} 11:00-13:00 overlap existing ${DAY} 09:00-12:00`,
    });
  });

  it("validates formats, ranges and dates", async () => {
    const add = (date: string, startTime: string, endTime: string) =>
      schedules().addWorkingSchedule(salon.alice.id, { date, startTime, endTime });

    expect(errorOf(await add("2024-06-04", "9:00", "12:00"))?.code).toBe("VALIDATION");
    expect(errorOf(await add("2024-13-01", "09:00", "12:00"))?.code).toBe("VALIDATION");
    expect(errorOf(await add("2024-06-04", "12:00", "12:00"))?.code).toBe("INVALID_RANGE");
    expect(errorOf(await add("2024-05-31", "09:00", "12:00"))?.code).toBe("PAST_DATE");
    expect((await add("2024-06-01", "18:00", "20:00")).ok).toBe(true);
  });

  it("judges past dates by the business calendar", async () => {
    const tokyo = createHarness();
    const local = await seedSalon(tokyo.services, "Asia/Tokyo");
    // Already June 2nd in Tokyo.
    tokyo.clock.set("2024-06-01T23:30:00.000Z");

    const result = await tokyo.services.schedules.addWorkingSchedule(local.alice.id, {
      date: "2024-06-01",
      startTime: "09:00",
      endTime: "12:00",
    });
    expect(errorOf(result)?.code).toBe("PAST_DATE");
  });

  it("reports unknown staff", async () => {
    const result = await schedules().addWorkingSchedule("missing", {
      date: DAY,
      startTime: "09:00",
      endTime: "10:00",
    });
    expect(errorOf(result)?.message).toBe("staff member not found");
  });

  describe("bulk add", () => {
    it("writes every row", async () => {
      const rows = unwrap(
        await schedules().addWorkingSchedules(salon.alice.id, [
          { date: "2024-06-04", startTime: "09:00", endTime: "12:00" },
          { date: "2024-06-04", startTime: "13:00", endTime: "17:00" },
          { date: "2024-06-05", startTime: "09:00", endTime: "17:00" },
        ]),
      );
      expect(rows).toHaveLength(3);

      const listed = unwrap(
        await schedules().listWorkingSchedules(salon.alice.id, "2024-06-04", "2024-06-05"),
      );
      expect(listed.map((row) => `${row.date} ${row.startTime}`)).toEqual([
        "2024-06-04 09:00",
        "2024-06-04 13:00",
        "2024-06-05 09:00",
      ]);
    });

    it("writes nothing when any row clashes with stored hours", async () => {
      const result = await schedules().addWorkingSchedules(salon.alice.id, [
        { date: "2024-06-04", startTime: "09:00", endTime: "12:00" },
        { date: DAY, startTime: "11:00", endTime: "13:00" },
      ]);
      expect(errorOf(result)?.code).toBe("SCHEDULE_OVERLAP");
      expect(
        unwrap(await schedules().listWorkingSchedules(salon.alice.id, "2024-06-04", "2024-06-04")),
      ).toEqual([]);
    });

    it("rejects rows overlapping each other", async () => {
      const result = await schedules().addWorkingSchedules(salon.alice.id, [
        { date: "2024-06-05", startTime: "09:00", endTime: "11:00" },
        { date: "2024-06-05", startTime: "10:00", endTime: "12:00" },
      ]);
      expect(errorOf(result)).toEqual({
        code: "SCHEDULE_OVERLAP",
        message: "Working hours 2024-06-05 09:00-11:00 overlap 2024-06-05 10:00-12:00",
      });
    });

    it("requires at least one row", async () => {
      expect(errorOf(await schedules().addWorkingSchedules(salon.alice.id, []))?.code).toBe(
        "VALIDATION",
      );
    });
  });

  describe("removeWorkingSchedule", () => {
    const aliceRow = async () => {
      const [row] = unwrap(await schedules().listWorkingSchedules(salon.alice.id, DAY, DAY));
      return row;
    };

    it("removes an unused interval", async () => {
      const row = await aliceRow();
      const removed = unwrap(await schedules().removeWorkingSchedule(row.id));
      expect(removed.id).toBe(row.id);
      expect(unwrap(await schedules().listWorkingSchedules(salon.alice.id, DAY, DAY))).toEqual([]);
    });

    it("refuses while active appointments sit inside it", async () => {
      const row = await aliceRow();
      const booked = unwrap(
        await harness.services.bookings.createAppointment({
          businessId: salon.business.id,
          staffId: salon.alice.id,
          serviceId: salon.haircut.id,
          startsAt: at("10:00"),
          clientName: "Nia",
          clientPhone: "",
        }),
      );

      expect(errorOf(await schedules().removeWorkingSchedule(row.id))?.code).toBe(
        "SCHEDULE_IN_USE",
      );

      unwrap(await harness.services.bookings.cancelAppointment(booked.id));
      expect((await schedules().removeWorkingSchedule(row.id)).ok).toBe(true);
    });

    it("reports unknown intervals", async () => {
      expect(errorOf(await schedules().removeWorkingSchedule("missing"))?.code).toBe("NOT_FOUND");
    });
  });

  describe("listing", () => {
    it("validates the range", async () => {
      expect(
        errorOf(await schedules().listWorkingSchedules(salon.alice.id, "2024-06-05", DAY))?.code,
      ).toBe("INVALID_RANGE");
      expect(
        errorOf(await schedules().listWorkingSchedules(salon.alice.id, "2024-06-01", "2024-12-31"))
          ?.message,
      ).toBe("Range must not exceed 93 days");
      expect(errorOf(await schedules().listWorkingSchedules(salon.alice.id, "june", DAY))?.code).toBe(
        "VALIDATION",
      );
    });
  });

  describe("getStaffAgenda", () => {
    it("returns hours and bookings of every status in order", async () => {
      const later = unwrap(
        await harness.services.bookings.createAppointment({
          businessId: salon.business.id,
          staffId: salon.alice.id,
          serviceId: salon.haircut.id,
          startsAt: at("10:00"),
          clientName: "Omar",
          clientPhone: "",
        }),
      );
      const earlier = unwrap(
        await harness.services.bookings.createAppointment({
          businessId: salon.business.id,
          staffId: salon.alice.id,
          serviceId: salon.coloring.id,
          startsAt: at("09:00"),
          clientName: "Pia",
          clientPhone: "",
        }),
      );
      unwrap(await harness.services.bookings.cancelAppointment(later.id));

      const agenda = unwrap(await schedules().getStaffAgenda(salon.alice.id, DAY, DAY));
      expect(agenda.workingSchedules.map((row) => row.startTime)).toEqual(["09:00"]);
      expect(agenda.appointments).toEqual([
        {
          appointmentId: earlier.id,
          appointmentServiceId: earlier.services[0].id,
          serviceId: salon.coloring.id,
          status: "PENDING",
          clientName: "Pia",
          startsAt: at("09:00"),
          endsAt: at("10:00"),
        },
        {
          appointmentId: later.id,
          appointmentServiceId: later.services[0].id,
          serviceId: salon.haircut.id,
          status: "CANCELLED",
          clientName: "Omar",
          startsAt: at("10:00"),
          endsAt: at("10:30"),
        },
      ]);
    });

    it("is empty outside the booked range", async () => {
      const agenda = unwrap(
        await schedules().getStaffAgenda(salon.alice.id, "2024-06-04", "2024-06-06"),
      );
      expect(agenda).toEqual({
        staffId: salon.alice.id,
        fromDate: "2024-06-04",
        toDate: "2024-06-06",
        workingSchedules: [],
        appointments: [],
      });
    });
  });
});
