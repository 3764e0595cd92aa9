import { beforeEach, describe, expect, it } from "vitest";
import { DAY, at, createHarness, seedSalon, unwrap } from "../testing/fixtures";
import type { Salon, TestHarness } from "../testing/fixtures";
import { validateSlot } from "./conflictValidator";

describe("validateSlot", () => {
  let harness: TestHarness;
  let salon: Salon;

  const check = (staffId: string, startsAt: string, endsAt: string, exclude?: string[]) =>
    validateSlot(harness.stores.scheduling, harness.clock, {
      staffId,
      timeZone: salon.business.timezone,
      startsAt,
      endsAt,
      excludeServiceIds: exclude,
    });

  beforeEach(async () => {
    harness = createHarness();
    salon = await seedSalon(harness.services);
  });

  it("admits a free slot inside working hours", async () => {
    expect(await check(salon.alice.id, at("09:00"), at("09:30"))).toBeNull();
    expect(await check(salon.alice.id, at("11:30"), at("12:00"))).toBeNull();
  });

  it("rejects a start in the past before anything else", async () => {
    const rejection = await check(salon.alice.id, "2024-05-31T09:00:00.000Z", "2024-05-31T09:00:00.000Z");
    expect(rejection?.code).toBe("PAST_DATE");
    expect(rejection?.message).toBe("Cannot book appointments in the past");
  });

  it("rejects empty and inverted ranges", async () => {
    expect((await check(salon.alice.id, at("09:30"), at("09:30")))?.code).toBe("INVALID_RANGE");
    expect((await check(salon.alice.id, at("10:00"), at("09:30")))?.code).toBe("INVALID_RANGE");
  });

  it("requires one working interval to contain the whole range", async () => {
    expect((await check(salon.alice.id, at("11:45"), at("12:15")))?.code).toBe(
      "OUTSIDE_WORKING_HOURS",
    );
    expect((await check(salon.alice.id, at("08:30"), at("09:00")))?.code).toBe(
      "OUTSIDE_WORKING_HOURS",
    );
    expect((await check(salon.alice.id, at("09:00"), at("09:30", "2024-06-04")))?.code).toBe(
      "OUTSIDE_WORKING_HOURS",
    );
  });

  it("rejects overlap with an active booking of the same staff member", async () => {
    const booked = unwrap(
      await harness.services.bookings.createAppointment({
        businessId: salon.business.id,
        staffId: salon.alice.id,
        serviceId: salon.haircut.id,
        startsAt: at("10:00"),
        clientName: "Dana",
        clientPhone: "555-0100",
      }),
    );

    const rejection = await check(salon.alice.id, at("10:15"), at("10:45"));
    expect(rejection?.code).toBe("DOUBLE_BOOKING");
    expect(rejection?.message).toBe("Time slot conflicts with an existing appointment");
    expect(await check(salon.alice.id, at("10:30"), at("11:00"))).toBeNull();
    expect(await check(salon.bruno.id, at("10:00"), at("10:30"))).toBeNull();
    expect(
      await check(salon.alice.id, at("10:15"), at("10:45"), [booked.services[0].id]),
    ).toBeNull();
  });

  it("ignores cancelled bookings", async () => {
    const booked = unwrap(
      await harness.services.bookings.createAppointment({
        businessId: salon.business.id,
        staffId: salon.alice.id,
        serviceId: salon.haircut.id,
        startsAt: at("10:00"),
        clientName: "Dana",
        clientPhone: "",
      }),
    );
    unwrap(await harness.services.bookings.cancelAppointment(booked.id));

    expect(await check(salon.alice.id, at("10:00"), at("10:30"))).toBeNull();
  });

  it("reads working hours in the business time zone", async () => {
    const berlin = createHarness();
    const local = await seedSalon(berlin.services, "Europe/Berlin");
    const conflictAt = (startsAt: string, endsAt: string) =>
      validateSlot(berlin.stores.scheduling, berlin.clock, {
        staffId: local.alice.id,
        timeZone: "Europe/Berlin",
        startsAt,
        endsAt,
      });

    // 09:00-12:00 CEST is 07:00-10:00 UTC.
    expect(await conflictAt(`${DAY}T07:00:00.000Z`, `${DAY}T07:30:00.000Z`)).toBeNull();
    expect((await conflictAt(`${DAY}T10:00:00.000Z`, `${DAY}T10:30:00.000Z`))?.code).toBe(
      "OUTSIDE_WORKING_HOURS",
    );
  });
});
