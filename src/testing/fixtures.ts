import { createServices } from "../app";
import type { AppServices } from "../app";
import type { BookingEvent } from "../scheduling/bookingOrchestrator";
import { createFixedClock } from "../utils/clock";
import type { FixedClock } from "../utils/clock";
import type { AppConfig } from "../utils/config";
import type { Result } from "../utils/errors";
import { createSilentLogger } from "../utils/logger";
import { createMemoryStores } from "../utils/store";
import type { MemoryStores } from "../utils/store";
import type { Business, Service, StaffMember } from "../utils/types";

export const TEST_NOW = "2024-06-01T08:00:00.000Z";
export const DAY = "2024-06-03";

/** `HH:mm` on a date, as a UTC instant. */
export function at(time: string, date = DAY): string {
  return `${date}T${time}:00.000Z`;
}

export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw new Error(`${result.error.code}: ${result.error.message}`);
  }
  return result.data;
}

export interface TestHarness {
  services: AppServices;
  stores: MemoryStores;
  clock: FixedClock;
  events: BookingEvent[];
}

export function createHarness(overrides: Partial<AppConfig> = {}): TestHarness {
  const stores = createMemoryStores();
  const clock = createFixedClock(TEST_NOW);
  const events: BookingEvent[] = [];
  const services = createServices({
    stores,
    config: { port: 0, defaultTimeZone: "UTC", ...overrides },
    clock,
    logger: createSilentLogger(),
    onEvent: (event) => {
      events.push(event);
    },
  });
  return { services, stores, clock, events };
}

export interface Salon {
  business: Business;
  alice: StaffMember;
  bruno: StaffMember;
  haircut: Service;
  coloring: Service;
}

/**
 * One business with two staff members and two services. Alice works
 * 09:00-12:00 and Bruno 10:00-14:00 on {@link DAY}.
 */
export async function seedSalon(services: AppServices, timezone = "UTC"): Promise<Salon> {
  const business = unwrap(await services.catalog.createBusiness({ name: "Test Salon", timezone }));
  const alice = unwrap(await services.catalog.createStaff(business.id, { name: "Alice" }));
  const bruno = unwrap(await services.catalog.createStaff(business.id, { name: "Bruno" }));
  const haircut = unwrap(
    await services.catalog.createService(business.id, {
      name: "Haircut",
      durationMin: 30,
      priceCents: 2500,
    }),
  );
  const coloring = unwrap(
    await services.catalog.createService(business.id, {
      name: "Coloring",
      durationMin: 60,
      priceCents: 6000,
    }),
  );
  unwrap(
    await services.schedules.addWorkingSchedule(alice.id, {
      date: DAY,
      startTime: "09:00",
      endTime: "12:00",
    }),
  );
  unwrap(
    await services.schedules.addWorkingSchedule(bruno.id, {
      date: DAY,
      startTime: "10:00",
      endTime: "14:00",
    }),
  );
  return { business, alice, bruno, haircut, coloring };
}
