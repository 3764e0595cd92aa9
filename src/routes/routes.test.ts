import request from "supertest";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { createApp } from "../app";
import { DAY, at, createHarness } from "../testing/fixtures";
import type { TestHarness } from "../testing/fixtures";

describe("HTTP routes", () => {
  let harness: TestHarness;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    harness = createHarness();
    app = createApp(harness.services);
  });

  async function seed() {
    const business = await request(app)
      .post("/api/v1/businesses")
      .send({ name: "Route Salon", timezone: "UTC" })
      .expect(201);
    const businessId: string = business.body.id;

    const staff = await request(app)
      .post(`/api/v1/businesses/${businessId}/staff`)
      .send({ name: "Tess" })
      .expect(201);
    const staffId: string = staff.body.id;

    const service = await request(app)
      .post(`/api/v1/businesses/${businessId}/services`)
      .send({ name: "Manicure", durationMin: 45, priceCents: 3000, color: "purple" })
      .expect(201);
    const serviceId: string = service.body.id;

    await request(app)
      .post(`/api/v1/staff/${staffId}/schedules`)
      .send({ date: DAY, startTime: "09:00", endTime: "12:00" })
      .expect(201);

    return { businessId, staffId, serviceId };
  }

  it("serves the banner and health checks", async () => {
    const banner = await request(app).get("/").expect(200);
    expect(banner.body).toEqual({
      name: "Slotkeeper Scheduling API",
      version: "0.1.0",
      basePath: "/api/v1",
    });

    const ready = await request(app).get("/health/ready").expect(200);
    expect(ready.body).toEqual({
      status: "ready",
      timestamp: "2024-06-01T08:00:00.000Z",
      storage: "memory",
    });
  });

  it("answers unknown routes and malformed bodies", async () => {
    const missing = await request(app).get("/api/v1/nowhere").expect(404);
    expect(missing.body).toEqual({ error: "Route not found" });

    const malformed = await request(app)
      .post("/api/v1/businesses")
      .set("Content-Type", "application/json")
      .send('{"name": ')
      .expect(400);
    expect(malformed.body).toEqual({ error: "Malformed JSON body", code: "VALIDATION" });
  });

  it("lists slots for a staff member", async () => {
    const { staffId, serviceId } = await seed();

    const response = await request(app)
      .get(`/api/v1/staff/${staffId}/slots`)
      .query({ serviceId, date: DAY })
      .expect(200);
    expect(response.body.map((slot: { label: string }) => slot.label)).toEqual([
      "09:00 AM - 09:45 AM",
      "09:30 AM - 10:15 AM",
      "10:00 AM - 10:45 AM",
      "10:30 AM - 11:15 AM",
      "11:00 AM - 11:45 AM",
    ]);
  });

  it("books, rejects a clash and walks the lifecycle", async () => {
    const { businessId, staffId, serviceId } = await seed();

    const created = await request(app)
      .post(`/api/v1/businesses/${businessId}/appointments`)
      .set("x-actor-id", "front-desk")
      .send({ staffId, serviceId, startsAt: at("09:00"), clientName: "Uma", clientPhone: "555-0104" })
      .expect(201);
    expect(created.body).toMatchObject({ status: "PENDING", totalPriceCents: 3000 });
    const appointmentId: string = created.body.id;

    const clash = await request(app)
      .post(`/api/v1/businesses/${businessId}/appointments`)
      .send({ staffId, serviceId, startsAt: at("09:30"), clientName: "Vik" })
      .expect(409);
    expect(clash.body).toEqual({
      error: "Time slot conflicts with an existing appointment",
      code: "DOUBLE_BOOKING",
    });

    const bad = await request(app)
      .patch(`/api/v1/appointments/${appointmentId}/status`)
      .send({ status: "archived" })
      .expect(400);
    expect(bad.body.code).toBe("VALIDATION");

    await request(app)
      .patch(`/api/v1/appointments/${appointmentId}/status`)
      .send({ status: "confirmed" })
      .expect(200);

    const moved = await request(app)
      .post(`/api/v1/appointments/${appointmentId}/reschedule`)
      .send({ startsAt: at("10:30"), reason: "late start" })
      .expect(200);
    expect(moved.body.services[0].startsAt).toBe(at("10:30"));

    const cancelled = await request(app)
      .post(`/api/v1/appointments/${appointmentId}/cancel`)
      .send({ reason: "no longer needed" })
      .expect(200);
    expect(cancelled.body).toMatchObject({
      status: "CANCELLED",
      cancellationReason: "no longer needed",
    });

    const again = await request(app).post(`/api/v1/appointments/${appointmentId}/cancel`).expect(409);
    expect(again.body.code).toBe("TERMINAL_STATE");

    await vi.waitFor(() => expect(harness.events.map((event) => event.type)).toEqual([
      "appointment.created",
      "appointment.status_changed",
      "appointment.rescheduled",
      "appointment.cancelled",
    ]));
    expect(harness.events[0].actor).toBe("front-desk");
  });

  it("books several services and replaces them", async () => {
    const { businessId, staffId, serviceId } = await seed();
    const extra = await request(app)
      .post(`/api/v1/businesses/${businessId}/services`)
      .send({ name: "Polish", durationMin: 15, priceCents: 800 })
      .expect(201);

    const created = await request(app)
      .post(`/api/v1/businesses/${businessId}/appointments`)
      .send({
        clientName: "Wes",
        services: [
          { serviceId, staffId, startsAt: at("09:00") },
          { serviceId: extra.body.id, staffId, startsAt: at("09:45") },
        ],
      })
      .expect(201);
    expect(created.body.totalPriceCents).toBe(3800);

    const replaced = await request(app)
      .put(`/api/v1/appointments/${created.body.id}/services`)
      .send({ services: [{ serviceId: extra.body.id, staffId, startsAt: at("09:00") }] })
      .expect(200);
    expect(replaced.body.totalPriceCents).toBe(800);
    expect(replaced.body.services).toHaveLength(1);
  });

  it("lists appointments with filters and pagination", async () => {
    const { businessId, staffId, serviceId } = await seed();
    for (const [time, clientName] of [["09:00", "Uma"], ["10:00", "Vik"]]) {
      await request(app)
        .post(`/api/v1/businesses/${businessId}/appointments`)
        .send({ staffId, serviceId, startsAt: at(time), clientName })
        .expect(201);
      harness.clock.advanceMinutes(1);
    }

    const listed = await request(app)
      .get(`/api/v1/businesses/${businessId}/appointments`)
      .query({ pageSize: "1", search: "vik", status: "pending", from: DAY, to: DAY })
      .expect(200);
    expect(listed.body).toMatchObject({ page: 1, pageSize: 1, total: 1 });
    expect(listed.body.data[0]).toMatchObject({ clientName: "Vik", status: "PENDING" });
    expect(listed.body.data[0].services[0].startsAt).toBe(at("10:00"));

    const oldest = await request(app)
      .get(`/api/v1/businesses/${businessId}/appointments`)
      .query({ ordering: "createdAt" })
      .expect(200);
    expect(oldest.body.data.map((item: { clientName: string }) => item.clientName)).toEqual([
      "Uma",
      "Vik",
    ]);
    expect(oldest.body.pageSize).toBe(20);

    const bad = await request(app)
      .get(`/api/v1/businesses/${businessId}/appointments`)
      .query({ status: "archived" })
      .expect(400);
    expect(bad.body).toEqual({
      error: "status must be a valid appointment status",
      code: "VALIDATION",
    });
  });

  it("edits staff and services", async () => {
    const { staffId, serviceId } = await seed();

    const service = await request(app)
      .patch(`/api/v1/services/${serviceId}`)
      .send({ priceCents: "3500", description: "Gel finish" })
      .expect(200);
    expect(service.body).toMatchObject({
      name: "Manicure",
      durationMin: 45,
      priceCents: 3500,
      description: "Gel finish",
    });

    const staff = await request(app)
      .patch(`/api/v1/staff/${staffId}`)
      .send({ isActive: false })
      .expect(200);
    expect(staff.body).toMatchObject({ name: "Tess", isActive: false });

    const slots = await request(app)
      .get(`/api/v1/staff/${staffId}/slots`)
      .query({ serviceId, date: DAY })
      .expect(404);
    expect(slots.body.error).toBe("staff member not found");
  });

  it("maps validation and lookup failures to status codes", async () => {
    const { businessId, staffId } = await seed();

    const past = await request(app)
      .post(`/api/v1/staff/${staffId}/schedules`)
      .send({ date: "2024-05-20", startTime: "09:00", endTime: "12:00" })
      .expect(400);
    expect(past.body.code).toBe("PAST_DATE");

    const overlap = await request(app)
      .post(`/api/v1/staff/${staffId}/schedules/bulk`)
      .send({ schedules: [{ date: DAY, startTime: "11:00", endTime: "14:00" }] })
      .expect(409);
    expect(overlap.body.code).toBe("SCHEDULE_OVERLAP");

    await request(app).get("/api/v1/appointments/unknown").expect(404);
    await request(app)
      .post(`/api/v1/businesses/${businessId}/services`)
      .send({ name: "Manicure", durationMin: 45 })
      .expect(409);
  });

  it("exposes schedules, agenda and business availability", async () => {
    const { businessId, staffId, serviceId } = await seed();

    const listed = await request(app)
      .get(`/api/v1/staff/${staffId}/schedules`)
      .query({ from: DAY })
      .expect(200);
    expect(listed.body).toHaveLength(1);

    const agenda = await request(app)
      .get(`/api/v1/staff/${staffId}/agenda`)
      .query({ from: DAY, to: DAY })
      .expect(200);
    expect(agenda.body.appointments).toEqual([]);

    const slots = await request(app)
      .get(`/api/v1/businesses/${businessId}/slots`)
      .query({ serviceId, date: DAY })
      .expect(200);
    expect(slots.body[0]).toMatchObject({ staffId, staffName: "Tess", startsAt: at("09:00") });

    await request(app).delete(`/api/v1/schedules/${listed.body[0].id}`).expect(200);
    await request(app).delete(`/api/v1/businesses/${businessId}`).expect(200);
    await request(app).get(`/api/v1/businesses/${businessId}`).expect(404);
  });
});
