import type { Logger } from "pino";
import type { Clock } from "../utils/clock";
import { nowIso } from "../utils/clock";
import {
  addDaysToDateKey,
  addMinutes,
  createId,
  dateAtTimeInTimeZoneIso,
  diffMinutes,
  isValidDateKey,
  normalizeInstant,
  toMs,
} from "../utils/core";
import { SchedulingRejection, runOperation } from "../utils/errors";
import type { Result } from "../utils/errors";
import type {
  Appointment,
  AppointmentService,
  AppointmentStatus,
  AppointmentView,
  Business,
} from "../utils/types";
import { validateSlot } from "./conflictValidator";
import type {
  AppointmentFilter,
  AppointmentSortField,
  CatalogStore,
  LedgerTransaction,
  SchedulingStore,
} from "./ports";
import { checkServiceSet } from "./servicePolicy";
import type { PlannedService, ServiceSetPolicy } from "./servicePolicy";
import { checkTransition, isTerminalStatus } from "./statusMachine";

export type BookingEventType =
  | "appointment.created"
  | "appointment.rescheduled"
  | "appointment.status_changed"
  | "appointment.cancelled"
  | "appointment.services_replaced";

export interface BookingEvent {
  type: BookingEventType;
  appointmentId: string;
  businessId: string;
  actor?: string;
  occurredAt: string;
  payload: Record<string, unknown>;
}

export type BookingEventHook = (event: BookingEvent) => void | Promise<void>;

export interface BookingOrchestratorDependencies {
  catalog: CatalogStore;
  store: SchedulingStore;
  clock: Clock;
  logger: Logger;
  policy?: ServiceSetPolicy;
  /** Called after commit. Its failures are logged and never undo the booking. */
  onEvent?: BookingEventHook;
}

export interface ServiceRequest {
  serviceId: string;
  staffId: string;
  startsAt: string;
}

export interface ClientDetails {
  clientName: string;
  clientPhone: string;
  notes?: string;
  actor?: string;
}

export interface CreateAppointmentInput extends ClientDetails, ServiceRequest {
  businessId: string;
}

export interface CreateMultiServiceAppointmentInput extends ClientDetails {
  businessId: string;
  services: ServiceRequest[];
}

export interface ChangeOptions {
  reason?: string;
  actor?: string;
}

export interface AppointmentListQuery {
  status?: AppointmentStatus;
  staffId?: string;
  /** Business-local date keys, both inclusive, matched against service starts. */
  from?: string;
  to?: string;
  search?: string;
  /** A sort field, `-` prefixed for descending. Defaults to `-createdAt`. */
  ordering?: string;
  page: number;
  pageSize: number;
}

export interface AppointmentListPage {
  page: number;
  pageSize: number;
  total: number;
  data: AppointmentView[];
}

export interface BookingOrchestrator {
  createAppointment(input: CreateAppointmentInput): Promise<Result<AppointmentView>>;
  createMultiServiceAppointment(
    input: CreateMultiServiceAppointmentInput,
  ): Promise<Result<AppointmentView>>;
  getAppointment(appointmentId: string): Promise<Result<AppointmentView>>;
  listAppointments(
    businessId: string,
    query: AppointmentListQuery,
  ): Promise<Result<AppointmentListPage>>;
  rescheduleAppointment(
    appointmentId: string,
    newStartsAt: string,
    options?: ChangeOptions,
  ): Promise<Result<AppointmentView>>;
  changeAppointmentStatus(
    appointmentId: string,
    status: AppointmentStatus,
    actor?: string,
  ): Promise<Result<AppointmentView>>;
  cancelAppointment(appointmentId: string, options?: ChangeOptions): Promise<Result<AppointmentView>>;
  replaceAppointmentServices(
    appointmentId: string,
    services: ServiceRequest[],
    actor?: string,
  ): Promise<Result<AppointmentView>>;
}

const CLIENT_NAME_MAX = 100;
const CLIENT_PHONE_MAX = 20;
const SORT_FIELDS: readonly AppointmentSortField[] = ["createdAt", "status", "totalPriceCents"];

function parseOrdering(ordering: string | undefined): AppointmentFilter["sort"] {
  const text = ordering?.trim() || "-createdAt";
  const direction = text.startsWith("-") ? -1 : 1;
  const name = direction === -1 ? text.slice(1) : text;
  const field = SORT_FIELDS.find((item) => item === name);
  if (!field) {
    throw new SchedulingRejection(
      "VALIDATION",
      `ordering must be one of: ${SORT_FIELDS.join(", ")}, optionally prefixed with -`,
    );
  }
  return { field, direction };
}

function toStartsRange(
  from: string | undefined,
  to: string | undefined,
  timeZone: string,
): Pick<AppointmentFilter, "startsFrom" | "startsBefore"> {
  if (from !== undefined && !isValidDateKey(from)) {
    throw new SchedulingRejection("VALIDATION", "from must use YYYY-MM-DD");
  }
  if (to !== undefined && !isValidDateKey(to)) {
    throw new SchedulingRejection("VALIDATION", "to must use YYYY-MM-DD");
  }
  if (from !== undefined && to !== undefined && from > to) {
    throw new SchedulingRejection("INVALID_RANGE", "from must not be after to");
  }
  return {
    startsFrom: from === undefined ? undefined : dateAtTimeInTimeZoneIso(from, "00:00", timeZone),
    startsBefore:
      to === undefined
        ? undefined
        : dateAtTimeInTimeZoneIso(addDaysToDateKey(to, 1), "00:00", timeZone),
  };
}

export function sumPrices(rows: readonly AppointmentService[]): number {
  return rows.reduce((total, row) => total + row.priceCents, 0);
}

function toView(appointment: Appointment, services: AppointmentService[]): AppointmentView {
  return { ...appointment, services };
}

function requireInstant(value: string, field: string): string {
  const instant = normalizeInstant(value);
  if (!instant) {
    throw new SchedulingRejection("VALIDATION", `${field} must be an ISO date-time with Z or a UTC offset`);
  }
  return instant;
}

function normalizeClient(input: ClientDetails): { clientName: string; clientPhone: string } {
  const clientName = input.clientName.trim() || "Anonymous";
  const clientPhone = input.clientPhone.trim();
  if (clientName.length > CLIENT_NAME_MAX) {
    throw new SchedulingRejection(
      "VALIDATION",
      `Name is too long (max ${CLIENT_NAME_MAX} characters)`,
    );
  }
  if (clientPhone.length > CLIENT_PHONE_MAX) {
    throw new SchedulingRejection(
      "VALIDATION",
      `Phone is too long (max ${CLIENT_PHONE_MAX} characters)`,
    );
  }
  return { clientName, clientPhone };
}

async function requireAppointment(
  tx: LedgerTransaction,
  appointmentId: string,
): Promise<Appointment> {
  const appointment = await tx.findAppointment(appointmentId);
  if (!appointment) {
    throw new SchedulingRejection("NOT_FOUND", "appointment not found");
  }
  return appointment;
}

export function createBookingOrchestrator(
  deps: BookingOrchestratorDependencies,
): BookingOrchestrator {
  const { catalog, store, clock, logger } = deps;
  const policy = deps.policy ?? {};

  function publish(event: Omit<BookingEvent, "occurredAt">): void {
    const hook = deps.onEvent;
    if (!hook) {
      return;
    }
    const fullEvent: BookingEvent = { ...event, occurredAt: nowIso(clock) };
    void Promise.resolve()
      .then(() => hook(fullEvent))
      .catch((error: unknown) => {
        logger.warn(
          { err: error, event: fullEvent.type, appointmentId: fullEvent.appointmentId },
          "booking event hook failed",
        );
      });
  }

  async function requireBusiness(businessId: string): Promise<Business> {
    const business = await catalog.findBusiness(businessId);
    if (!business) {
      throw new SchedulingRejection("NOT_FOUND", "business not found");
    }
    return business;
  }

  /** Builds the rows for a service set, with end and price taken from the catalog. */
  async function planServices(
    business: Business,
    appointmentId: string,
    requests: readonly ServiceRequest[],
  ): Promise<AppointmentService[]> {
    const now = nowIso(clock);
    const rows: AppointmentService[] = [];
    const planned: PlannedService[] = [];

    for (const request of requests) {
      const startsAt = requireInstant(request.startsAt, "startsAt");
      const service = await catalog.findService(request.serviceId);
      if (!service || service.businessId !== business.id) {
        throw new SchedulingRejection("NOT_FOUND", "service not found");
      }
      const staff = await catalog.findStaff(request.staffId);
      if (!staff || staff.businessId !== business.id || !staff.isActive) {
        throw new SchedulingRejection("NOT_FOUND", "staff member not found");
      }
      rows.push({
        id: createId(),
        appointmentId,
        businessId: business.id,
        serviceId: service.id,
        staffId: staff.id,
        startsAt,
        endsAt: addMinutes(startsAt, service.durationMin),
        priceCents: service.priceCents,
        createdAt: now,
        updatedAt: now,
      });
      planned.push({ staffId: staff.id, startsAt, endsAt: addMinutes(startsAt, service.durationMin) });
    }

    const setRejection = checkServiceSet(planned, policy);
    if (setRejection) {
      throw setRejection;
    }
    return rows.sort((a, b) => toMs(a.startsAt) - toMs(b.startsAt));
  }

  /** Runs the conflict validator for every row; the first rejection aborts the transaction. */
  async function admitAll(
    tx: LedgerTransaction,
    rows: readonly AppointmentService[],
    timeZone: string,
    excludeServiceIds: readonly string[],
  ): Promise<void> {
    for (const row of rows) {
      if (!row.staffId) {
        throw new SchedulingRejection("NOT_FOUND", "staff member no longer exists");
      }
      const rejection = await validateSlot(tx, clock, {
        staffId: row.staffId,
        timeZone,
        startsAt: row.startsAt,
        endsAt: row.endsAt,
        excludeServiceIds,
      });
      if (rejection) {
        throw rejection;
      }
    }
  }

  async function createWithServices(
    input: CreateMultiServiceAppointmentInput,
  ): Promise<AppointmentView> {
    const business = await requireBusiness(input.businessId);
    const client = normalizeClient(input);
    const appointmentId = createId();
    const rows = await planServices(business, appointmentId, input.services);

    const view = await store.transaction(async (tx) => {
      await admitAll(tx, rows, business.timezone, []);
      const now = nowIso(clock);
      const appointment: Appointment = {
        id: appointmentId,
        businessId: business.id,
        clientName: client.clientName,
        clientPhone: client.clientPhone,
        status: "PENDING",
        notes: input.notes?.trim() || undefined,
        totalPriceCents: sumPrices(rows),
        createdAt: now,
        updatedAt: now,
      };
      await tx.insertAppointment(appointment);
      await tx.insertAppointmentServices(rows);
      return toView(appointment, rows);
    });

    logger.info(
      { appointmentId: view.id, businessId: view.businessId, services: rows.length },
      "appointment created",
    );
    publish({
      type: "appointment.created",
      appointmentId: view.id,
      businessId: view.businessId,
      actor: input.actor,
      payload: {
        clientName: view.clientName,
        startsAt: rows[0]?.startsAt,
        serviceIds: rows.map((row) => row.serviceId),
      },
    });
    return view;
  }

  async function transition(
    appointmentId: string,
    target: AppointmentStatus,
    options: ChangeOptions,
  ): Promise<{ view: AppointmentView; from: AppointmentStatus }> {
    return store.transaction(async (tx) => {
      const appointment = await requireAppointment(tx, appointmentId);
      const rejection = checkTransition(appointment.status, target);
      if (rejection) {
        throw rejection;
      }
      const now = nowIso(clock);
      const next: Appointment = { ...appointment, status: target, updatedAt: now };
      if (target === "CANCELLED") {
        next.cancelledAt = now;
        next.cancellationReason = options.reason?.trim() || undefined;
      }
      await tx.updateAppointment(next);
      const services = await tx.listAppointmentServices(appointmentId);
      return { view: toView(next, services), from: appointment.status };
    });
  }

  return {
    createAppointment(input) {
      return runOperation(logger, "createAppointment", () =>
        createWithServices({
          ...input,
          services: [{ serviceId: input.serviceId, staffId: input.staffId, startsAt: input.startsAt }],
        }),
      );
    },

    createMultiServiceAppointment(input) {
      return runOperation(logger, "createMultiServiceAppointment", () =>
        createWithServices(input),
      );
    },

    getAppointment(appointmentId) {
      return runOperation(logger, "getAppointment", async () => {
        const appointment = await store.findAppointment(appointmentId);
        if (!appointment) {
          throw new SchedulingRejection("NOT_FOUND", "appointment not found");
        }
        return toView(appointment, await store.listAppointmentServices(appointmentId));
      });
    },

    listAppointments(businessId, query) {
      return runOperation(logger, "listAppointments", async () => {
        if (!Number.isInteger(query.page) || query.page < 1) {
          throw new SchedulingRejection("VALIDATION", "page must be a positive integer");
        }
        if (!Number.isInteger(query.pageSize) || query.pageSize < 1) {
          throw new SchedulingRejection("VALIDATION", "pageSize must be a positive integer");
        }
        const business = await requireBusiness(businessId);
        const sort = parseOrdering(query.ordering);
        const found = await store.listAppointments({
          businessId: business.id,
          status: query.status,
          staffId: query.staffId,
          ...toStartsRange(query.from, query.to, business.timezone),
          search: query.search,
          sort,
          offset: (query.page - 1) * query.pageSize,
          limit: query.pageSize,
        });
        const data: AppointmentView[] = [];
        for (const appointment of found.items) {
          data.push(toView(appointment, await store.listAppointmentServices(appointment.id)));
        }
        return { page: query.page, pageSize: query.pageSize, total: found.total, data };
      });
    },

    rescheduleAppointment(appointmentId, newStartsAt, options = {}) {
      return runOperation(logger, "rescheduleAppointment", async () => {
        const startsAt = requireInstant(newStartsAt, "startsAt");

        const { view, previousStartsAt } = await store.transaction(async (tx) => {
          const appointment = await requireAppointment(tx, appointmentId);
          if (isTerminalStatus(appointment.status)) {
            throw new SchedulingRejection(
              "TERMINAL_STATE",
              `Cannot reschedule a ${appointment.status} appointment`,
            );
          }
          const business = await requireBusiness(appointment.businessId);
          const current = await tx.listAppointmentServices(appointmentId);
          if (!current.length) {
            throw new SchedulingRejection("VALIDATION", "Appointment has no services to move");
          }

          // One shift for every row keeps the offsets between services intact.
          const shiftMin = diffMinutes(startsAt, current[0].startsAt);
          const now = nowIso(clock);
          const moved = current.map((row) => ({
            ...row,
            startsAt: addMinutes(row.startsAt, shiftMin),
            endsAt: addMinutes(row.endsAt, shiftMin),
            updatedAt: now,
          }));

          await admitAll(
            tx,
            moved,
            business.timezone,
            current.map((row) => row.id),
          );
          for (const row of moved) {
            await tx.updateAppointmentService(row);
          }
          const next: Appointment = { ...appointment, updatedAt: now };
          await tx.updateAppointment(next);
          return { view: toView(next, moved), previousStartsAt: current[0].startsAt };
        });

        publish({
          type: "appointment.rescheduled",
          appointmentId,
          businessId: view.businessId,
          actor: options.actor,
          payload: { from: previousStartsAt, to: startsAt, reason: options.reason },
        });
        return view;
      });
    },

    changeAppointmentStatus(appointmentId, status, actor) {
      return runOperation(logger, "changeAppointmentStatus", async () => {
        const { view, from } = await transition(appointmentId, status, { actor });
        publish({
          type: status === "CANCELLED" ? "appointment.cancelled" : "appointment.status_changed",
          appointmentId,
          businessId: view.businessId,
          actor,
          payload: { from, to: status },
        });
        return view;
      });
    },

    cancelAppointment(appointmentId, options = {}) {
      return runOperation(logger, "cancelAppointment", async () => {
        const { view, from } = await transition(appointmentId, "CANCELLED", options);
        publish({
          type: "appointment.cancelled",
          appointmentId,
          businessId: view.businessId,
          actor: options.actor,
          payload: { from, reason: view.cancellationReason },
        });
        return view;
      });
    },

    replaceAppointmentServices(appointmentId, services, actor) {
      return runOperation(logger, "replaceAppointmentServices", async () => {
        const existing = await store.findAppointment(appointmentId);
        if (!existing) {
          throw new SchedulingRejection("NOT_FOUND", "appointment not found");
        }
        const business = await requireBusiness(existing.businessId);
        const rows = await planServices(business, appointmentId, services);

        const view = await store.transaction(async (tx) => {
          const appointment = await requireAppointment(tx, appointmentId);
          if (isTerminalStatus(appointment.status)) {
            throw new SchedulingRejection(
              "TERMINAL_STATE",
              `Cannot change services of a ${appointment.status} appointment`,
            );
          }
          const previous = await tx.listAppointmentServices(appointmentId);
          await admitAll(
            tx,
            rows,
            business.timezone,
            previous.map((row) => row.id),
          );
          await tx.deleteAppointmentServices(appointmentId);
          await tx.insertAppointmentServices(rows);
          const next: Appointment = {
            ...appointment,
            totalPriceCents: sumPrices(rows),
            updatedAt: nowIso(clock),
          };
          await tx.updateAppointment(next);
          return toView(next, rows);
        });

        publish({
          type: "appointment.services_replaced",
          appointmentId,
          businessId: view.businessId,
          actor,
          payload: { serviceIds: rows.map((row) => row.serviceId), totalPriceCents: view.totalPriceCents },
        });
        return view;
      });
    },
  };
}
