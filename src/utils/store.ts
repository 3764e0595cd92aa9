import type {
  AppointmentFilter,
  AppointmentSortField,
  CatalogStore,
  LedgerTransaction,
  SchedulingStore,
} from "../scheduling/ports";
import { ACTIVE_STATUSES } from "./types";
import type {
  AppState,
  Appointment,
  AppointmentService,
  Service,
  WorkingSchedule,
} from "./types";
import { overlap, toMs } from "./core";
import { SchedulingRejection } from "./errors";

const baseState: AppState = {
  businesses: [],
  staff: [],
  services: [],
  workingSchedules: [],
  appointments: [],
  appointmentServices: [],
};

export function createState(): AppState {
  return structuredClone(baseState);
}

type SerialRunner = <T>(task: () => Promise<T>) => Promise<T>;

/** Runs tasks one at a time in arrival order. */
function createSerialRunner(): SerialRunner {
  let queue: Promise<void> = Promise.resolve();
  return <T>(task: () => Promise<T>): Promise<T> => {
    const run = queue.then(task);
    // The queue only orders tasks; each caller observes its own outcome through `run`.
    queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  };
}

function byStartTime(a: WorkingSchedule, b: WorkingSchedule): number {
  return a.startTime.localeCompare(b.startTime);
}

function byStartsAt(a: AppointmentService, b: AppointmentService): number {
  return toMs(a.startsAt) - toMs(b.startsAt);
}

function replaceById<T extends { id: string }>(rows: T[], next: T): void {
  const index = rows.findIndex((row) => row.id === next.id);
  if (index === -1) {
    throw new Error(`Cannot update missing record ${next.id}`);
  }
  rows[index] = structuredClone(next);
}

function removeWhere<T>(rows: T[], predicate: (row: T) => boolean): void {
  for (let i = rows.length - 1; i >= 0; i -= 1) {
    if (predicate(rows[i])) {
      rows.splice(i, 1);
    }
  }
}

function compareBy(a: Appointment, b: Appointment, field: AppointmentSortField): number {
  if (field === "totalPriceCents") {
    return a.totalPriceCents - b.totalPriceCents;
  }
  const left = a[field];
  const right = b[field];
  return left < right ? -1 : left > right ? 1 : 0;
}

function filterAppointments(state: AppState, filter: AppointmentFilter): Appointment[] {
  const term = filter.search?.trim().toLowerCase();
  const from = filter.startsFrom === undefined ? Number.NEGATIVE_INFINITY : toMs(filter.startsFrom);
  const before =
    filter.startsBefore === undefined ? Number.POSITIVE_INFINITY : toMs(filter.startsBefore);
  const byRows =
    filter.staffId !== undefined ||
    filter.startsFrom !== undefined ||
    filter.startsBefore !== undefined;
  const rowMatches = new Set(
    state.appointmentServices
      .filter((row) => {
        const startsAt = toMs(row.startsAt);
        return (
          row.businessId === filter.businessId &&
          (filter.staffId === undefined || row.staffId === filter.staffId) &&
          startsAt >= from &&
          startsAt < before
        );
      })
      .map((row) => row.appointmentId),
  );

  const { field, direction } = filter.sort;
  return state.appointments
    .filter(
      (item) =>
        item.businessId === filter.businessId &&
        (!filter.status || item.status === filter.status) &&
        (!byRows || rowMatches.has(item.id)) &&
        (!term ||
          item.clientName.toLowerCase().includes(term) ||
          item.clientPhone.toLowerCase().includes(term)),
    )
    .sort((a, b) => direction * compareBy(a, b, field) || a.id.localeCompare(b.id));
}

function createLedgerView(state: AppState): LedgerTransaction {
  const isActive = (appointmentId: string): boolean => {
    const appointment = state.appointments.find((item) => item.id === appointmentId);
    return !!appointment && ACTIVE_STATUSES.includes(appointment.status);
  };

  return {
    async findFor(staffId, date) {
      return structuredClone(
        state.workingSchedules
          .filter((row) => row.staffId === staffId && row.date === date)
          .sort(byStartTime),
      );
    },

    async listForStaff(staffId, fromDate, toDate) {
      return structuredClone(
        state.workingSchedules
          .filter((row) => row.staffId === staffId && row.date >= fromDate && row.date <= toDate)
          .sort((a, b) => a.date.localeCompare(b.date) || byStartTime(a, b)),
      );
    },

    async findScheduleById(id) {
      const row = state.workingSchedules.find((item) => item.id === id);
      return row ? structuredClone(row) : undefined;
    },

    async findActiveOverlapping(staffId, startsAt, endsAt, excludeServiceIds = []) {
      return structuredClone(
        state.appointmentServices
          .filter(
            (row) =>
              row.staffId === staffId &&
              !excludeServiceIds.includes(row.id) &&
              overlap(row.startsAt, row.endsAt, startsAt, endsAt) &&
              isActive(row.appointmentId),
          )
          .sort(byStartsAt),
      );
    },

    async findAppointment(id) {
      const appointment = state.appointments.find((item) => item.id === id);
      return appointment ? structuredClone(appointment) : undefined;
    },

    async listAppointmentServices(appointmentId) {
      return structuredClone(
        state.appointmentServices
          .filter((row) => row.appointmentId === appointmentId)
          .sort(byStartsAt),
      );
    },

    async listStaffServices(staffId, fromIso, toIso) {
      const from = toMs(fromIso);
      const to = toMs(toIso);
      return structuredClone(
        state.appointmentServices
          .filter((row) => {
            const startsAt = toMs(row.startsAt);
            return row.staffId === staffId && startsAt >= from && startsAt < to;
          })
          .sort(byStartsAt),
      );
    },

    async insertAppointment(appointment: Appointment) {
      state.appointments.push(structuredClone(appointment));
    },

    async updateAppointment(appointment) {
      replaceById(state.appointments, appointment);
    },

    async insertAppointmentServices(rows) {
      state.appointmentServices.push(...structuredClone(rows));
    },

    async updateAppointmentService(row) {
      replaceById(state.appointmentServices, row);
    },

    async deleteAppointmentServices(appointmentId) {
      removeWhere(state.appointmentServices, (row) => row.appointmentId === appointmentId);
    },

    async insertSchedules(rows) {
      state.workingSchedules.push(...structuredClone(rows));
    },

    async deleteSchedule(id) {
      removeWhere(state.workingSchedules, (row) => row.id === id);
    },
  };
}

/**
 * Scheduling store over process memory. Transactions run one at a time in
 * arrival order; a transaction that throws restores the snapshot taken when
 * it started.
 */
function createMemorySchedulingStore(state: AppState, serial: SerialRunner): SchedulingStore {
  const view = createLedgerView(state);

  async function runIsolated<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
    const snapshot = {
      workingSchedules: structuredClone(state.workingSchedules),
      appointments: structuredClone(state.appointments),
      appointmentServices: structuredClone(state.appointmentServices),
    };
    try {
      return await work(view);
    } catch (error) {
      state.workingSchedules = snapshot.workingSchedules;
      state.appointments = snapshot.appointments;
      state.appointmentServices = snapshot.appointmentServices;
      throw error;
    }
  }

  return {
    kind: "memory",
    async listAppointments(filter) {
      const matches = filterAppointments(state, filter);
      return {
        items: structuredClone(matches.slice(filter.offset, filter.offset + filter.limit)),
        total: matches.length,
      };
    },
    findFor: (staffId, date) => view.findFor(staffId, date),
    listForStaff: (staffId, fromDate, toDate) => view.listForStaff(staffId, fromDate, toDate),
    findScheduleById: (id) => view.findScheduleById(id),
    findActiveOverlapping: (staffId, startsAt, endsAt, excludeServiceIds) =>
      view.findActiveOverlapping(staffId, startsAt, endsAt, excludeServiceIds),
    findAppointment: (id) => view.findAppointment(id),
    listAppointmentServices: (appointmentId) => view.listAppointmentServices(appointmentId),
    listStaffServices: (staffId, fromIso, toIso) =>
      view.listStaffServices(staffId, fromIso, toIso),

    transaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
      return serial(() => runIsolated(work));
    },
  };
}

function assertUniqueServiceName(state: AppState, service: Service): void {
  const key = service.name.trim().toLowerCase();
  const taken = state.services.some(
    (item) =>
      item.id !== service.id &&
      item.businessId === service.businessId &&
      item.name.trim().toLowerCase() === key,
  );
  if (taken) {
    throw new SchedulingRejection("DUPLICATE", `Service "${service.name}" already exists`);
  }
}

function createMemoryCatalogStore(state: AppState, serial: SerialRunner): CatalogStore {
  return {
    async findBusiness(id) {
      const business = state.businesses.find((item) => item.id === id);
      return business ? structuredClone(business) : undefined;
    },

    async insertBusiness(business) {
      state.businesses.push(structuredClone(business));
    },

    async updateBusiness(business) {
      replaceById(state.businesses, business);
    },

    deleteBusiness: (id) =>
      serial(async () => {
        const appointmentIds = new Set(
          state.appointments.filter((item) => item.businessId === id).map((item) => item.id),
        );
        removeWhere(state.appointmentServices, (row) => appointmentIds.has(row.appointmentId));
        removeWhere(state.appointments, (item) => item.businessId === id);
        removeWhere(state.workingSchedules, (row) => row.businessId === id);
        removeWhere(state.services, (item) => item.businessId === id);
        removeWhere(state.staff, (item) => item.businessId === id);
        removeWhere(state.businesses, (item) => item.id === id);
      }),

    async findStaff(id) {
      const staff = state.staff.find((item) => item.id === id);
      return staff ? structuredClone(staff) : undefined;
    },

    async listStaff(businessId) {
      return structuredClone(
        state.staff
          .filter((item) => item.businessId === businessId)
          .sort((a, b) => a.name.localeCompare(b.name)),
      );
    },

    async insertStaff(staff) {
      state.staff.push(structuredClone(staff));
    },

    async updateStaff(staff) {
      replaceById(state.staff, staff);
    },

    deleteStaff: (id) =>
      serial(async () => {
        for (const row of state.appointmentServices) {
          if (row.staffId === id) {
            row.staffId = null;
          }
        }
        removeWhere(state.workingSchedules, (row) => row.staffId === id);
        removeWhere(state.staff, (item) => item.id === id);
      }),

    async findService(id) {
      const service = state.services.find((item) => item.id === id);
      return service ? structuredClone(service) : undefined;
    },

    async findServiceByName(businessId, name) {
      const key = name.trim().toLowerCase();
      const service = state.services.find(
        (item) => item.businessId === businessId && item.name.trim().toLowerCase() === key,
      );
      return service ? structuredClone(service) : undefined;
    },

    async listServices(businessId) {
      return structuredClone(
        state.services
          .filter((item) => item.businessId === businessId)
          .sort((a, b) => a.name.localeCompare(b.name)),
      );
    },

    async insertService(service) {
      assertUniqueServiceName(state, service);
      state.services.push(structuredClone(service));
    },

    async updateService(service) {
      assertUniqueServiceName(state, service);
      replaceById(state.services, service);
    },
  };
}

export interface MemoryStores {
  state: AppState;
  catalog: CatalogStore;
  scheduling: SchedulingStore;
}

/** The in-memory mode: catalog and scheduling stores over one shared state. */
export function createMemoryStores(state: AppState = createState()): MemoryStores {
  const serial = createSerialRunner();
  return {
    state,
    catalog: createMemoryCatalogStore(state, serial),
    scheduling: createMemorySchedulingStore(state, serial),
  };
}
