import type {
  Appointment,
  AppointmentService,
  AppointmentStatus,
  Business,
  Service,
  StaffMember,
  WorkingSchedule,
} from "../utils/types";

export interface WorkingScheduleStore {
  /** Working rows of a staff member on a business-local date, ordered by start time. */
  findFor(staffId: string, date: string): Promise<WorkingSchedule[]>;
  listForStaff(staffId: string, fromDate: string, toDate: string): Promise<WorkingSchedule[]>;
  findScheduleById(id: string): Promise<WorkingSchedule | undefined>;
}

export interface BookingLedgerReader {
  /**
   * Appointment services of the staff member whose parent appointment is
   * active and whose range overlaps [startsAt, endsAt).
   */
  findActiveOverlapping(
    staffId: string,
    startsAt: string,
    endsAt: string,
    excludeServiceIds?: readonly string[],
  ): Promise<AppointmentService[]>;
  findAppointment(id: string): Promise<Appointment | undefined>;
  /** Rows of an appointment, ordered by start. */
  listAppointmentServices(appointmentId: string): Promise<AppointmentService[]>;
  /** Rows of a staff member starting in [fromIso, toIso), any status, ordered by start. */
  listStaffServices(staffId: string, fromIso: string, toIso: string): Promise<AppointmentService[]>;
}

export type SchedulingReader = Pick<WorkingScheduleStore, "findFor"> &
  Pick<BookingLedgerReader, "findActiveOverlapping">;

export interface LedgerTransaction extends WorkingScheduleStore, BookingLedgerReader {
  insertAppointment(appointment: Appointment): Promise<void>;
  updateAppointment(appointment: Appointment): Promise<void>;
  insertAppointmentServices(rows: AppointmentService[]): Promise<void>;
  updateAppointmentService(row: AppointmentService): Promise<void>;
  deleteAppointmentServices(appointmentId: string): Promise<void>;
  insertSchedules(rows: WorkingSchedule[]): Promise<void>;
  deleteSchedule(id: string): Promise<void>;
}

export type AppointmentSortField = "createdAt" | "status" | "totalPriceCents";

export interface AppointmentFilter {
  businessId: string;
  status?: AppointmentStatus;
  /** Appointments with at least one row for this staff member. */
  staffId?: string;
  /** Appointments with at least one row starting in [startsFrom, startsBefore). */
  startsFrom?: string;
  startsBefore?: string;
  /** Case-insensitive substring of the client name or phone. */
  search?: string;
  sort: { field: AppointmentSortField; direction: 1 | -1 };
  offset: number;
  limit: number;
}

export interface AppointmentPage {
  items: Appointment[];
  total: number;
}

/**
 * Working schedules and the booking ledger behind one transaction boundary.
 * Work passed to `transaction` sees a consistent view and either commits as a
 * whole or, when it throws, leaves no trace.
 */
export interface SchedulingStore extends WorkingScheduleStore, BookingLedgerReader {
  readonly kind: "memory" | "mongodb";
  /** Matching appointments, sorted with ties broken by id, and their total count. */
  listAppointments(filter: AppointmentFilter): Promise<AppointmentPage>;
  transaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T>;
}

export interface CatalogStore {
  findBusiness(id: string): Promise<Business | undefined>;
  insertBusiness(business: Business): Promise<void>;
  updateBusiness(business: Business): Promise<void>;
  /** Removes the business with its staff, services, schedules and appointments. */
  deleteBusiness(id: string): Promise<void>;

  findStaff(id: string): Promise<StaffMember | undefined>;
  listStaff(businessId: string): Promise<StaffMember[]>;
  insertStaff(staff: StaffMember): Promise<void>;
  updateStaff(staff: StaffMember): Promise<void>;
  /** Removes the staff member and their schedules; their booked rows keep a null staff. */
  deleteStaff(id: string): Promise<void>;

  findService(id: string): Promise<Service | undefined>;
  findServiceByName(businessId: string, name: string): Promise<Service | undefined>;
  listServices(businessId: string): Promise<Service[]>;
  insertService(service: Service): Promise<void>;
  updateService(service: Service): Promise<void>;
}
