export type AppointmentStatus =
  | "PENDING"
  | "CONFIRMED"
  | "IN_PROGRESS"
  | "COMPLETED"
  | "CANCELLED";
export type PriceType = "fixed" | "variable";
export type ServiceColor = "blue" | "green" | "purple" | "red";

export const APPOINTMENT_STATUSES: readonly AppointmentStatus[] = [
  "PENDING",
  "CONFIRMED",
  "IN_PROGRESS",
  "COMPLETED",
  "CANCELLED",
];

// Statuses that occupy a staff member's time.
export const ACTIVE_STATUSES: readonly AppointmentStatus[] = [
  "PENDING",
  "CONFIRMED",
  "IN_PROGRESS",
];

export interface BaseEntity {
  id: string;
  createdAt: string;
  updatedAt: string;
}

export interface Business extends BaseEntity {
  name: string;
  address: string;
  phone: string;
  timezone: string;
}

export interface StaffMember extends BaseEntity {
  businessId: string;
  name: string;
  email?: string;
  isActive: boolean;
}

export interface Service extends BaseEntity {
  businessId: string;
  name: string;
  durationMin: number;
  priceCents: number;
  priceType: PriceType;
  color: ServiceColor;
  description?: string;
}

/**
 * One bookable window of a staff member on a calendar date. `date` is a
 * `YYYY-MM-DD` key and the times are `HH:mm`, all local to the business.
 */
export interface WorkingSchedule extends BaseEntity {
  businessId: string;
  staffId: string;
  date: string;
  startTime: string;
  endTime: string;
}

export interface Appointment extends BaseEntity {
  businessId: string;
  clientName: string;
  clientPhone: string;
  status: AppointmentStatus;
  notes?: string;
  cancellationReason?: string;
  cancelledAt?: string;
  totalPriceCents: number;
}

/**
 * A booked (service, staff, time range) unit of an appointment. Start, end
 * and price are frozen when the row is written; `staffId` becomes null when
 * the staff member is deleted.
 */
export interface AppointmentService extends BaseEntity {
  appointmentId: string;
  businessId: string;
  serviceId: string;
  staffId: string | null;
  startsAt: string;
  endsAt: string;
  priceCents: number;
}

export interface AppointmentView extends Appointment {
  services: AppointmentService[];
}

export interface AppState {
  businesses: Business[];
  staff: StaffMember[];
  services: Service[];
  workingSchedules: WorkingSchedule[];
  appointments: Appointment[];
  appointmentServices: AppointmentService[];
}
