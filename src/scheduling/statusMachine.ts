import { SchedulingRejection } from "../utils/errors";
import { ACTIVE_STATUSES, APPOINTMENT_STATUSES } from "../utils/types";
import type { AppointmentStatus } from "../utils/types";

const transitions: Record<AppointmentStatus, AppointmentStatus[]> = {
  PENDING: ["CONFIRMED", "CANCELLED"],
  CONFIRMED: ["IN_PROGRESS", "CANCELLED"],
  IN_PROGRESS: ["COMPLETED", "CANCELLED"],
  COMPLETED: [],
  CANCELLED: [],
};

export function parseAppointmentStatus(value: unknown): AppointmentStatus | null {
  if (typeof value !== "string") {
    return null;
  }
  const normalized = value.trim().toUpperCase();
  return APPOINTMENT_STATUSES.find((status) => status === normalized) ?? null;
}

export function isActiveStatus(status: AppointmentStatus): boolean {
  return ACTIVE_STATUSES.includes(status);
}

export function isTerminalStatus(status: AppointmentStatus): boolean {
  return transitions[status].length === 0;
}

export function allowedTransitions(status: AppointmentStatus): readonly AppointmentStatus[] {
  return transitions[status];
}

/** Null when `from → to` is a legal move, otherwise the rejection to raise. */
export function checkTransition(
  from: AppointmentStatus,
  to: AppointmentStatus,
): SchedulingRejection | null {
  if (isTerminalStatus(from)) {
    return new SchedulingRejection(
      "TERMINAL_STATE",
      `Appointment is ${from} and can no longer change`,
    );
  }
  if (!transitions[from].includes(to)) {
    return new SchedulingRejection(
      "INVALID_TRANSITION",
      `Invalid status transition from ${from} to ${to}`,
    );
  }
  return null;
}
