import { describe, expect, it } from "vitest";
import {
  allowedTransitions,
  checkTransition,
  isActiveStatus,
  isTerminalStatus,
  parseAppointmentStatus,
} from "./statusMachine";

describe("statusMachine", () => {
  it("walks the happy path", () => {
    expect(checkTransition("PENDING", "CONFIRMED")).toBeNull();
    expect(checkTransition("CONFIRMED", "IN_PROGRESS")).toBeNull();
    expect(checkTransition("IN_PROGRESS", "COMPLETED")).toBeNull();
  });

  it("allows cancelling from every active status", () => {
    for (const status of ["PENDING", "CONFIRMED", "IN_PROGRESS"] as const) {
      expect(checkTransition(status, "CANCELLED")).toBeNull();
    }
  });

  it("rejects skipping steps and moving backwards", () => {
    expect(checkTransition("PENDING", "COMPLETED")?.code).toBe("INVALID_TRANSITION");
    expect(checkTransition("CONFIRMED", "PENDING")?.message).toBe(
      "Invalid status transition from CONFIRMED to PENDING",
    );
    expect(checkTransition("PENDING", "PENDING")?.code).toBe("INVALID_TRANSITION");
  });

  it("freezes terminal statuses", () => {
    const rejection = checkTransition("COMPLETED", "CONFIRMED");
    expect(rejection?.code).toBe("TERMINAL_STATE");
    expect(rejection?.message).toBe("Appointment is COMPLETED and can no longer change");
    expect(checkTransition("CANCELLED", "CANCELLED")?.code).toBe("TERMINAL_STATE");
    expect(isTerminalStatus("CANCELLED")).toBe(true);
    expect(allowedTransitions("COMPLETED")).toEqual([]);
  });

  it("knows which statuses hold time", () => {
    expect(isActiveStatus("IN_PROGRESS")).toBe(true);
    expect(isActiveStatus("CANCELLED")).toBe(false);
  });

  it("parses loose input", () => {
    expect(parseAppointmentStatus(" confirmed ")).toBe("CONFIRMED");
    expect(parseAppointmentStatus("done")).toBeNull();
    expect(parseAppointmentStatus(3)).toBeNull();
  });
});
