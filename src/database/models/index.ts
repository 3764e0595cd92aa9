export * from "./appointment.model";
export * from "./appointmentService.model";
export * from "./business.model";
export * from "./service.model";
export * from "./staffGuard.model";
export * from "./staffMember.model";
export * from "./workingSchedule.model";
