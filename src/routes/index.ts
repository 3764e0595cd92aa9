import { Router } from "express";
import type { AppServices } from "../app";
import { createAppointmentRoutes } from "./appointmentRoutes";
import { createBusinessRoutes } from "./businessRoutes";
import { createScheduleRoutes } from "./scheduleRoutes";

export function createApiRouter(services: AppServices): Router {
  const router = Router();

  router.use("/", createBusinessRoutes(services));
  router.use("/", createScheduleRoutes(services));
  router.use("/", createAppointmentRoutes(services));

  return router;
}
