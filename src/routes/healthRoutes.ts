import { Router } from "express";
import type { AppServices } from "../app";
import { nowIso } from "../utils/clock";

export function createHealthRoutes(services: AppServices): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json({
      name: "Slotkeeper Scheduling API",
      version: "0.1.0",
      basePath: "/api/v1",
    });
  });

  router.get("/health/live", (_req, res) => {
    res.json({ status: "ok", timestamp: nowIso(services.clock) });
  });

  router.get("/health/ready", (_req, res) => {
    res.json({
      status: "ready",
      timestamp: nowIso(services.clock),
      storage: services.storageKind,
    });
  });

  return router;
}
