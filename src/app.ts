import express from "express";
import type { Express, NextFunction, Request, Response } from "express";
import cors from "cors";
import type { Logger } from "pino";
import { createApiRouter } from "./routes";
import { createHealthRoutes } from "./routes/healthRoutes";
import { createBookingOrchestrator } from "./scheduling/bookingOrchestrator";
import type { BookingEventHook, BookingOrchestrator } from "./scheduling/bookingOrchestrator";
import { createCatalogManager } from "./scheduling/catalog";
import type { CatalogManager } from "./scheduling/catalog";
import type { CatalogStore, SchedulingStore } from "./scheduling/ports";
import { createScheduleManager } from "./scheduling/schedules";
import type { ScheduleManager } from "./scheduling/schedules";
import { createAvailabilityService } from "./scheduling/slotGenerator";
import type { AvailabilityService } from "./scheduling/slotGenerator";
import { systemClock } from "./utils/clock";
import type { Clock } from "./utils/clock";
import type { AppConfig } from "./utils/config";
import { getLogger } from "./utils/logger";

export interface AppServices {
  catalog: CatalogManager;
  schedules: ScheduleManager;
  availability: AvailabilityService;
  bookings: BookingOrchestrator;
  storageKind: SchedulingStore["kind"];
  clock: Clock;
  logger: Logger;
}

export interface ServiceWiring {
  stores: { catalog: CatalogStore; scheduling: SchedulingStore };
  config: AppConfig;
  clock?: Clock;
  logger?: Logger;
  onEvent?: BookingEventHook;
}

export function createServices(wiring: ServiceWiring): AppServices {
  const clock = wiring.clock ?? systemClock;
  const logger = wiring.logger ?? getLogger();
  const { catalog, scheduling } = wiring.stores;

  return {
    catalog: createCatalogManager({
      catalog,
      clock,
      logger,
      defaultTimeZone: wiring.config.defaultTimeZone,
    }),
    schedules: createScheduleManager({ catalog, store: scheduling, clock, logger }),
    availability: createAvailabilityService({ catalog, reader: scheduling, clock, logger }),
    bookings: createBookingOrchestrator({
      catalog,
      store: scheduling,
      clock,
      logger,
      policy: { maxServiceGapMin: wiring.config.maxServiceGapMin },
      onEvent: wiring.onEvent,
    }),
    storageKind: scheduling.kind,
    clock,
    logger,
  };
}

export function createApp(services: AppServices): Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: "1mb" }));
  app.use("/", createHealthRoutes(services));
  app.use("/api/v1", createApiRouter(services));

  app.use((_req, res) => {
    res.status(404).json({ error: "Route not found" });
  });

  // Express recognises error handlers by their four parameters.
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: "Malformed JSON body", code: "VALIDATION" });
      return;
    }
    services.logger.error({ err: error, method: req.method, path: req.path }, "request failed");
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
