import { Router } from "express";
import type { AppServices } from "../app";
import type { WorkingScheduleInput } from "../scheduling/schedules";
import { getBody, getOptionalString, getString, isRecord, sendResult } from "../utils/http";

function toScheduleInput(value: unknown): WorkingScheduleInput {
  const payload = isRecord(value) ? value : {};
  return {
    date: getString(payload.date),
    startTime: getString(payload.startTime),
    endTime: getString(payload.endTime),
  };
}

export function createScheduleRoutes(services: AppServices): Router {
  const router = Router();
  const { schedules, availability } = services;

  router.post("/staff/:staffId/schedules", async (req, res) => {
    const result = await schedules.addWorkingSchedule(
      req.params.staffId,
      toScheduleInput(getBody(req)),
    );
    sendResult(res, result, 201);
  });

  router.post("/staff/:staffId/schedules/bulk", async (req, res) => {
    const items: unknown = getBody(req).schedules;
    const inputs = Array.isArray(items) ? items.map(toScheduleInput) : [];
    sendResult(res, await schedules.addWorkingSchedules(req.params.staffId, inputs), 201);
  });

  router.get("/staff/:staffId/schedules", async (req, res) => {
    const from = getString(req.query.from);
    const to = getOptionalString(req.query.to) ?? from;
    sendResult(res, await schedules.listWorkingSchedules(req.params.staffId, from, to));
  });

  router.delete("/schedules/:id", async (req, res) => {
    sendResult(res, await schedules.removeWorkingSchedule(req.params.id));
  });

  router.get("/staff/:staffId/agenda", async (req, res) => {
    const from = getString(req.query.from);
    const to = getOptionalString(req.query.to) ?? from;
    sendResult(res, await schedules.getStaffAgenda(req.params.staffId, from, to));
  });

  router.get("/staff/:staffId/slots", async (req, res) => {
    const result = await availability.getAvailableSlots(
      req.params.staffId,
      getString(req.query.serviceId),
      getString(req.query.date),
    );
    sendResult(res, result);
  });

  router.get("/businesses/:businessId/slots", async (req, res) => {
    const result = await availability.getBusinessAvailability({
      businessId: req.params.businessId,
      serviceId: getString(req.query.serviceId),
      date: getString(req.query.date),
      staffId: getOptionalString(req.query.staffId),
    });
    sendResult(res, result);
  });

  return router;
}
