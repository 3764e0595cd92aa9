import { Router } from "express";
import type { AppServices } from "../app";
import type { ServiceRequest } from "../scheduling/bookingOrchestrator";
import { parseAppointmentStatus } from "../scheduling/statusMachine";
import { fail } from "../utils/errors";
import {
  getActor,
  getBody,
  getOptionalString,
  getPagination,
  getString,
  isRecord,
  sendResult,
} from "../utils/http";

function toServiceRequest(value: unknown): ServiceRequest {
  const payload = isRecord(value) ? value : {};
  return {
    serviceId: getString(payload.serviceId),
    staffId: getString(payload.staffId),
    startsAt: getString(payload.startsAt),
  };
}

function toServiceRequests(value: unknown): ServiceRequest[] {
  return Array.isArray(value) ? value.map(toServiceRequest) : [];
}

export function createAppointmentRoutes(services: AppServices): Router {
  const router = Router();
  const { bookings } = services;

  router.post("/businesses/:businessId/appointments", async (req, res) => {
    const body = getBody(req);
    const client = {
      businessId: req.params.businessId,
      clientName: getString(body.clientName),
      clientPhone: getString(body.clientPhone),
      notes: getOptionalString(body.notes),
      actor: getActor(req),
    };

    const result = Array.isArray(body.services)
      ? await bookings.createMultiServiceAppointment({
          ...client,
          services: toServiceRequests(body.services),
        })
      : await bookings.createAppointment({ ...client, ...toServiceRequest(body) });
    sendResult(res, result, 201);
  });

  router.get("/businesses/:businessId/appointments", async (req, res) => {
    const statusRaw = getOptionalString(req.query.status);
    const status = statusRaw === undefined ? undefined : parseAppointmentStatus(statusRaw);
    if (status === null) {
      sendResult(res, fail("VALIDATION", "status must be a valid appointment status"));
      return;
    }
    const result = await bookings.listAppointments(req.params.businessId, {
      status,
      staffId: getOptionalString(req.query.staffId),
      from: getOptionalString(req.query.from),
      to: getOptionalString(req.query.to),
      search: getOptionalString(req.query.search),
      ordering: getOptionalString(req.query.ordering),
      ...getPagination(req.query.page, req.query.pageSize),
    });
    sendResult(res, result);
  });

  router.get("/appointments/:id", async (req, res) => {
    sendResult(res, await bookings.getAppointment(req.params.id));
  });

  router.post("/appointments/:id/reschedule", async (req, res) => {
    const body = getBody(req);
    const result = await bookings.rescheduleAppointment(req.params.id, getString(body.startsAt), {
      reason: getOptionalString(body.reason),
      actor: getActor(req),
    });
    sendResult(res, result);
  });

  router.patch("/appointments/:id/status", async (req, res) => {
    const status = parseAppointmentStatus(getBody(req).status);
    if (!status) {
      sendResult(res, fail("VALIDATION", "status must be a valid appointment status"));
      return;
    }
    sendResult(res, await bookings.changeAppointmentStatus(req.params.id, status, getActor(req)));
  });

  router.post("/appointments/:id/cancel", async (req, res) => {
    const result = await bookings.cancelAppointment(req.params.id, {
      reason: getOptionalString(getBody(req).reason),
      actor: getActor(req),
    });
    sendResult(res, result);
  });

  router.put("/appointments/:id/services", async (req, res) => {
    const result = await bookings.replaceAppointmentServices(
      req.params.id,
      toServiceRequests(getBody(req).services),
      getActor(req),
    );
    sendResult(res, result);
  });

  return router;
}
