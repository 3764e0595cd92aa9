import { Router } from "express";
import type { AppServices } from "../app";
import type { BusinessPatch, ServicePatch, StaffPatch } from "../scheduling/catalog";
import { getBody, getNumber, getOptionalString, getString, sendResult } from "../utils/http";

export function createBusinessRoutes(services: AppServices): Router {
  const router = Router();
  const { catalog } = services;

  router.post("/businesses", async (req, res) => {
    const body = getBody(req);
    const result = await catalog.createBusiness({
      name: getString(body.name),
      address: getOptionalString(body.address),
      phone: getOptionalString(body.phone),
      timezone: getOptionalString(body.timezone),
    });
    sendResult(res, result, 201);
  });

  router.get("/businesses/:id", async (req, res) => {
    sendResult(res, await catalog.getBusiness(req.params.id));
  });

  router.patch("/businesses/:id", async (req, res) => {
    const body = getBody(req);
    const patch: BusinessPatch = {};
    if (typeof body.name === "string") {
      patch.name = body.name;
    }
    if (typeof body.address === "string") {
      patch.address = body.address;
    }
    if (typeof body.phone === "string") {
      patch.phone = body.phone;
    }
    sendResult(res, await catalog.updateBusiness(req.params.id, patch));
  });

  router.delete("/businesses/:id", async (req, res) => {
    sendResult(res, await catalog.deleteBusiness(req.params.id));
  });

  router.post("/businesses/:businessId/staff", async (req, res) => {
    const body = getBody(req);
    const result = await catalog.createStaff(req.params.businessId, {
      name: getString(body.name),
      email: getOptionalString(body.email),
      isActive: typeof body.isActive === "boolean" ? body.isActive : undefined,
    });
    sendResult(res, result, 201);
  });

  router.get("/businesses/:businessId/staff", async (req, res) => {
    sendResult(res, await catalog.listStaff(req.params.businessId));
  });

  router.patch("/staff/:id", async (req, res) => {
    const body = getBody(req);
    const patch: StaffPatch = {};
    if (typeof body.name === "string") {
      patch.name = body.name;
    }
    if (typeof body.email === "string") {
      patch.email = body.email;
    }
    if (typeof body.isActive === "boolean") {
      patch.isActive = body.isActive;
    }
    sendResult(res, await catalog.updateStaff(req.params.id, patch));
  });

  router.delete("/staff/:id", async (req, res) => {
    sendResult(res, await catalog.deleteStaff(req.params.id));
  });

  router.post("/businesses/:businessId/services", async (req, res) => {
    const body = getBody(req);
    const result = await catalog.createService(req.params.businessId, {
      name: getString(body.name),
      durationMin: getNumber(body.durationMin),
      priceCents: getNumber(body.priceCents ?? 0),
      priceType: getOptionalString(body.priceType),
      color: getOptionalString(body.color),
      description: getOptionalString(body.description),
    });
    sendResult(res, result, 201);
  });

  router.get("/businesses/:businessId/services", async (req, res) => {
    sendResult(res, await catalog.listServices(req.params.businessId));
  });

  router.patch("/services/:id", async (req, res) => {
    const body = getBody(req);
    const patch: ServicePatch = {};
    for (const key of ["name", "priceType", "color", "description"] as const) {
      const value = body[key];
      if (typeof value === "string") {
        patch[key] = value;
      }
    }
    if (body.durationMin !== undefined) {
      patch.durationMin = getNumber(body.durationMin);
    }
    if (body.priceCents !== undefined) {
      patch.priceCents = getNumber(body.priceCents);
    }
    sendResult(res, await catalog.updateService(req.params.id, patch));
  });

  return router;
}
