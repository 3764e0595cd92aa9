import type { Logger } from "pino";
import type { Clock } from "../utils/clock";
import { nowIso } from "../utils/clock";
import { createId, isValidTimeZone } from "../utils/core";
import { SchedulingRejection, runOperation } from "../utils/errors";
import type { Result } from "../utils/errors";
import type {
  Business,
  PriceType,
  Service,
  ServiceColor,
  StaffMember,
} from "../utils/types";
import type { CatalogStore } from "./ports";

export const SERVICE_DURATION_MIN = 15;
export const SERVICE_DURATION_MAX = 480;

const PRICE_TYPES: readonly PriceType[] = ["fixed", "variable"];
const SERVICE_COLORS: readonly ServiceColor[] = ["blue", "green", "purple", "red"];
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export interface BusinessInput {
  name: string;
  address?: string;
  phone?: string;
  timezone?: string;
}

export type BusinessPatch = Partial<Pick<Business, "name" | "address" | "phone">>;

export interface StaffInput {
  name: string;
  email?: string;
  isActive?: boolean;
}

export type StaffPatch = Partial<StaffInput>;

export interface ServiceInput {
  name: string;
  durationMin: number;
  priceCents: number;
  priceType?: string;
  color?: string;
  description?: string;
}

export type ServicePatch = Partial<ServiceInput>;

export interface CatalogManager {
  createBusiness(input: BusinessInput): Promise<Result<Business>>;
  getBusiness(businessId: string): Promise<Result<Business>>;
  updateBusiness(businessId: string, patch: BusinessPatch): Promise<Result<Business>>;
  deleteBusiness(businessId: string): Promise<Result<{ id: string }>>;

  createStaff(businessId: string, input: StaffInput): Promise<Result<StaffMember>>;
  listStaff(businessId: string): Promise<Result<StaffMember[]>>;
  updateStaff(staffId: string, patch: StaffPatch): Promise<Result<StaffMember>>;
  deleteStaff(staffId: string): Promise<Result<{ id: string }>>;

  createService(businessId: string, input: ServiceInput): Promise<Result<Service>>;
  listServices(businessId: string): Promise<Result<Service[]>>;
  /** Booked rows keep the duration and price they were written with. */
  updateService(serviceId: string, patch: ServicePatch): Promise<Result<Service>>;
}

export interface CatalogManagerDependencies {
  catalog: CatalogStore;
  clock: Clock;
  logger: Logger;
  defaultTimeZone: string;
}

function requireName(value: string, label: string): string {
  const name = value.trim();
  if (!name) {
    throw new SchedulingRejection("VALIDATION", `${label} is required`);
  }
  return name;
}

function requireEmail(value: string | undefined): string | undefined {
  const email = value?.trim() || undefined;
  if (email && !EMAIL_PATTERN.test(email)) {
    throw new SchedulingRejection("VALIDATION", "email is invalid");
  }
  return email?.toLowerCase();
}

function requireDuration(value: number): number {
  if (!Number.isInteger(value) || value < SERVICE_DURATION_MIN || value > SERVICE_DURATION_MAX) {
    throw new SchedulingRejection(
      "VALIDATION",
      `durationMin must be an integer between ${SERVICE_DURATION_MIN} and ${SERVICE_DURATION_MAX}`,
    );
  }
  return value;
}

function requirePrice(value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new SchedulingRejection("VALIDATION", "priceCents must be a non-negative integer");
  }
  return value;
}

function pickOption<T extends string>(
  value: string | undefined,
  options: readonly T[],
  fallback: T,
  label: string,
): T {
  if (value === undefined) {
    return fallback;
  }
  const option = options.find((item) => item === value.trim().toLowerCase());
  if (!option) {
    throw new SchedulingRejection("VALIDATION", `${label} must be one of: ${options.join(", ")}`);
  }
  return option;
}

export function createCatalogManager(deps: CatalogManagerDependencies): CatalogManager {
  const { catalog, clock, logger } = deps;

  async function requireBusiness(businessId: string): Promise<Business> {
    const business = await catalog.findBusiness(businessId);
    if (!business) {
      throw new SchedulingRejection("NOT_FOUND", "business not found");
    }
    return business;
  }

  async function requireStaff(staffId: string): Promise<StaffMember> {
    const staff = await catalog.findStaff(staffId);
    if (!staff) {
      throw new SchedulingRejection("NOT_FOUND", "staff member not found");
    }
    return staff;
  }

  return {
    createBusiness(input) {
      return runOperation(logger, "createBusiness", async () => {
        const timezone = input.timezone?.trim() || deps.defaultTimeZone;
        if (!isValidTimeZone(timezone)) {
          throw new SchedulingRejection("VALIDATION", `Unknown time zone: ${timezone}`);
        }
        const now = nowIso(clock);
        const business: Business = {
          id: createId(),
          name: requireName(input.name, "name"),
          address: input.address?.trim() ?? "",
          phone: input.phone?.trim() ?? "",
          timezone,
          createdAt: now,
          updatedAt: now,
        };
        await catalog.insertBusiness(business);
        logger.info({ businessId: business.id }, "business created");
        return business;
      });
    },

    getBusiness(businessId) {
      return runOperation(logger, "getBusiness", () => requireBusiness(businessId));
    },

    updateBusiness(businessId, patch) {
      return runOperation(logger, "updateBusiness", async () => {
        const business = await requireBusiness(businessId);
        const next: Business = {
          ...business,
          name: patch.name === undefined ? business.name : requireName(patch.name, "name"),
          address: patch.address?.trim() ?? business.address,
          phone: patch.phone?.trim() ?? business.phone,
          updatedAt: nowIso(clock),
        };
        await catalog.updateBusiness(next);
        return next;
      });
    },

    deleteBusiness(businessId) {
      return runOperation(logger, "deleteBusiness", async () => {
        await requireBusiness(businessId);
        await catalog.deleteBusiness(businessId);
        logger.info({ businessId }, "business deleted");
        return { id: businessId };
      });
    },

    createStaff(businessId, input) {
      return runOperation(logger, "createStaff", async () => {
        const business = await requireBusiness(businessId);
        const email = requireEmail(input.email);
        const now = nowIso(clock);
        const staff: StaffMember = {
          id: createId(),
          businessId: business.id,
          name: requireName(input.name, "name"),
          email,
          isActive: input.isActive ?? true,
          createdAt: now,
          updatedAt: now,
        };
        await catalog.insertStaff(staff);
        return staff;
      });
    },

    listStaff(businessId) {
      return runOperation(logger, "listStaff", async () => {
        const business = await requireBusiness(businessId);
        return catalog.listStaff(business.id);
      });
    },

    updateStaff(staffId, patch) {
      return runOperation(logger, "updateStaff", async () => {
        const staff = await requireStaff(staffId);
        const next: StaffMember = {
          ...staff,
          name: patch.name === undefined ? staff.name : requireName(patch.name, "name"),
          email: patch.email === undefined ? staff.email : requireEmail(patch.email),
          isActive: patch.isActive ?? staff.isActive,
          updatedAt: nowIso(clock),
        };
        await catalog.updateStaff(next);
        return next;
      });
    },

    deleteStaff(staffId) {
      return runOperation(logger, "deleteStaff", async () => {
        const staff = await requireStaff(staffId);
        await catalog.deleteStaff(staff.id);
        logger.info({ staffId, businessId: staff.businessId }, "staff member deleted");
        return { id: staff.id };
      });
    },

    createService(businessId, input) {
      return runOperation(logger, "createService", async () => {
        const business = await requireBusiness(businessId);
        const name = requireName(input.name, "name");
        const durationMin = requireDuration(input.durationMin);
        const priceCents = requirePrice(input.priceCents);
        if (await catalog.findServiceByName(business.id, name)) {
          throw new SchedulingRejection("DUPLICATE", `Service "${name}" already exists`);
        }

        const now = nowIso(clock);
        const service: Service = {
          id: createId(),
          businessId: business.id,
          name,
          durationMin,
          priceCents,
          priceType: pickOption(input.priceType, PRICE_TYPES, "fixed", "priceType"),
          color: pickOption(input.color, SERVICE_COLORS, "blue", "color"),
          description: input.description?.trim() || undefined,
          createdAt: now,
          updatedAt: now,
        };
        await catalog.insertService(service);
        return service;
      });
    },

    listServices(businessId) {
      return runOperation(logger, "listServices", async () => {
        const business = await requireBusiness(businessId);
        return catalog.listServices(business.id);
      });
    },

    updateService(serviceId, patch) {
      return runOperation(logger, "updateService", async () => {
        const service = await catalog.findService(serviceId);
        if (!service) {
          throw new SchedulingRejection("NOT_FOUND", "service not found");
        }
        const name = patch.name === undefined ? service.name : requireName(patch.name, "name");
        const namesake = await catalog.findServiceByName(service.businessId, name);
        if (namesake && namesake.id !== service.id) {
          throw new SchedulingRejection("DUPLICATE", `Service "${name}" already exists`);
        }
        const next: Service = {
          ...service,
          name,
          durationMin:
            patch.durationMin === undefined ? service.durationMin : requireDuration(patch.durationMin),
          priceCents:
            patch.priceCents === undefined ? service.priceCents : requirePrice(patch.priceCents),
          priceType: pickOption(patch.priceType, PRICE_TYPES, service.priceType, "priceType"),
          color: pickOption(patch.color, SERVICE_COLORS, service.color, "color"),
          description:
            patch.description === undefined
              ? service.description
              : patch.description.trim() || undefined,
          updatedAt: nowIso(clock),
        };
        await catalog.updateService(next);
        logger.info({ serviceId, businessId: service.businessId }, "service updated");
        return next;
      });
    },
  };
}
