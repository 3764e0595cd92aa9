import mongoose, { mongo } from "mongoose";
import type { ClientSession, FilterQuery } from "mongoose";
import type { Logger } from "pino";
import type {
  AppointmentFilter,
  CatalogStore,
  LedgerTransaction,
  SchedulingStore,
} from "../scheduling/ports";
import { utcDateKeysBetween } from "../utils/core";
import { SchedulingRejection } from "../utils/errors";
import { ACTIVE_STATUSES } from "../utils/types";
import type {
  Appointment,
  AppointmentService,
  Business,
  Service,
  StaffMember,
  WorkingSchedule,
} from "../utils/types";
import {
  AppointmentModel,
  AppointmentServiceModel,
  BusinessModel,
  ServiceModel,
  StaffGuardModel,
  StaffMemberModel,
  WorkingScheduleModel,
} from "./models";
import type {
  AppointmentRecord,
  AppointmentServiceRecord,
  BusinessRecord,
  ServiceRecord,
  StaffMemberRecord,
  WorkingScheduleRecord,
} from "./models";

const MAX_TRANSACTION_ATTEMPTS = 3;

function toIsoString(value: Date | string): string {
  return new Date(value).toISOString();
}

function toOptionalIsoString(value: Date | string | null | undefined): string | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed.toISOString();
}

function toDateValue(value: string): Date {
  return new Date(value);
}

function stripUndefined(record: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).filter(([, value]) => value !== undefined));
}

function nameKeyOf(name: string): string {
  return name.trim().toLowerCase();
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function isDuplicateKeyError(error: unknown): boolean {
  return error instanceof mongo.MongoServerError && error.code === 11000;
}

function fromBusinessRecord(record: BusinessRecord): Business {
  return {
    id: record.id,
    name: record.name,
    address: record.address,
    phone: record.phone,
    timezone: record.timezone,
    createdAt: toIsoString(record.createdAt),
    updatedAt: toIsoString(record.updatedAt),
  };
}

function toBusinessRecord(business: Business): BusinessRecord {
  return {
    ...business,
    createdAt: toDateValue(business.createdAt),
    updatedAt: toDateValue(business.updatedAt),
  };
}

function fromStaffRecord(record: StaffMemberRecord): StaffMember {
  return {
    id: record.id,
    businessId: record.businessId,
    name: record.name,
    email: record.email ?? undefined,
    isActive: record.isActive,
    createdAt: toIsoString(record.createdAt),
    updatedAt: toIsoString(record.updatedAt),
  };
}

function fromServiceRecord(record: ServiceRecord): Service {
  return {
    id: record.id,
    businessId: record.businessId,
    name: record.name,
    durationMin: record.durationMin,
    priceCents: record.priceCents,
    priceType: record.priceType,
    color: record.color,
    description: record.description ?? undefined,
    createdAt: toIsoString(record.createdAt),
    updatedAt: toIsoString(record.updatedAt),
  };
}

function toServiceRecord(service: Service): ServiceRecord {
  return {
    ...service,
    nameKey: nameKeyOf(service.name),
    createdAt: toDateValue(service.createdAt),
    updatedAt: toDateValue(service.updatedAt),
  };
}

function toServiceWriteError(error: unknown, service: Service): unknown {
  return isDuplicateKeyError(error)
    ? new SchedulingRejection("DUPLICATE", `Service "${service.name}" already exists`)
    : error;
}

function fromScheduleRecord(record: WorkingScheduleRecord): WorkingSchedule {
  return {
    id: record.id,
    businessId: record.businessId,
    staffId: record.staffId,
    date: record.date,
    startTime: record.startTime,
    endTime: record.endTime,
    createdAt: toIsoString(record.createdAt),
    updatedAt: toIsoString(record.updatedAt),
  };
}

function toScheduleRecord(schedule: WorkingSchedule): WorkingScheduleRecord {
  return {
    ...schedule,
    createdAt: toDateValue(schedule.createdAt),
    updatedAt: toDateValue(schedule.updatedAt),
  };
}

function fromAppointmentRecord(record: AppointmentRecord): Appointment {
  return {
    id: record.id,
    businessId: record.businessId,
    clientName: record.clientName,
    clientPhone: record.clientPhone,
    status: record.status,
    notes: record.notes ?? undefined,
    cancellationReason: record.cancellationReason ?? undefined,
    cancelledAt: toOptionalIsoString(record.cancelledAt),
    totalPriceCents: record.totalPriceCents,
    createdAt: toIsoString(record.createdAt),
    updatedAt: toIsoString(record.updatedAt),
  };
}

function toAppointmentRecord(appointment: Appointment): AppointmentRecord {
  return {
    ...appointment,
    cancelledAt: appointment.cancelledAt ? toDateValue(appointment.cancelledAt) : undefined,
    createdAt: toDateValue(appointment.createdAt),
    updatedAt: toDateValue(appointment.updatedAt),
  };
}

function fromAppointmentServiceRecord(record: AppointmentServiceRecord): AppointmentService {
  return {
    id: record.id,
    appointmentId: record.appointmentId,
    businessId: record.businessId,
    serviceId: record.serviceId,
    staffId: record.staffId ?? null,
    startsAt: toIsoString(record.startsAt),
    endsAt: toIsoString(record.endsAt),
    priceCents: record.priceCents,
    createdAt: toIsoString(record.createdAt),
    updatedAt: toIsoString(record.updatedAt),
  };
}

function toAppointmentServiceRecord(row: AppointmentService): AppointmentServiceRecord {
  return {
    ...row,
    startsAt: toDateValue(row.startsAt),
    endsAt: toDateValue(row.endsAt),
    createdAt: toDateValue(row.createdAt),
    updatedAt: toDateValue(row.updatedAt),
  };
}

/** Bumps the guard document for `key` inside the session, creating it on first use. */
async function claimGuard(session: ClientSession, key: string): Promise<void> {
  await StaffGuardModel.updateOne({ key }, { $inc: { version: 1 } }, { upsert: true, session }).exec();
}

/**
 * Ledger bound to a session. With a session every schedule or overlap read
 * claims the staff member's guard for the days it covers first; without one
 * it only reads.
 */
function createLedger(session: ClientSession | null): LedgerTransaction {
  const writeOptions = session ? { session } : {};

  return {
    async findFor(staffId, date) {
      if (session) {
        await claimGuard(session, `${staffId}:${date}:hours`);
      }
      const rows = await WorkingScheduleModel.find({ staffId, date })
        .sort({ startTime: 1 })
        .session(session)
        .lean<WorkingScheduleRecord[]>()
        .exec();
      return rows.map(fromScheduleRecord);
    },

    async listForStaff(staffId, fromDate, toDate) {
      const rows = await WorkingScheduleModel.find({
        staffId,
        date: { $gte: fromDate, $lte: toDate },
      })
        .sort({ date: 1, startTime: 1 })
        .session(session)
        .lean<WorkingScheduleRecord[]>()
        .exec();
      return rows.map(fromScheduleRecord);
    },

    async findScheduleById(id) {
      const row = await WorkingScheduleModel.findOne({ id })
        .session(session)
        .lean<WorkingScheduleRecord>()
        .exec();
      return row ? fromScheduleRecord(row) : undefined;
    },

    async findActiveOverlapping(staffId, startsAt, endsAt, excludeServiceIds = []) {
      if (session) {
        for (const dateKey of utcDateKeysBetween(startsAt, endsAt)) {
          await claimGuard(session, `${staffId}:${dateKey}`);
        }
      }
      const rows = await AppointmentServiceModel.find({
        staffId,
        id: { $nin: [...excludeServiceIds] },
        startsAt: { $lt: toDateValue(endsAt) },
        endsAt: { $gt: toDateValue(startsAt) },
      })
        .sort({ startsAt: 1 })
        .session(session)
        .lean<AppointmentServiceRecord[]>()
        .exec();
      if (!rows.length) {
        return [];
      }

      const active = await AppointmentModel.find({
        id: { $in: [...new Set(rows.map((row) => row.appointmentId))] },
        status: { $in: [...ACTIVE_STATUSES] },
      })
        .select({ id: 1 })
        .session(session)
        .lean<Array<Pick<AppointmentRecord, "id">>>()
        .exec();
      const activeIds = new Set(active.map((item) => item.id));
      return rows
        .filter((row) => activeIds.has(row.appointmentId))
        .map(fromAppointmentServiceRecord);
    },

    async findAppointment(id) {
      const record = await AppointmentModel.findOne({ id })
        .session(session)
        .lean<AppointmentRecord>()
        .exec();
      return record ? fromAppointmentRecord(record) : undefined;
    },

    async listAppointmentServices(appointmentId) {
      const rows = await AppointmentServiceModel.find({ appointmentId })
        .sort({ startsAt: 1 })
        .session(session)
        .lean<AppointmentServiceRecord[]>()
        .exec();
      return rows.map(fromAppointmentServiceRecord);
    },

    async listStaffServices(staffId, fromIso, toIso) {
      const rows = await AppointmentServiceModel.find({
        staffId,
        startsAt: { $gte: toDateValue(fromIso), $lt: toDateValue(toIso) },
      })
        .sort({ startsAt: 1 })
        .session(session)
        .lean<AppointmentServiceRecord[]>()
        .exec();
      return rows.map(fromAppointmentServiceRecord);
    },

    async insertAppointment(appointment) {
      await AppointmentModel.insertMany([toAppointmentRecord(appointment)], writeOptions);
    },

    async updateAppointment(appointment) {
      await AppointmentModel.replaceOne(
        { id: appointment.id },
        stripUndefined(toAppointmentRecord(appointment)),
        writeOptions,
      ).exec();
    },

    async insertAppointmentServices(rows) {
      await AppointmentServiceModel.insertMany(rows.map(toAppointmentServiceRecord), writeOptions);
    },

    async updateAppointmentService(row) {
      await AppointmentServiceModel.replaceOne(
        { id: row.id },
        stripUndefined(toAppointmentServiceRecord(row)),
        writeOptions,
      ).exec();
    },

    async deleteAppointmentServices(appointmentId) {
      await AppointmentServiceModel.deleteMany({ appointmentId }, writeOptions).exec();
    },

    async insertSchedules(rows) {
      await WorkingScheduleModel.insertMany(rows.map(toScheduleRecord), writeOptions);
    },

    async deleteSchedule(id) {
      await WorkingScheduleModel.deleteOne({ id }, writeOptions).exec();
    },
  };
}

async function buildAppointmentQuery(
  filter: AppointmentFilter,
): Promise<FilterQuery<AppointmentRecord>> {
  const query: FilterQuery<AppointmentRecord> = { businessId: filter.businessId };
  if (filter.status) {
    query.status = filter.status;
  }
  const term = filter.search?.trim();
  if (term) {
    const pattern = new RegExp(escapeRegex(term), "i");
    query.$or = [{ clientName: pattern }, { clientPhone: pattern }];
  }

  if (filter.staffId || filter.startsFrom || filter.startsBefore) {
    const rowQuery: FilterQuery<AppointmentServiceRecord> = { businessId: filter.businessId };
    if (filter.staffId) {
      rowQuery.staffId = filter.staffId;
    }
    if (filter.startsFrom || filter.startsBefore) {
      const startsAt: { $gte?: Date; $lt?: Date } = {};
      if (filter.startsFrom) {
        startsAt.$gte = toDateValue(filter.startsFrom);
      }
      if (filter.startsBefore) {
        startsAt.$lt = toDateValue(filter.startsBefore);
      }
      rowQuery.startsAt = startsAt;
    }
    const ids = await AppointmentServiceModel.distinct("appointmentId", rowQuery).exec();
    query.id = { $in: ids.filter((id): id is string => typeof id === "string") };
  }
  return query;
}

/** Runs `work` in a session transaction and returns what it produced. */
async function runInTransaction<T>(work: (session: ClientSession) => Promise<T>): Promise<T> {
  const session = await mongoose.startSession();
  try {
    const outcome: { result?: { value: T } } = {};
    await session.withTransaction(async () => {
      outcome.result = { value: await work(session) };
    });
    const { result } = outcome;
    if (!result) {
      throw new Error("Transaction completed without a result");
    }
    return result.value;
  } finally {
    await session.endSession();
  }
}

export function createMongoSchedulingStore(logger: Logger): SchedulingStore {
  const reader = createLedger(null);

  return {
    kind: "mongodb",
    async listAppointments(filter) {
      const query = await buildAppointmentQuery(filter);
      const [records, total] = await Promise.all([
        AppointmentModel.find(query)
          .sort({ [filter.sort.field]: filter.sort.direction, id: 1 })
          .skip(filter.offset)
          .limit(filter.limit)
          .lean<AppointmentRecord[]>()
          .exec(),
        AppointmentModel.countDocuments(query).exec(),
      ]);
      return { items: records.map(fromAppointmentRecord), total };
    },
    findFor: (staffId, date) => reader.findFor(staffId, date),
    listForStaff: (staffId, fromDate, toDate) => reader.listForStaff(staffId, fromDate, toDate),
    findScheduleById: (id) => reader.findScheduleById(id),
    findActiveOverlapping: (staffId, startsAt, endsAt, excludeServiceIds) =>
      reader.findActiveOverlapping(staffId, startsAt, endsAt, excludeServiceIds),
    findAppointment: (id) => reader.findAppointment(id),
    listAppointmentServices: (appointmentId) => reader.listAppointmentServices(appointmentId),
    listStaffServices: (staffId, fromIso, toIso) =>
      reader.listStaffServices(staffId, fromIso, toIso),

    async transaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
      for (let attempt = 1; ; attempt += 1) {
        try {
          return await runInTransaction((session) => work(createLedger(session)));
        } catch (error) {
          // Two first-time upserts of the same guard collide on its unique key.
          if (attempt < MAX_TRANSACTION_ATTEMPTS && isDuplicateKeyError(error)) {
            logger.warn({ attempt }, "staff guard collision, retrying transaction");
            continue;
          }
          throw error;
        }
      }
    },
  };
}

export function createMongoCatalogStore(): CatalogStore {
  return {
    async findBusiness(id) {
      const record = await BusinessModel.findOne({ id }).lean<BusinessRecord>().exec();
      return record ? fromBusinessRecord(record) : undefined;
    },

    async insertBusiness(business) {
      await BusinessModel.create(toBusinessRecord(business));
    },

    async updateBusiness(business) {
      await BusinessModel.replaceOne({ id: business.id }, toBusinessRecord(business)).exec();
    },

    async deleteBusiness(id) {
      await runInTransaction(async (session) => {
        await AppointmentServiceModel.deleteMany({ businessId: id }, { session }).exec();
        await AppointmentModel.deleteMany({ businessId: id }, { session }).exec();
        await WorkingScheduleModel.deleteMany({ businessId: id }, { session }).exec();
        await ServiceModel.deleteMany({ businessId: id }, { session }).exec();
        await StaffMemberModel.deleteMany({ businessId: id }, { session }).exec();
        await BusinessModel.deleteOne({ id }, { session }).exec();
      });
    },

    async findStaff(id) {
      const record = await StaffMemberModel.findOne({ id }).lean<StaffMemberRecord>().exec();
      return record ? fromStaffRecord(record) : undefined;
    },

    async listStaff(businessId) {
      const records = await StaffMemberModel.find({ businessId })
        .sort({ name: 1 })
        .lean<StaffMemberRecord[]>()
        .exec();
      return records.map(fromStaffRecord);
    },

    async insertStaff(staff) {
      await StaffMemberModel.create({
        ...staff,
        createdAt: toDateValue(staff.createdAt),
        updatedAt: toDateValue(staff.updatedAt),
      });
    },

    async updateStaff(staff) {
      await StaffMemberModel.replaceOne(
        { id: staff.id },
        stripUndefined({
          ...staff,
          createdAt: toDateValue(staff.createdAt),
          updatedAt: toDateValue(staff.updatedAt),
        }),
      ).exec();
    },

    async deleteStaff(id) {
      await runInTransaction(async (session) => {
        await AppointmentServiceModel.updateMany(
          { staffId: id },
          { $set: { staffId: null } },
          { session },
        ).exec();
        await WorkingScheduleModel.deleteMany({ staffId: id }, { session }).exec();
        await StaffMemberModel.deleteOne({ id }, { session }).exec();
      });
    },

    async findService(id) {
      const record = await ServiceModel.findOne({ id }).lean<ServiceRecord>().exec();
      return record ? fromServiceRecord(record) : undefined;
    },

    async findServiceByName(businessId, name) {
      const record = await ServiceModel.findOne({ businessId, nameKey: nameKeyOf(name) })
        .lean<ServiceRecord>()
        .exec();
      return record ? fromServiceRecord(record) : undefined;
    },

    async listServices(businessId) {
      const records = await ServiceModel.find({ businessId })
        .sort({ name: 1 })
        .lean<ServiceRecord[]>()
        .exec();
      return records.map(fromServiceRecord);
    },

    async insertService(service) {
      try {
        await ServiceModel.create(toServiceRecord(service));
      } catch (error) {
        throw toServiceWriteError(error, service);
      }
    },

    async updateService(service) {
      try {
        await ServiceModel.replaceOne(
          { id: service.id },
          stripUndefined(toServiceRecord(service)),
        ).exec();
      } catch (error) {
        throw toServiceWriteError(error, service);
      }
    },
  };
}

export interface MongoStores {
  catalog: CatalogStore;
  scheduling: SchedulingStore;
}

export function createMongoStores(logger: Logger): MongoStores {
  return {
    catalog: createMongoCatalogStore(),
    scheduling: createMongoSchedulingStore(logger),
  };
}
