import { Schema, model, models } from "mongoose";
import type { Model } from "mongoose";
import { commonSchemaOptions, timestampFields } from "./shared";
import type { BaseRecord } from "./shared";

export interface AppointmentServiceRecord extends BaseRecord {
  appointmentId: string;
  businessId: string;
  serviceId: string;
  staffId: string | null;
  startsAt: Date;
  endsAt: Date;
  priceCents: number;
}

const appointmentServiceSchema = new Schema<AppointmentServiceRecord>(
  {
    id: { type: String, required: true, unique: true, index: true },
    appointmentId: { type: String, required: true, index: true },
    businessId: { type: String, required: true, index: true },
    serviceId: { type: String, required: true },
    staffId: { type: String, default: null },
    startsAt: { type: Date, required: true },
    endsAt: { type: Date, required: true },
    priceCents: { type: Number, required: true, min: 0 },
    ...timestampFields,
  },
  commonSchemaOptions,
);
appointmentServiceSchema.index({ staffId: 1, startsAt: 1, endsAt: 1 });

export const AppointmentServiceModel: Model<AppointmentServiceRecord> =
  models.AppointmentService ??
  model<AppointmentServiceRecord>("AppointmentService", appointmentServiceSchema, "appointment_services");
