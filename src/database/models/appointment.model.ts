import { Schema, model, models } from "mongoose";
import type { Model } from "mongoose";
import { commonSchemaOptions, timestampFields } from "./shared";
import type { BaseRecord } from "./shared";

export interface AppointmentRecord extends BaseRecord {
  businessId: string;
  clientName: string;
  clientPhone: string;
  status: "PENDING" | "CONFIRMED" | "IN_PROGRESS" | "COMPLETED" | "CANCELLED";
  notes?: string;
  cancellationReason?: string;
  cancelledAt?: Date;
  totalPriceCents: number;
}

const appointmentSchema = new Schema<AppointmentRecord>(
  {
    id: { type: String, required: true, unique: true, index: true },
    businessId: { type: String, required: true, index: true },
    clientName: { type: String, required: true },
    clientPhone: { type: String, default: "" },
    status: {
      type: String,
      enum: ["PENDING", "CONFIRMED", "IN_PROGRESS", "COMPLETED", "CANCELLED"],
      required: true,
    },
    notes: { type: String },
    cancellationReason: { type: String },
    cancelledAt: { type: Date },
    totalPriceCents: { type: Number, required: true, min: 0 },
    ...timestampFields,
  },
  commonSchemaOptions,
);
appointmentSchema.index({ businessId: 1, status: 1, createdAt: -1 });

export const AppointmentModel: Model<AppointmentRecord> =
  models.Appointment ?? model<AppointmentRecord>("Appointment", appointmentSchema, "appointments");
