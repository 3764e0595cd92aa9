import { Schema, model, models } from "mongoose";
import type { Model } from "mongoose";
import { commonSchemaOptions, timestampFields } from "./shared";
import type { BaseRecord } from "./shared";

export interface ServiceRecord extends BaseRecord {
  businessId: string;
  name: string;
  // Lowercased name; unique per business.
  nameKey: string;
  durationMin: number;
  priceCents: number;
  priceType: "fixed" | "variable";
  color: "blue" | "green" | "purple" | "red";
  description?: string;
}

const serviceSchema = new Schema<ServiceRecord>(
  {
    id: { type: String, required: true, unique: true, index: true },
    businessId: { type: String, required: true, index: true },
    name: { type: String, required: true, trim: true },
    nameKey: { type: String, required: true },
    durationMin: { type: Number, required: true, min: 15, max: 480 },
    priceCents: { type: Number, required: true, min: 0 },
    priceType: { type: String, enum: ["fixed", "variable"], required: true },
    color: { type: String, enum: ["blue", "green", "purple", "red"], required: true },
    description: { type: String },
    ...timestampFields,
  },
  commonSchemaOptions,
);
serviceSchema.index({ businessId: 1, nameKey: 1 }, { unique: true });

export const ServiceModel: Model<ServiceRecord> =
  models.Service ?? model<ServiceRecord>("Service", serviceSchema, "services");
