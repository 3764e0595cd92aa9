import { Schema, model, models } from "mongoose";
import type { Model } from "mongoose";
import { commonSchemaOptions, timestampFields } from "./shared";
import type { BaseRecord } from "./shared";

export interface BusinessRecord extends BaseRecord {
  name: string;
  address: string;
  phone: string;
  timezone: string;
}

const businessSchema = new Schema<BusinessRecord>(
  {
    id: { type: String, required: true, unique: true, index: true },
    name: { type: String, required: true, trim: true },
    address: { type: String, default: "" },
    phone: { type: String, default: "" },
    timezone: { type: String, required: true, default: "UTC" },
    ...timestampFields,
  },
  commonSchemaOptions,
);

export const BusinessModel: Model<BusinessRecord> =
  models.Business ?? model<BusinessRecord>("Business", businessSchema, "businesses");
