import { Schema, model, models } from "mongoose";
import type { Model } from "mongoose";
import { commonSchemaOptions, timestampFields } from "./shared";
import type { BaseRecord } from "./shared";

export interface StaffMemberRecord extends BaseRecord {
  businessId: string;
  name: string;
  email?: string;
  isActive: boolean;
}

const staffMemberSchema = new Schema<StaffMemberRecord>(
  {
    id: { type: String, required: true, unique: true, index: true },
    businessId: { type: String, required: true, index: true },
    name: { type: String, required: true, trim: true },
    email: { type: String, lowercase: true, trim: true },
    isActive: { type: Boolean, default: true },
    ...timestampFields,
  },
  commonSchemaOptions,
);
staffMemberSchema.index({ businessId: 1, isActive: 1, name: 1 });

export const StaffMemberModel: Model<StaffMemberRecord> =
  models.StaffMember ?? model<StaffMemberRecord>("StaffMember", staffMemberSchema, "staff_members");
