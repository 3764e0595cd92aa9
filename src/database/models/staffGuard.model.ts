import { Schema, model, models } from "mongoose";
import type { Model } from "mongoose";

/**
 * Write-conflict anchor. Transactions that read a staff member's bookings or
 * working hours bump the matching guard first, so two of them touching the
 * same staff day cannot both commit.
 */
export interface StaffGuardRecord {
  key: string;
  version: number;
}

const staffGuardSchema = new Schema<StaffGuardRecord>(
  {
    key: { type: String, required: true, unique: true },
    version: { type: Number, default: 0 },
  },
  { versionKey: false },
);

export const StaffGuardModel: Model<StaffGuardRecord> =
  models.StaffGuard ?? model<StaffGuardRecord>("StaffGuard", staffGuardSchema, "staff_guards");
