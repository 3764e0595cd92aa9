import { Schema, model, models } from "mongoose";
import type { Model } from "mongoose";
import { commonSchemaOptions, timestampFields } from "./shared";
import type { BaseRecord } from "./shared";

export interface WorkingScheduleRecord extends BaseRecord {
  businessId: string;
  staffId: string;
  date: string;
  startTime: string;
  endTime: string;
}

const workingScheduleSchema = new Schema<WorkingScheduleRecord>(
  {
    id: { type: String, required: true, unique: true, index: true },
    businessId: { type: String, required: true, index: true },
    staffId: { type: String, required: true },
    date: { type: String, required: true },
    startTime: { type: String, required: true },
    endTime: { type: String, required: true },
    ...timestampFields,
  },
  commonSchemaOptions,
);
workingScheduleSchema.index({ staffId: 1, date: 1, startTime: 1 });

export const WorkingScheduleModel: Model<WorkingScheduleRecord> =
  models.WorkingSchedule ??
  model<WorkingScheduleRecord>("WorkingSchedule", workingScheduleSchema, "working_schedules");
