export const commonSchemaOptions = {
  versionKey: false,
  // createdAt and updatedAt come from the application clock.
  timestamps: false,
} as const;

export const timestampFields = {
  createdAt: { type: Date, required: true },
  updatedAt: { type: Date, required: true },
} as const;

export interface BaseRecord {
  id: string;
  createdAt: Date;
  updatedAt: Date;
}
