import mongoose, { Schema, Document } from "mongoose";

export interface IIncidentDoc extends Document {
  eventId: number;
  category: string;
  symbol: string | null;
  correlationId: string | null;
  message: string;
  payload: Record<string, unknown>;
  occurredAt: Date;
}

const IncidentSchema: Schema = new Schema({
  eventId: { type: Number, required: true },
  category: { type: String, required: true, index: true },
  symbol: { type: String, default: null },
  correlationId: { type: String, default: null },
  message: { type: String, required: true },
  payload: { type: Schema.Types.Mixed, default: {} },
  occurredAt: { type: Date, required: true },
});

// Incidents are kept for 30 days
IncidentSchema.index({ occurredAt: 1 }, { expireAfterSeconds: 30 * 24 * 60 * 60 });

export const IncidentModel = mongoose.model<IIncidentDoc>("Incident", IncidentSchema);
