import mongoose, { Schema, Document } from "mongoose";

export interface ISignalRecordDoc extends Document {
  signalId: string;
  symbol: string;
  side: "BUY" | "SELL";
  confidence: number;
  price: number;
  statePath: string[];
  reasonCodes: string[];
  emittedAt: Date;
}

const SignalRecordSchema: Schema = new Schema({
  signalId: { type: String, required: true, unique: true },
  symbol: { type: String, required: true, index: true },
  side: { type: String, enum: ["BUY", "SELL"], required: true },
  confidence: { type: Number, required: true },
  price: { type: Number, required: true },
  statePath: { type: [String], default: [] },
  reasonCodes: { type: [String], default: [] },
  emittedAt: { type: Date, required: true, index: true },
});

export const SignalRecordModel = mongoose.model<ISignalRecordDoc>("SignalRecord", SignalRecordSchema);
