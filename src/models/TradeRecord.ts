import mongoose, { Schema, Document } from "mongoose";

export interface ITradeRecordDoc extends Document {
  signalId: string;
  symbol: string;
  kind: "CLOSED" | "REDUCED" | "REVERSED";
  exitSide: "BUY" | "SELL";
  closedQty: number;
  entryPrice: number;
  exitPrice: number;
  realizedPnl: number;
  fee: number;
  closedAt: Date;
}

const TradeRecordSchema: Schema = new Schema({
  signalId: { type: String, required: true, index: true },
  symbol: { type: String, required: true, index: true },
  kind: { type: String, enum: ["CLOSED", "REDUCED", "REVERSED"], required: true },
  exitSide: { type: String, enum: ["BUY", "SELL"], required: true },
  closedQty: { type: Number, required: true },
  entryPrice: { type: Number, required: true },
  exitPrice: { type: Number, required: true },
  realizedPnl: { type: Number, required: true },
  fee: { type: Number, default: 0 },
  closedAt: { type: Date, required: true, index: true },
});

export const TradeRecordModel = mongoose.model<ITradeRecordDoc>("TradeRecord", TradeRecordSchema);
