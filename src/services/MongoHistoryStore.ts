import { IncidentModel } from "../models/Incident";
import { SignalRecordModel } from "../models/SignalRecord";
import { TradeRecordModel } from "../models/TradeRecord";
import { IHistoryStore, IIncidentRecord, ISignalRecord, ITradeRecord } from "../types/history.types";

export class MongoHistoryStore implements IHistoryStore {
  async saveSignal(record: ISignalRecord): Promise<void> {
    await SignalRecordModel.updateOne(
      { signalId: record.signalId },
      { $setOnInsert: { ...record, emittedAt: new Date(record.emittedAt) } },
      { upsert: true }
    );
  }

  async saveTrade(record: ITradeRecord): Promise<void> {
    await TradeRecordModel.create({ ...record, closedAt: new Date(record.closedAt) });
  }

  async saveIncident(record: IIncidentRecord): Promise<void> {
    await IncidentModel.create({ ...record, occurredAt: new Date(record.occurredAt) });
  }
}
