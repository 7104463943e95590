import type { Types } from 'mongoose';
import { MonitorRunModel } from '../db/models/monitorRun.js';
import { PersistenceError } from '../core/errors.js';
import type { MonitorRunRecord } from '../core/types.js';
import { clampLimit, type RunHistoryRepository, type StoredRunRecord } from './runHistoryRepository.js';

interface RowShape {
  _id: Types.ObjectId;
  runTimestamp: Date;
  shipmentsChecked: number;
  exceptionsFound: number;
  notificationsSent: number;
  runDurationMs: number;
  error?: string | null;
}

export function toStoredRun(row: RowShape): StoredRunRecord {
  return {
    id: row._id.toString(),
    runTimestamp: row.runTimestamp,
    shipmentsChecked: row.shipmentsChecked,
    exceptionsFound: row.exceptionsFound,
    notificationsSent: row.notificationsSent,
    runDurationMs: row.runDurationMs,
    ...(row.error ? { error: row.error } : {}),
  };
}

export class MongoRunHistoryRepository implements RunHistoryRepository {
  async append(run: MonitorRunRecord): Promise<StoredRunRecord> {
    try {
      const doc = await MonitorRunModel.create({ ...run });
      return toStoredRun(doc);
    } catch (err) {
      throw new PersistenceError('Failed to persist monitor run', err);
    }
  }

  async list(limit?: number): Promise<StoredRunRecord[]> {
    try {
      const rows = await MonitorRunModel.find()
        .sort({ runTimestamp: -1, _id: -1 })
        .limit(clampLimit(limit))
        .lean();
      return rows.map(toStoredRun);
    } catch (err) {
      throw new PersistenceError('Failed to list monitor runs', err);
    }
  }
}
