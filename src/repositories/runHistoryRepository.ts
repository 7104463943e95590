import crypto from 'crypto';
import type { MonitorRunRecord } from '../core/types.js';

export interface StoredRunRecord extends MonitorRunRecord {
  id: string;
}

export const DEFAULT_HISTORY_LIMIT = 50;
export const MAX_HISTORY_LIMIT = 500;

/** Append-only run history, listed newest first. */
export interface RunHistoryRepository {
  append(run: MonitorRunRecord): Promise<StoredRunRecord>;
  list(limit?: number): Promise<StoredRunRecord[]>;
}

export function clampLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) return DEFAULT_HISTORY_LIMIT;
  return Math.min(MAX_HISTORY_LIMIT, Math.max(1, Math.floor(limit)));
}

export class InMemoryRunHistoryRepository implements RunHistoryRepository {
  private rows: StoredRunRecord[] = [];

  async append(run: MonitorRunRecord): Promise<StoredRunRecord> {
    const row: StoredRunRecord = { ...run, runTimestamp: new Date(run.runTimestamp), id: crypto.randomUUID() };
    this.rows.push(row);
    return { ...row };
  }

  async list(limit?: number): Promise<StoredRunRecord[]> {
    // Newest first; among equal timestamps the later append wins
    return this.rows
      .map((row, seq) => ({ row, seq }))
      .sort((a, b) => b.row.runTimestamp.getTime() - a.row.runTimestamp.getTime() || b.seq - a.seq)
      .slice(0, clampLimit(limit))
      .map(({ row }) => ({ ...row }));
  }
}
