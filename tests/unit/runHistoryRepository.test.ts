import { describe, it, expect, afterEach, vi } from 'vitest';
import { Types } from 'mongoose';
import { PersistenceError } from '../../src/core/errors.js';
import { MonitorRunModel } from '../../src/db/models/monitorRun.js';
import {
  MongoRunHistoryRepository,
  toStoredRun,
} from '../../src/repositories/mongoRunHistoryRepository.js';
import {
  InMemoryRunHistoryRepository,
  clampLimit,
} from '../../src/repositories/runHistoryRepository.js';
import { NOW, hoursAfter } from '../utils/fixtures.js';

function run(at: Date, exceptionsFound = 0) {
  return {
    runTimestamp: at,
    shipmentsChecked: 3,
    exceptionsFound,
    notificationsSent: 0,
    runDurationMs: 12,
  };
}

describe('clampLimit', () => {
  it('defaults to 50 and clamps to 1..500', () => {
    expect(clampLimit(undefined)).toBe(50);
    expect(clampLimit(0)).toBe(1);
    expect(clampLimit(9_999)).toBe(500);
    expect(clampLimit(7.8)).toBe(7);
  });
});

describe('InMemoryRunHistoryRepository', () => {
  it('lists newest first with a limit', async () => {
    const repo = new InMemoryRunHistoryRepository();
    await repo.append(run(NOW, 1));
    await repo.append(run(hoursAfter(2), 3));
    await repo.append(run(hoursAfter(1), 2));
    const rows = await repo.list(2);
    expect(rows.map((r) => r.exceptionsFound)).toEqual([3, 2]);
    expect(new Set(rows.map((r) => r.id)).size).toBe(2);
  });

  it('puts the later append first on equal timestamps', async () => {
    const repo = new InMemoryRunHistoryRepository();
    await repo.append(run(NOW, 1));
    await repo.append(run(NOW, 2));
    expect((await repo.list()).map((r) => r.exceptionsFound)).toEqual([2, 1]);
  });

  it('returns copies', async () => {
    const repo = new InMemoryRunHistoryRepository();
    const stored = await repo.append(run(NOW));
    stored.exceptionsFound = 99;
    expect((await repo.list())[0].exceptionsFound).toBe(0);
  });
});

describe('MongoRunHistoryRepository', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('wraps write failures in PersistenceError', async () => {
    vi.spyOn(MonitorRunModel, 'create').mockRejectedValueOnce(new Error('connection reset'));
    const err = await new MongoRunHistoryRepository().append(run(NOW)).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(PersistenceError);
    expect(err).toHaveProperty('message', 'Failed to persist monitor run');
  });

  it('wraps read failures in PersistenceError', async () => {
    vi.spyOn(MonitorRunModel, 'find').mockImplementationOnce(() => {
      throw new Error('not connected');
    });
    await expect(new MongoRunHistoryRepository().list()).rejects.toBeInstanceOf(PersistenceError);
  });

  it('maps rows to stored records', () => {
    const _id = new Types.ObjectId('64b7f0c2a1b2c3d4e5f60718');
    expect(toStoredRun({ _id, ...run(NOW), error: null })).toEqual({ id: '64b7f0c2a1b2c3d4e5f60718', ...run(NOW) });
    expect(toStoredRun({ _id, ...run(NOW), error: 'SnapshotUnavailable' }).error).toBe('SnapshotUnavailable');
  });
});
