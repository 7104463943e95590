import { describe, it, expect, afterEach, vi } from 'vitest';
import { buildProgram } from '../../src/cli/index.js';
import { loadConfig } from '../../src/config/index.js';
import { InMemoryRunHistoryRepository } from '../../src/repositories/runHistoryRepository.js';
import { createMonitorContext } from '../../src/services/context.js';
import { StaticSnapshotProvider } from '../../src/services/snapshotProvider.js';
import { stubFetch } from '../utils/fetchStub.js';
import { NOW, delayedBy, makeSnapshot } from '../utils/fixtures.js';

const history = new InMemoryRunHistoryRepository();
const fleet = [
  delayedBy(30, { shipmentId: 'C1' }),
  makeSnapshot({ shipmentId: 'C2', mlDelayConfidence: 0.92, predictedDelayHours: 40 }),
];

const makeContext = () =>
  createMonitorContext(loadConfig('nonexistent-config.json'), {
    history,
    provider: new StaticSnapshotProvider(fleet),
    clock: () => NOW,
  });

async function runCli(...args: string[]) {
  const out: string[] = [];
  const spy = vi.spyOn(console, 'log').mockImplementation((line: unknown) => {
    out.push(String(line));
  });
  try {
    await buildProgram(makeContext).exitOverride().parseAsync(['node', 'shipment-monitor', ...args]);
  } finally {
    spy.mockRestore();
  }
  return JSON.parse(out.join('\n'));
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('shipment-monitor CLI', () => {
  it('run-once prints the cycle summary', async () => {
    stubFetch([]);
    const summary = await runCli('run-once');
    expect(summary).toMatchObject({
      runTimestamp: NOW.toISOString(),
      shipmentsChecked: 2,
      exceptionsFound: 2,
      notificationsSent: 2,
    });
    expect(summary.findings.map((f: { shipmentId: string }) => f.shipmentId)).toEqual(['C2', 'C1']);
  });

  it('history prints stored runs', async () => {
    const out = await runCli('history', '--limit', '5');
    expect(out.runs).toHaveLength(1);
    expect(out.runs[0]).toMatchObject({ shipmentsChecked: 2, exceptionsFound: 2 });
  });

  it('warn runs the delay-warning gate', async () => {
    const result = await runCli('warn', 'C2', '--phone', '+15550100');
    expect(result).toMatchObject({
      warningSent: true,
      shipmentId: 'C2',
      confidence: 0.92,
      predictedDelayHours: 40,
      channels: ['sms'],
    });
  });
});
