import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from 'vitest';
import { buildServer } from '../../src/api/server.js';
import { loadConfig } from '../../src/config/index.js';
import { ClassificationError, PersistenceError } from '../../src/core/errors.js';
import { InMemoryRunHistoryRepository } from '../../src/repositories/runHistoryRepository.js';
import { createMonitorContext, type MonitorContext } from '../../src/services/context.js';
import type { MonitorRunResult } from '../../src/services/monitorService.js';
import { StaticSnapshotProvider } from '../../src/services/snapshotProvider.js';
import { stubFetch } from '../utils/fetchStub.js';
import { NOW, delayedBy, makeSnapshot } from '../utils/fixtures.js';

type App = Awaited<ReturnType<typeof buildServer>>;

const fleet = [
  delayedBy(30, { shipmentId: 'A', mlDelayConfidence: 0.9, mlRiskFactors: ['weather'] }),
  makeSnapshot({ shipmentId: 'B', mlDelayConfidence: 0.5 }),
];

async function setup(overrides: Parameters<typeof createMonitorContext>[1] = {}) {
  const ctx = await createMonitorContext(loadConfig('nonexistent-config.json'), {
    history: new InMemoryRunHistoryRepository(),
    provider: new StaticSnapshotProvider(fleet),
    clock: () => NOW,
    ...overrides,
  });
  const app = await buildServer(ctx);
  return { ctx, app };
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('monitor API', () => {
  let ctx: MonitorContext;
  let app: App;

  beforeAll(async () => {
    ({ ctx, app } = await setup());
  });

  afterAll(async () => {
    await app.close();
    await ctx.close();
  });

  it('reports scheduler health', async () => {
    const res = await app.inject({ method: 'GET', url: '/healthz' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: 'ok', scheduler: { state: 'idle', totalRuns: 0 } });
  });

  it('runs a cycle on demand and lists it', async () => {
    stubFetch([]);
    const trigger = await app.inject({ method: 'POST', url: '/v1/monitor/trigger?wait=true' });
    expect(trigger.statusCode).toBe(200);
    expect(trigger.json()).toMatchObject({
      accepted: true,
      run: { shipmentsChecked: 2, exceptionsFound: 2, notificationsSent: 2, deadlineExceeded: false },
    });

    const runs = await app.inject({ method: 'GET', url: '/v1/monitor/runs?limit=1' });
    expect(runs.statusCode).toBe(200);
    const body = runs.json();
    expect(body.runs).toHaveLength(1);
    expect(body.runs[0]).toMatchObject({ shipmentsChecked: 2, exceptionsFound: 2, notificationsSent: 2 });
    expect(body.runs[0].id).toBe(trigger.json().run.recordId);
  });

  it.each(['0', '501', 'abc'])('rejects limit=%s', async (limit) => {
    const res = await app.inject({ method: 'GET', url: `/v1/monitor/runs?limit=${limit}` });
    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe('VALIDATION_ERROR');
  });

  it('exposes prometheus metrics', async () => {
    const res = await app.inject({ method: 'GET', url: '/metrics' });
    expect(res.statusCode).toBe(200);
    expect(res.body).toMatch(/monitor_runs_total\{outcome="ok"\} 1/);
    expect(res.body).toMatch(/monitor_notifications_sent_total\{type="delay"\} 1/);
  });

  it('sends a proactive delay warning', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/v1/shipments/A/delay-warning',
      payload: { email: 'ops@example.com', language: 'es' },
    });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      warningSent: true,
      shipmentId: 'A',
      confidence: 0.9,
      threshold: 0.7,
      riskFactors: ['weather'],
      channels: ['email'],
      language: 'es',
    });
  });

  it('declines a warning below the threshold', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/v1/shipments/B/delay-warning',
      payload: { email: 'ops@example.com' },
    });
    expect(res.json()).toEqual({
      shipmentId: 'B',
      warningSent: false,
      reason: 'below_threshold',
      confidence: 0.5,
      threshold: 0.7,
    });
  });

  it('returns 404 for an unknown shipment', async () => {
    const res = await app.inject({ method: 'POST', url: '/v1/shipments/Z/delay-warning', payload: {} });
    expect(res.statusCode).toBe(404);
    expect(res.json().error.code).toBe('NOT_FOUND');
  });

  it('validates the warning body', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/v1/shipments/A/delay-warning',
      payload: { email: 'not-an-email' },
    });
    expect(res.statusCode).toBe(400);
  });
});

describe('monitor API single-flight', () => {
  it('returns 409 while a cycle is in flight and 503 once stopped', async () => {
    let release: () => void = () => {};
    const runner = {
      runOnce: () =>
        new Promise<MonitorRunResult>((_resolve, reject) => {
          release = () => reject(new Error('released'));
        }),
    };
    const { ctx, app } = await setup({ runner });

    const first = await app.inject({ method: 'POST', url: '/v1/monitor/trigger' });
    expect(first.statusCode).toBe(202);
    expect(first.json()).toEqual({ accepted: true });

    const second = await app.inject({ method: 'POST', url: '/v1/monitor/trigger' });
    expect(second.statusCode).toBe(409);
    expect(second.json().error.code).toBe('RUN_IN_FLIGHT');

    const stopping = ctx.scheduler.stop();
    const third = await app.inject({ method: 'POST', url: '/v1/monitor/trigger' });
    expect(third.statusCode).toBe(503);
    expect(third.json().error.code).toBe('SCHEDULER_STOPPED');

    release();
    await stopping;
    await app.close();
    await ctx.close();
  });
});

describe('monitor API error mapping', () => {
  it('maps persistence failures to 500', async () => {
    const history = new InMemoryRunHistoryRepository();
    vi.spyOn(history, 'list').mockRejectedValue(new PersistenceError('Failed to list monitor runs'));
    const { ctx, app } = await setup({ history });
    const res = await app.inject({ method: 'GET', url: '/v1/monitor/runs' });
    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({
      error: { code: 'PERSISTENCE_ERROR', message: 'Failed to list monitor runs' },
    });
    await app.close();
    await ctx.close();
  });

  it('maps classifier failures to 502', async () => {
    const { ctx, app } = await setup({
      classifier: {
        async predict() {
          throw new ClassificationError('Prediction service responded 503');
        },
      },
    });
    const res = await app.inject({
      method: 'POST',
      url: '/v1/shipments/A/delay-warning',
      payload: { email: 'ops@example.com' },
    });
    expect(res.statusCode).toBe(502);
    expect(res.json().error.code).toBe('CLASSIFIER_UNAVAILABLE');
    await app.close();
    await ctx.close();
  });
});
