import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { buildServer } from '../../src/api/server.js';
import { loadConfig } from '../../src/config/index.js';
import { createMonitorContext, type MonitorContext } from '../../src/services/context.js';
import { StaticSnapshotProvider } from '../../src/services/snapshotProvider.js';

let ctx: MonitorContext;

beforeAll(async () => {
  ctx = await createMonitorContext(loadConfig('nonexistent-config.json'), {
    provider: new StaticSnapshotProvider([]),
  });
});

describe('health endpoint', () => {
  it('returns ok with enriched fields', async () => {
    const s = await buildServer(ctx);
    const res = await s.inject({ method: 'GET', url: '/healthz' });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.status).toBe('ok');
    expect(body).toHaveProperty('build.version');
    expect(body).toHaveProperty('scheduler.state', 'idle');
    expect(body).toHaveProperty('scheduler.lastRun', null);
    await s.close();
  });

  it('reports stopping once the scheduler is stopped', async () => {
    await ctx.scheduler.stop();
    const s = await buildServer(ctx);
    const res = await s.inject({ method: 'GET', url: '/healthz' });
    expect(res.json().status).toBe('stopping');
    await s.close();
  });
});

afterAll(async () => {
  await ctx.close();
});
