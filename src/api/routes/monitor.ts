import type { FastifyInstance } from 'fastify';
import type { MonitorContext } from '../../services/context.js';
import { listRunsQuerySchema, toPublicRun, triggerQuerySchema } from '../schemas/monitorSchemas.js';

export async function monitorRoutes(app: FastifyInstance, opts: { ctx: MonitorContext }) {
  const { ctx } = opts;

  app.get('/v1/monitor/runs', async (req, reply) => {
    const parsed = listRunsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return reply
        .status(400)
        .send({ error: { code: 'VALIDATION_ERROR', message: parsed.error.message } });
    }
    const runs = await ctx.history.list(parsed.data.limit);
    return { runs: runs.map(toPublicRun) };
  });

  app.post('/v1/monitor/trigger', async (req, reply) => {
    const parsed = triggerQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return reply
        .status(400)
        .send({ error: { code: 'VALIDATION_ERROR', message: parsed.error.message } });
    }
    const result = ctx.scheduler.trigger();
    if (!result.accepted) {
      return result.reason === 'in_flight'
        ? reply
            .status(409)
            .send({ error: { code: 'RUN_IN_FLIGHT', message: 'A monitor cycle is already running' } })
        : reply
            .status(503)
            .send({ error: { code: 'SCHEDULER_STOPPED', message: 'Scheduler is shutting down' } });
    }
    if (!parsed.data.wait) {
      // Cycle failures are logged by the scheduler
      void result.run;
      return reply.status(202).send({ accepted: true });
    }
    const run = await result.run;
    if (!run) throw new Error('Monitor cycle failed');
    return reply.status(200).send({
      accepted: true,
      run: {
        runId: run.runId,
        recordId: run.recordId,
        runTimestamp: run.record.runTimestamp.toISOString(),
        shipmentsChecked: run.record.shipmentsChecked,
        exceptionsFound: run.record.exceptionsFound,
        notificationsSent: run.record.notificationsSent,
        runDurationMs: run.record.runDurationMs,
        ...(run.record.error ? { error: run.record.error } : {}),
        deadlineExceeded: run.deadlineExceeded,
        ruleErrors: run.ruleErrors,
      },
    });
  });
}
