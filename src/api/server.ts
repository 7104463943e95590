import Fastify from 'fastify';
import { getLogger } from '../utils/logging.js';
import { ClassificationError, NotFoundError, PersistenceError } from '../core/errors.js';
import type { MonitorContext } from '../services/context.js';
import { registry } from '../metrics/index.js';
import { monitorRoutes } from './routes/monitor.js';
import { shipmentRoutes } from './routes/shipments.js';

export async function buildServer(ctx: MonitorContext) {
  const app = Fastify({ logger: getLogger() });

  app.get('/healthz', async () => {
    const scheduler = ctx.scheduler.info();
    return {
      status: scheduler.state === 'stopped' || scheduler.state === 'stopping' ? 'stopping' : 'ok',
      time: new Date().toISOString(),
      build: {
        version: process.env.npm_package_version || 'dev',
        node: process.version,
      },
      scheduler,
    };
  });

  app.get('/metrics', async (_req, reply) => {
    const body = await registry.metrics();
    reply.header('Content-Type', registry.contentType);
    return reply.send(body);
  });

  await app.register(monitorRoutes, { ctx });
  await app.register(shipmentRoutes, { ctx });

  app.setErrorHandler((error, _req, reply) => {
    if (error instanceof NotFoundError) {
      return reply.status(404).send({ error: { code: 'NOT_FOUND', message: error.message } });
    }
    if (error instanceof PersistenceError) {
      app.log.error({ err: error }, 'persistence-error');
      return reply
        .status(500)
        .send({ error: { code: 'PERSISTENCE_ERROR', message: error.message } });
    }
    if (error instanceof ClassificationError) {
      app.log.warn({ err: error }, 'classification-error');
      return reply
        .status(502)
        .send({ error: { code: 'CLASSIFIER_UNAVAILABLE', message: error.message } });
    }
    if (isValidationError(error)) {
      return reply
        .status(400)
        .send({ error: { code: 'VALIDATION_ERROR', message: error.message } });
    }
    app.log.error({ err: error }, 'Unhandled error');
    return reply
      .status(500)
      .send({ error: { code: 'INTERNAL', message: 'Internal Server Error' } });
  });

  function isValidationError(err: unknown): err is { message: string } {
    if (typeof err !== 'object' || err === null) return false;
    return 'validation' in err && 'message' in err && typeof err.message === 'string';
  }
  return app;
}
