import type { FastifyInstance } from 'fastify';
import type { MonitorContext } from '../../services/context.js';
import { delayWarningBodySchema } from '../schemas/monitorSchemas.js';

interface IdParams {
  id: string;
}

export async function shipmentRoutes(app: FastifyInstance, opts: { ctx: MonitorContext }) {
  const { ctx } = opts;

  // Proactive warning; NotFoundError and ClassificationError map in the server error handler
  app.post<{ Params: IdParams }>('/v1/shipments/:id/delay-warning', async (req, reply) => {
    const parsed = delayWarningBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return reply
        .status(400)
        .send({ error: { code: 'VALIDATION_ERROR', message: parsed.error.message } });
    }
    const result = await ctx.delayWarning.warn({ shipmentId: req.params.id, ...parsed.data });
    return reply.status(200).send(result);
  });
}
