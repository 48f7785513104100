import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply } from 'fastify';
import type { IngestStats } from '../../application/index.js';
import type { SupervisorStatus } from '../../infrastructure/index.js';

export type StatusRoutesOptions = {
  stats: IngestStats;
  supervisor: { status(): SupervisorStatus };
};

/**
 * Operational status routes for the worker.
 *
 * GET /health        — 200 while subscribed, 503 otherwise
 * GET /api/v1/stats  — stream status and ingestion counters
 */
async function statusRoutes(fastify: FastifyInstance, opts: StatusRoutesOptions): Promise<void> {

  fastify.get('/health', async (_request, reply: FastifyReply) => {
    const { state } = opts.supervisor.status();
    if (state === 'subscribed') {
      return reply.status(200).send({ status: 'ok', stream: state });
    }
    return reply.status(503).send({ status: 'unavailable', stream: state });
  });

  fastify.get('/api/v1/stats', async (_request, reply: FastifyReply) => {
    fastify.log.debug('Stats endpoint hit');
    return reply.status(200).send({
      stream: opts.supervisor.status(),
      counters: opts.stats.snapshot(),
    });
  });
}

export default fp(statusRoutes, {
  name: 'status-routes',
  fastify: '5.x',
});
