import type { FastifyInstance } from 'fastify';
import type { RouteDeps } from '../app.js';

export async function trustRoutes(app: FastifyInstance, deps: RouteDeps) {
  app.get('/trust', async (req, reply) => {
    if (!deps.access.requireRole(req, reply, 'readonly')) return;

    const published = deps.store.latestPublishedSnapshot();
    return {
      ok: true,
      current: deps.aggregator.current(),
      published: published ?? null
    };
  });

  app.get('/trust/:participantId', async (req, reply) => {
    if (!deps.access.requireRole(req, reply, 'readonly')) return;

    const { participantId } = req.params as { participantId: string };
    const entry = deps.aggregator.current().entries.find((candidate) => candidate.participantId === participantId);
    if (!entry) return reply.code(404).send({ error: 'not_found' });
    return entry;
  });
}
