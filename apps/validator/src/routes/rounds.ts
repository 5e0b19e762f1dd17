import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { RouteDeps } from '../app.js';
import { ROUND_STATUSES } from '../types/domain.js';
import { parseOrReply } from './parse.js';

const listRoundsQuerySchema = z.object({
  status: z.enum(ROUND_STATUSES).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50)
});

export async function roundRoutes(app: FastifyInstance, deps: RouteDeps) {
  app.get('/rounds', async (req, reply) => {
    if (!deps.access.requireRole(req, reply, 'readonly')) return;
    const query = parseOrReply(listRoundsQuerySchema, req.query, reply);
    if (!query) return;
    return deps.store.listRounds(query);
  });

  app.get('/rounds/:id', async (req, reply) => {
    if (!deps.access.requireRole(req, reply, 'readonly')) return;
    const { id } = req.params as { id: string };
    const round = deps.store.getRound(id);
    if (!round) return reply.code(404).send({ error: 'not_found' });
    return round;
  });

  app.get('/rounds/status', async (req, reply) => {
    if (!deps.access.requireRole(req, reply, 'readonly')) return;
    return {
      phase: deps.scheduler.phase,
      inFlight: deps.scheduler.inFlight,
      stopped: deps.scheduler.stopped,
      lastTrustRound: deps.aggregator.current().round
    };
  });

  app.post('/rounds/run', async (req, reply) => {
    if (!deps.access.requireRole(req, reply, 'operator')) return;
    if (deps.scheduler.inFlight) {
      return reply.code(409).send({ error: 'round_in_flight', phase: deps.scheduler.phase });
    }

    const round = await deps.scheduler.runOneRound();
    return { ok: round.status === 'published', round };
  });
}
