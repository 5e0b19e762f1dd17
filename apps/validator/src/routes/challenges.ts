import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { RouteDeps } from '../app.js';
import { generate } from '../engine/mapGenerator.js';
import { isDifficultyTier } from '../engine/tiers.js';
import { GenerationError } from '../utils/errors.js';
import { parseOrReply } from './parse.js';

const previewQuerySchema = z.object({
  seed: z.coerce.number().int().min(0).max(0xffffffff),
  tier: z.coerce.number().int().refine(isDifficultyTier, { message: 'tier must be 0, 1, 2 or 3' })
});

export async function challengeRoutes(app: FastifyInstance, deps: RouteDeps) {
  app.get('/challenges/preview', async (req, reply) => {
    if (!deps.access.requireRole(req, reply, 'readonly')) return;
    const query = parseOrReply(previewQuerySchema, req.query, reply);
    if (!query) return;

    try {
      return generate(query.seed, query.tier);
    } catch (error) {
      if (error instanceof GenerationError) {
        return reply.code(422).send({ error: error.code, message: error.message });
      }
      throw error;
    }
  });
}
