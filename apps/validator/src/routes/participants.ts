import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { RouteDeps } from '../app.js';
import { parseOrReply } from './parse.js';

const upsertParticipantSchema = z.object({
  id: z.string().min(1).max(128),
  endpoint: z.string().url(),
  apiKey: z.string().min(1).optional(),
  enabled: z.boolean().optional(),
  metadata: z.record(z.string(), z.unknown()).optional()
});

const setEnabledSchema = z.object({ enabled: z.boolean() });

export async function participantRoutes(app: FastifyInstance, deps: RouteDeps) {
  app.get('/participants', async (req, reply) => {
    if (!deps.access.requireRole(req, reply, 'readonly')) return;
    const includeDisabled = String((req.query as { includeDisabled?: string }).includeDisabled || '').toLowerCase() === 'true';
    return deps.store
      .listParticipants({ enabledOnly: !includeDisabled })
      .map(({ apiKey, ...participant }) => ({ ...participant, hasApiKey: Boolean(apiKey) }));
  });

  app.get('/participants/me', async (req, reply) => {
    if (!deps.access.requireRole(req, reply, 'participant')) return;
    const participantId = deps.access.participantId(req);
    if (!participantId) return reply.code(404).send({ error: 'not_a_participant' });

    const trust = deps.aggregator.current().entries.find((entry) => entry.participantId === participantId);
    return { participantId, trust: trust ?? null };
  });

  app.post('/participants', async (req, reply) => {
    if (!deps.access.requireRole(req, reply, 'admin')) return;
    const body = parseOrReply(upsertParticipantSchema, req.body, reply);
    if (!body) return;

    const { apiKey, ...saved } = deps.store.upsertParticipant(body);
    return reply.code(201).send({ ...saved, hasApiKey: Boolean(apiKey) });
  });

  app.post('/participants/:id/enabled', async (req, reply) => {
    if (!deps.access.requireRole(req, reply, 'admin')) return;
    const body = parseOrReply(setEnabledSchema, req.body, reply);
    if (!body) return;

    const { id } = req.params as { id: string };
    const updated = deps.store.setParticipantEnabled(id, body.enabled);
    if (!updated) return reply.code(404).send({ error: 'not_found' });
    return { id: updated.id, enabled: updated.enabled };
  });
}
