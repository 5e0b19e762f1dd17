import Fastify, { type FastifyInstance, type FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUI from '@fastify/swagger-ui';
import rateLimit from '@fastify/rate-limit';
import type { LevelWithSilent } from 'pino';
import { challengeRoutes } from './routes/challenges.js';
import { participantRoutes } from './routes/participants.js';
import { roundRoutes } from './routes/rounds.js';
import { trustRoutes } from './routes/trust.js';
import type { AccessControl } from './services/access.js';
import type { ValidatorMetrics } from './services/metrics.js';
import type { RoundScheduler } from './services/scheduler.js';
import type { ValidatorStore } from './services/store.js';
import type { TrustAggregator } from './services/trust.js';

export type RouteDeps = {
  store: ValidatorStore;
  aggregator: TrustAggregator;
  scheduler: RoundScheduler;
  metrics: ValidatorMetrics;
  access: AccessControl;
};

export type ServerOptions = {
  logLevel?: LevelWithSilent;
  rateLimit?: { max: number; timeWindow: string };
  docs?: boolean;
};

export async function buildServer(deps: RouteDeps, options: ServerOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({ logger: { level: options.logLevel ?? 'info' } });
  const startedAt = new WeakMap<FastifyRequest, number>();

  await app.register(cors, { origin: true });
  if (options.docs !== false) {
    await app.register(swagger, { openapi: { info: { title: 'Aerotrial Validator API', version: '0.1.0' } } });
    await app.register(swaggerUI, { routePrefix: '/docs' });
  }
  await app.register(rateLimit, {
    max: options.rateLimit?.max ?? 120,
    timeWindow: options.rateLimit?.timeWindow ?? '1 minute'
  });

  app.addHook('onRequest', async (req) => {
    startedAt.set(req, Date.now());
  });

  app.addHook('onResponse', async (req, reply) => {
    deps.metrics.observeRequest({
      route: req.routeOptions.url || req.url,
      method: req.method,
      statusCode: reply.statusCode,
      durationMs: Date.now() - (startedAt.get(req) ?? Date.now())
    });
  });

  app.addHook('onClose', async () => {
    deps.scheduler.stop();
  });

  await app.register(trustRoutes, deps);
  await app.register(roundRoutes, deps);
  await app.register(participantRoutes, deps);
  await app.register(challengeRoutes, deps);

  app.get('/health', { config: { rateLimit: false } }, async () => ({
    ok: true,
    phase: deps.scheduler.phase,
    lastTrustRound: deps.aggregator.current().round
  }));

  app.get('/metrics', { config: { rateLimit: false } }, async () => {
    return {
      ok: true,
      metrics: deps.metrics.snapshot(),
      store: deps.store.stats(),
      access: deps.access.summary()
    };
  });

  return app;
}
