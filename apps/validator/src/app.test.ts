import type { FastifyInstance } from 'fastify';
import { afterEach, describe, expect, it } from 'vitest';
import { buildServer } from './app.js';
import { generate } from './engine/mapGenerator.js';
import { createAccessControl } from './services/access.js';
import { MemoryDispatchChannel, type MemoryResponder } from './services/dispatch.js';
import { LocalLedgerClient } from './services/ledger.js';
import { silentLogger } from './services/logger.js';
import { createMetrics } from './services/metrics.js';
import { RoundScheduler } from './services/scheduler.js';
import { createStore, openDatabase } from './services/store.js';
import { TrustAggregator } from './services/trust.js';

const DRONE = { model: 'unit-test', mass: 1, maxThrust: 10, maxYawRate: 1, batteryCapacity: 100 };

const hover: MemoryResponder = (challenge) => ({
  challengeId: challenge.id,
  controlSequence: [{ t: 0, thrust: { x: 0, y: 0, z: 0 }, yawRate: 0 }],
  declaredCapability: DRONE
});

const ADMIN = { authorization: 'Bearer test-admin' };
const OPERATOR = { authorization: 'Bearer test-operator' };
const PARTICIPANT = { authorization: 'Bearer test-key-p1' };

let app: FastifyInstance | undefined;

afterEach(async () => {
  await app?.close();
  app = undefined;
});

async function setup() {
  const store = createStore(openDatabase(':memory:'));
  const aggregator = new TrustAggregator(store.trust);
  const metrics = createMetrics();
  const scheduler = new RoundScheduler(
    {
      ledger: new LocalLedgerClient(store),
      dispatch: new MemoryDispatchChannel(new Map([['p1', hover]])),
      aggregator,
      logger: silentLogger(),
      recorder: store,
      metrics,
      replayOptions: { capabilities: [DRONE] },
      seedSource: () => 42
    },
    { roundTimeoutMs: 50, sampleSize: 16, tiers: [0] }
  );
  const access = createAccessControl(
    { admin: 'test-admin', operator: 'test-operator', allowPublicRead: true },
    (apiKey) => store.findParticipantByApiKey(apiKey)
  );

  app = await buildServer({ store, aggregator, scheduler, metrics, access }, { logLevel: 'silent', docs: false });
  return { app, store };
}

async function registerP1(server: FastifyInstance) {
  return server.inject({
    method: 'POST',
    url: '/participants',
    headers: ADMIN,
    payload: { id: 'p1', endpoint: 'https://p1.test', apiKey: 'test-key-p1' }
  });
}

describe('validator api', () => {
  it('reports health', async () => {
    const { app } = await setup();
    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true, phase: 'idle', lastTrustRound: 0 });
  });

  it('guards participant registration by role', async () => {
    const { app } = await setup();

    const anonymous = await app.inject({
      method: 'POST',
      url: '/participants',
      payload: { id: 'p1', endpoint: 'https://p1.test' }
    });
    expect(anonymous.statusCode).toBe(401);
    expect(anonymous.json()).toEqual({ error: 'unauthorized', requiredRole: 'admin', currentRole: 'readonly' });

    const invalid = await app.inject({
      method: 'POST',
      url: '/participants',
      headers: ADMIN,
      payload: { id: 'p1', endpoint: 'not a url' }
    });
    expect(invalid.statusCode).toBe(400);
    expect(invalid.json().error).toBe('invalid_request');

    const created = await registerP1(app);
    expect(created.statusCode).toBe(201);
    const body = created.json();
    expect(body.id).toBe('p1');
    expect(body.hasApiKey).toBe(true);
    expect(body).not.toHaveProperty('apiKey');

    const listed = await app.inject({ method: 'GET', url: '/participants' });
    expect(listed.json().map((participant: { id: string }) => participant.id)).toEqual(['p1']);
  });

  it('runs a round on demand and exposes its record and trust', async () => {
    const { app } = await setup();
    await registerP1(app);

    const before = await app.inject({ method: 'GET', url: '/participants/me', headers: PARTICIPANT });
    expect(before.json()).toEqual({ participantId: 'p1', trust: null });

    const denied = await app.inject({ method: 'POST', url: '/rounds/run' });
    expect(denied.statusCode).toBe(401);

    const run = await app.inject({ method: 'POST', url: '/rounds/run', headers: OPERATOR });
    expect(run.statusCode).toBe(200);
    const { ok, round } = run.json();
    expect(ok).toBe(true);
    expect(round.round).toBe(1);
    expect(round.status).toBe('published');
    expect(round.challengeId).toBe(generate(42, 0).id);

    const list = await app.inject({ method: 'GET', url: '/rounds' });
    expect(list.json().map((record: { id: string }) => record.id)).toEqual([round.id]);

    const single = await app.inject({ method: 'GET', url: `/rounds/${round.id}` });
    expect(single.json()).toEqual(round);

    const missing = await app.inject({ method: 'GET', url: '/rounds/round_404' });
    expect(missing.statusCode).toBe(404);

    const trust = await app.inject({ method: 'GET', url: '/trust' });
    expect(trust.json().current.round).toBe(1);
    expect(trust.json().published.round).toBe(1);

    const entry = await app.inject({ method: 'GET', url: '/trust/p1' });
    expect(entry.json().participantId).toBe('p1');
    expect(entry.json().lastRound).toBe(1);

    const me = await app.inject({ method: 'GET', url: '/participants/me', headers: PARTICIPANT });
    expect(me.json().trust.participantId).toBe('p1');

    const status = await app.inject({ method: 'GET', url: '/rounds/status' });
    expect(status.json()).toEqual({ phase: 'idle', inFlight: false, stopped: false, lastTrustRound: 1 });
  });

  it('previews challenges and validates the tier', async () => {
    const { app } = await setup();

    const preview = await app.inject({ method: 'GET', url: '/challenges/preview?seed=42&tier=0' });
    expect(preview.statusCode).toBe(200);
    expect(preview.json().id).toBe(generate(42, 0).id);

    const badTier = await app.inject({ method: 'GET', url: '/challenges/preview?seed=42&tier=7' });
    expect(badTier.statusCode).toBe(400);
    expect(badTier.json().error).toBe('invalid_request');
  });

  it('reports store and access metrics', async () => {
    const { app } = await setup();
    await registerP1(app);

    const res = await app.inject({ method: 'GET', url: '/metrics' });
    const body = res.json();

    expect(body.ok).toBe(true);
    expect(body.store.participants).toBe(1);
    expect(body.store.rounds).toBe(0);
    expect(body.access).toEqual({
      allowPublicRead: true,
      hasAdminKey: true,
      hasOperatorKey: true,
      hasReadonlyKey: false,
      acceptsParticipantApiKeys: true
    });
  });
});
