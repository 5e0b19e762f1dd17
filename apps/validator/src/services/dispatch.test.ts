import { afterEach, describe, expect, it, vi } from 'vitest';
import { generate } from '../engine/mapGenerator.js';
import type { ParticipantProfile } from '../types/domain.js';
import {
  HttpDispatchChannel,
  MemoryDispatchChannel,
  collectBefore,
  type DispatchHandle,
  type DispatchResponse,
  type MemoryResponder
} from './dispatch.js';
import { silentLogger, type Logger } from './logger.js';

const challenge = generate(7, 0);

const participants: Record<string, ParticipantProfile> = {
  p1: { id: 'p1', endpoint: 'https://p1.test/', apiKey: 'test-key' },
  p2: { id: 'p2', endpoint: 'https://p2.test' }
};

function delayed(ms: number, response: DispatchResponse): Promise<DispatchResponse> {
  return new Promise((resolve) => setTimeout(() => resolve(response), ms));
}

function handle(participantId: string, response: Promise<DispatchResponse>): DispatchHandle {
  return { participantId, challengeId: challenge.id, response };
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('collectBefore', () => {
  it('keeps responses that arrive before the deadline', async () => {
    const collected = await collectBefore(
      [
        handle('fast', delayed(1, { ok: true, body: { plan: 1 }, responseBytes: 1, latencyMs: 1 })),
        handle('failed', delayed(1, { ok: false, error: 'participant_http_500', timedOut: false, latencyMs: 1 }))
      ],
      Date.now() + 1_000
    );

    expect([...collected.entries()]).toEqual([['fast', { plan: 1 }]]);
  });

  it('discards responses that arrive after the deadline', async () => {
    const late = delayed(80, { ok: true, body: 'late', responseBytes: 4, latencyMs: 80 });
    const collected = await collectBefore(
      [handle('late', late), handle('fast', delayed(1, { ok: true, body: 'fast', responseBytes: 4, latencyMs: 1 }))],
      Date.now() + 20
    );

    await late;
    expect([...collected.keys()]).toEqual(['fast']);
  });

  it('treats a rejected handle as no response', async () => {
    const collected = await collectBefore([handle('boom', Promise.reject(new Error('boom')))], Date.now() + 50);
    expect(collected.size).toBe(0);
  });
});

describe('memory dispatch channel', () => {
  it('collects answers from responders and skips the ones that throw', async () => {
    const channel = new MemoryDispatchChannel(
      new Map<string, MemoryResponder>([
        ['ok', (spec) => ({ challengeId: spec.id })],
        [
          'throws',
          () => {
            throw new Error('crashed');
          }
        ]
      ])
    );

    const handles = await channel.broadcast(challenge, new Set(['ok', 'throws', 'missing']));
    const collected = await channel.collect(handles, Date.now() + 100);

    expect(channel.received.map((entry) => entry.participantId)).toEqual(['ok', 'throws', 'missing']);
    expect([...collected.entries()]).toEqual([['ok', { challengeId: challenge.id }]]);
  });
});

describe('http dispatch channel', () => {
  function channel(maxResponseBytes = 1024 * 1024) {
    return new HttpDispatchChannel({
      resolveParticipant: (id) => participants[id],
      timeoutMs: 1_000,
      maxResponseBytes,
      logger: silentLogger()
    });
  }

  it('posts the challenge with bearer auth and unwraps a plan envelope', async () => {
    const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
      new Response(JSON.stringify({ plan: { challengeId: challenge.id } }), { status: 200 })
    );
    vi.stubGlobal('fetch', fetchMock);

    const dispatch = channel();
    const collected = await dispatch.collect(await dispatch.broadcast(challenge, new Set(['p1'])), Date.now() + 1_000);

    expect(collected.get('p1')).toEqual({ challengeId: challenge.id });
    expect(fetchMock).toHaveBeenCalledTimes(1);

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://p1.test/challenge');
    expect(init?.method).toBe('POST');
    const headers = new Headers(init?.headers);
    expect(headers.get('authorization')).toBe('Bearer test-key');
    expect(headers.get('content-type')).toBe('application/json');
    expect(JSON.parse(String(init?.body))).toEqual({ challenge });
  });

  it('passes a bare plan through unchanged', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response(JSON.stringify({ challengeId: 'x', controlSequence: [] }), { status: 200 }))
    );

    const dispatch = channel();
    const collected = await dispatch.collect(await dispatch.broadcast(challenge, new Set(['p2'])), Date.now() + 1_000);

    expect(collected.get('p2')).toEqual({ challengeId: 'x', controlSequence: [] });
  });

  it('drops error statuses, oversized bodies and unknown participants', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async (url: string | URL | Request) =>
        String(url).startsWith('https://p1.test')
          ? new Response('nope', { status: 503 })
          : new Response(JSON.stringify({ padding: 'x'.repeat(64) }), { status: 200 })
      )
    );

    const dispatch = channel(32);
    const handles = await dispatch.broadcast(challenge, new Set(['p1', 'p2', 'ghost']));
    const responses = await Promise.all(handles.map((entry) => entry.response));
    const collected = await dispatch.collect(handles, Date.now() + 1_000);

    expect(collected.size).toBe(0);
    expect(responses.map((response) => (response.ok ? 'ok' : response.error))).toEqual([
      'participant_http_503',
      'response_bytes_exceeded:78>32',
      'unknown_participant'
    ]);
  });

  it('warns when a sampled participant has no registered endpoint', async () => {
    const fetchMock = vi.fn(async () => new Response('{}', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);
    const warn = vi.fn();
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn(), child: () => logger };

    const dispatch = new HttpDispatchChannel({
      resolveParticipant: () => undefined,
      timeoutMs: 1_000,
      maxResponseBytes: 1024,
      logger
    });
    const [handle] = await dispatch.broadcast(challenge, new Set(['chain-only']));

    expect(await handle?.response).toEqual({ ok: false, error: 'unknown_participant', timedOut: false, latencyMs: 0 });
    expect(fetchMock).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith({ participantId: 'chain-only' }, 'participant has no registered endpoint; scored as absent');
  });
});
