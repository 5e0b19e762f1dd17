import { z } from 'zod';
import type { ChallengeSpec, ParticipantProfile } from '../types/domain.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger, type Logger } from './logger.js';

export type DispatchResponse =
  | { ok: true; body: unknown; responseBytes: number; latencyMs: number }
  | { ok: false; error: string; timedOut: boolean; latencyMs: number };

export type DispatchHandle = {
  participantId: string;
  challengeId: string;
  response: Promise<DispatchResponse>;
};

/**
 * Transport between the scheduler and participants. `collect` resolves by the
 * deadline with one entry per participant that answered in time; a missing key
 * means no usable response.
 */
export interface DispatchChannel {
  broadcast(challenge: ChallengeSpec, participantIds: ReadonlySet<string>): Promise<DispatchHandle[]>;
  collect(handles: readonly DispatchHandle[], deadline: number): Promise<Map<string, unknown>>;
}

const TIMED_OUT = Symbol('timed_out');

/** Waits for every handle or the deadline, whichever comes first; later replies are dropped. */
export async function collectBefore(
  handles: readonly DispatchHandle[],
  deadline: number,
  now: () => number = Date.now
): Promise<Map<string, unknown>> {
  const collected = new Map<string, unknown>();
  let open = true;

  const settled = Promise.all(
    handles.map(async (handle) => {
      const response = await handle.response.catch((error: unknown): DispatchResponse => ({
        ok: false,
        error: errorMessage(error, 'dispatch_failed'),
        timedOut: false,
        latencyMs: 0
      }));
      if (open && response.ok) collected.set(handle.participantId, response.body);
    })
  );

  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), Math.max(0, deadline - now()));
  });

  try {
    await Promise.race([settled, expired]);
  } finally {
    open = false;
    clearTimeout(timer);
  }

  return new Map(collected);
}

const planEnvelopeSchema = z.object({ plan: z.unknown() }).strict();

/** Participants may answer with the plan itself or with `{ plan }`. */
function unwrapPlan(parsed: unknown): unknown {
  const envelope = planEnvelopeSchema.safeParse(parsed);
  return envelope.success && envelope.data.plan !== undefined ? envelope.data.plan : parsed;
}

function authHeaders(participant: ParticipantProfile): Headers {
  const headers = new Headers();
  if (participant.apiKey) headers.set('authorization', `Bearer ${participant.apiKey}`);
  return headers;
}

function jsonHeaders(participant: ParticipantProfile): Headers {
  const headers = authHeaders(participant);
  headers.set('content-type', 'application/json');
  return headers;
}

function isTimeoutError(error: unknown): boolean {
  const message = errorMessage(error).toLowerCase();
  return message.includes('timeout') || message.includes('aborted');
}

export type HttpDispatchOptions = {
  resolveParticipant: (id: string) => ParticipantProfile | undefined;
  timeoutMs: number;
  maxResponseBytes: number;
  logger?: Logger;
};

/** Posts each challenge to `${endpoint}/challenge` and reads a flight plan back. */
export class HttpDispatchChannel implements DispatchChannel {
  private readonly log: Logger;

  constructor(private readonly options: HttpDispatchOptions) {
    this.log = (options.logger ?? createLogger()).child({ component: 'dispatch' });
  }

  async broadcast(challenge: ChallengeSpec, participantIds: ReadonlySet<string>): Promise<DispatchHandle[]> {
    const body = JSON.stringify({ challenge });
    return [...participantIds].map((participantId) => ({
      participantId,
      challengeId: challenge.id,
      response: this.request(participantId, body)
    }));
  }

  collect(handles: readonly DispatchHandle[], deadline: number): Promise<Map<string, unknown>> {
    return collectBefore(handles, deadline);
  }

  private async request(participantId: string, body: string): Promise<DispatchResponse> {
    const startedAt = Date.now();
    const participant = this.options.resolveParticipant(participantId);
    if (!participant) {
      this.log.warn({ participantId }, 'participant has no registered endpoint; scored as absent');
      return { ok: false, error: 'unknown_participant', timedOut: false, latencyMs: 0 };
    }

    try {
      const res = await fetch(`${participant.endpoint.replace(/\/+$/, '')}/challenge`, {
        method: 'POST',
        headers: jsonHeaders(participant),
        body,
        signal: AbortSignal.timeout(this.options.timeoutMs)
      });

      if (!res.ok) {
        throw new Error(`participant_http_${res.status}`);
      }

      const raw = await res.text();
      const responseBytes = Buffer.byteLength(raw);
      if (responseBytes > this.options.maxResponseBytes) {
        throw new Error(`response_bytes_exceeded:${responseBytes}>${this.options.maxResponseBytes}`);
      }

      const parsed: unknown = raw ? JSON.parse(raw) : null;
      return { ok: true, body: unwrapPlan(parsed), responseBytes, latencyMs: Date.now() - startedAt };
    } catch (error) {
      return {
        ok: false,
        error: errorMessage(error, 'participant_request_failed'),
        timedOut: isTimeoutError(error),
        latencyMs: Date.now() - startedAt
      };
    }
  }
}

export type MemoryResponder = (challenge: ChallengeSpec) => unknown;

/**
 * In-process channel. Each responder returns the submission, or a promise of
 * it; a responder that throws or rejects counts as no response.
 */
export class MemoryDispatchChannel implements DispatchChannel {
  readonly received: Array<{ participantId: string; challengeId: string }> = [];

  constructor(private readonly responders: ReadonlyMap<string, MemoryResponder>) {}

  async broadcast(challenge: ChallengeSpec, participantIds: ReadonlySet<string>): Promise<DispatchHandle[]> {
    return [...participantIds].map((participantId) => {
      this.received.push({ participantId, challengeId: challenge.id });
      return {
        participantId,
        challengeId: challenge.id,
        response: this.respond(participantId, challenge)
      };
    });
  }

  collect(handles: readonly DispatchHandle[], deadline: number): Promise<Map<string, unknown>> {
    return collectBefore(handles, deadline);
  }

  private async respond(participantId: string, challenge: ChallengeSpec): Promise<DispatchResponse> {
    const startedAt = Date.now();
    const responder = this.responders.get(participantId);
    if (!responder) {
      return { ok: false, error: 'no_responder', timedOut: false, latencyMs: 0 };
    }
    try {
      const body: unknown = await responder(challenge);
      return { ok: true, body, responseBytes: 0, latencyMs: Date.now() - startedAt };
    } catch (error) {
      return { ok: false, error: errorMessage(error), timedOut: false, latencyMs: Date.now() - startedAt };
    }
  }
}
