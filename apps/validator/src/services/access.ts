import type { FastifyReply, FastifyRequest } from 'fastify';
import type { RegisteredParticipant } from '../types/domain.js';

export type AccessRole = 'public' | 'readonly' | 'participant' | 'operator' | 'admin';

export type AccessKeys = {
  admin?: string;
  operator?: string;
  readonly?: string;
  allowPublicRead: boolean;
};

type AccessContext = {
  role: AccessRole;
  participantId?: string;
};

const ROLE_LEVEL: Record<AccessRole, number> = {
  public: 0,
  readonly: 1,
  participant: 2,
  operator: 3,
  admin: 4
};

function extractApiKey(req: FastifyRequest): string | undefined {
  const authHeader = req.headers.authorization;
  if (authHeader?.toLowerCase().startsWith('bearer ')) {
    return authHeader.slice(7).trim();
  }

  const xApiKey = req.headers['x-api-key'];
  if (typeof xApiKey === 'string') return xApiKey.trim();
  if (Array.isArray(xApiKey)) return xApiKey[0]?.trim();
  return undefined;
}

export function createAccessControl(
  keys: AccessKeys,
  findParticipantByApiKey: (apiKey: string) => RegisteredParticipant | undefined
) {
  const contexts = new WeakMap<FastifyRequest, AccessContext>();

  function participantContext(token: string): AccessContext | undefined {
    const participant = findParticipantByApiKey(token);
    return participant ? { role: 'participant', participantId: participant.id } : undefined;
  }

  function resolve(req: FastifyRequest): AccessContext {
    const token = extractApiKey(req);
    const hasAnyKey = Boolean(keys.admin || keys.operator || keys.readonly);

    // no keys configured: local development, everyone is admin
    if (!hasAnyKey) {
      return (token && participantContext(token)) || { role: 'admin' };
    }

    if (!token) return { role: keys.allowPublicRead ? 'readonly' : 'public' };
    if (keys.admin && token === keys.admin) return { role: 'admin' };
    if (keys.operator && token === keys.operator) return { role: 'operator' };
    if (keys.readonly && token === keys.readonly) return { role: 'readonly' };
    return participantContext(token) ?? { role: 'public' };
  }

  function context(req: FastifyRequest): AccessContext {
    const cached = contexts.get(req);
    if (cached) return cached;
    const resolved = resolve(req);
    contexts.set(req, resolved);
    return resolved;
  }

  return {
    role(req: FastifyRequest): AccessRole {
      return context(req).role;
    },

    participantId(req: FastifyRequest): string | undefined {
      return context(req).participantId;
    },

    requireRole(req: FastifyRequest, reply: FastifyReply, role: AccessRole): boolean {
      const actualRole = context(req).role;
      if (ROLE_LEVEL[actualRole] >= ROLE_LEVEL[role]) return true;

      reply.code(401).send({
        error: 'unauthorized',
        requiredRole: role,
        currentRole: actualRole
      });
      return false;
    },

    summary() {
      return {
        allowPublicRead: keys.allowPublicRead,
        hasAdminKey: Boolean(keys.admin),
        hasOperatorKey: Boolean(keys.operator),
        hasReadonlyKey: Boolean(keys.readonly),
        acceptsParticipantApiKeys: true
      };
    }
  };
}

export type AccessControl = ReturnType<typeof createAccessControl>;
