/**
 * src/shared/http/auth-context.ts
 *
 * WHY:
 * - Every authenticated call carries a bearer token; the acting account is resolved
 *   from it ONCE per request, before any controller runs.
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() sets an empty context (all null) on every request.
 * 2. If the request carries a token (Authorization: Bearer <token>, or the legacy
 *    `?token=` query parameter), the resolver is asked for the account.
 * 3. Controllers read req.authContext (or call requireSession()).
 *
 * RULES:
 * - An unknown token is NOT an error here: the context simply stays empty and
 *   requireSession() answers 401.
 * - Basic credentials (login) are left alone; the auth controller parses them.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';

export type Role = 'VOLUNTEER' | 'ORGANIZER';

export type AuthContext = {
  username: string | null;
  role: Role | null;
  token: string | null;
};

export type TokenResolver = (token: string) => Promise<{ username: string; role: Role } | undefined>;

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function extractBearerToken(req: FastifyRequest): string | null {
  const header = req.headers.authorization;
  if (typeof header === 'string') {
    const match = /^Bearer\s+(\S+)$/i.exec(header.trim());
    if (match?.[1]) return match[1];
  }

  const query: unknown = req.query;
  if (isRecord(query) && typeof query.token === 'string' && query.token.length > 0) {
    return query.token;
  }

  return null;
}

export function registerAuthContext(app: FastifyInstance, resolveToken: TokenResolver) {
  app.decorateRequest('authContext', null);

  app.addHook('onRequest', async (req: FastifyRequest) => {
    req.authContext = { username: null, role: null, token: null };

    const token = extractBearerToken(req);
    if (!token) return;

    const account = await resolveToken(token);
    if (!account) return;

    req.authContext = { username: account.username, role: account.role, token };
  });
}
