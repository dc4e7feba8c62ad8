/**
 * src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "require token/role" logic.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch the store or services.
 * - Throws AppError so error-handler maps it consistently.
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';
import type { Role } from './auth-context';

export type RequiredAuthContext = Readonly<{
  username: string;
  role: Role;
  token: string;
}>;

export type RequireSessionOptions = Readonly<{
  role?: Role;
}>;

/**
 * Controller guard: requires a resolved token, and optionally a role.
 *
 * Guard sequence:
 * 1) no resolved account -> 401 "Authentication required"
 * 2) wrong role          -> 403 "Insufficient role."
 */
export function requireSession(
  req: FastifyRequest,
  opts: RequireSessionOptions = {},
): RequiredAuthContext {
  const ctx = req.authContext;
  if (!ctx?.username || !ctx.role || !ctx.token) {
    throw AppError.unauthorized('Authentication required');
  }

  if (opts.role && ctx.role !== opts.role) {
    throw AppError.forbidden('Insufficient role.');
  }

  return { username: ctx.username, role: ctx.role, token: ctx.token };
}
