/**
 * src/modules/auth/flows/login/execute-login-flow.ts
 *
 * WHY:
 * - "Flow" = one end-to-end use-case, keeping AuthService thin.
 * - Login = Basic credentials -> password check -> fresh bearer token.
 *
 * RULES:
 * - Rate limit first (per username), before any Argon2 work. A successful login
 *   clears the counter, so the limit bounds consecutive failures.
 * - The token rotates ONLY after the password verified. A failed attempt must
 *   not log the real owner out.
 * - Unknown username and wrong password produce the same error.
 */

import type { Logger } from '../../../../shared/logger/logger';
import type { RateLimiter } from '../../../../shared/security/rate-limit';
import type { DirectoryIndex } from '../../../directory/directory.types';
import type { UserModule } from '../../../users/user.module';
import { isValidUsername } from '../../../users/user.paths';
import { AUTH_RATE_LIMIT_PREFIX } from '../../auth.constants';
import { AuthErrors } from '../../auth.errors';
import type { AuthResult, BasicCredentials } from '../../auth.types';

export type LoginRateLimit = { limit: number; windowSeconds: number };

export async function executeLoginFlow(
  deps: {
    users: UserModule;
    directory: DirectoryIndex;
    rateLimiter: RateLimiter;
    loginRateLimit: LoginRateLimit;
    logger: Logger;
  },
  params: BasicCredentials & { requestId?: string },
): Promise<AuthResult> {
  const rateKey = `${AUTH_RATE_LIMIT_PREFIX}:${params.username.toLowerCase()}`;
  await deps.rateLimiter.hitOrThrow({
    key: rateKey,
    limit: deps.loginRateLimit.limit,
    windowSeconds: deps.loginRateLimit.windowSeconds,
  });

  const fail = (reason: string): never => {
    deps.logger.warn({
      msg: 'auth.login.failed',
      flow: 'auth.login',
      requestId: params.requestId,
      reason,
    });
    throw AuthErrors.invalidCredentials();
  };

  if (!isValidUsername(params.username)) return fail('invalid_username');

  const entry = await deps.directory.findByUsername(params.username);
  if (!entry) return fail('unknown_username');

  const account = deps.users.account(entry.role, params.username);
  const ok = await account.verify(params.password);
  if (!ok) return fail('bad_password');

  const token = await account.rotateToken();
  await deps.rateLimiter.reset(rateKey);

  deps.logger.info({
    msg: 'auth.login.success',
    flow: 'auth.login',
    requestId: params.requestId,
    username: params.username,
    role: entry.role,
  });

  return { status: 'AUTHENTICATED', username: params.username, role: entry.role, token };
}
