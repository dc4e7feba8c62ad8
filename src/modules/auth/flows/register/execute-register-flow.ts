/**
 * src/modules/auth/flows/register/execute-register-flow.ts
 *
 * WHY:
 * - "Flow" = one end-to-end use-case, keeping AuthService thin.
 * - Registration creates the account document and hands back the first token.
 *
 * RULES:
 * - Usernames are unique across BOTH role partitions: a taken username is a
 *   Conflict, never a silent overwrite.
 * - The existence check and the create run under one lock per username, so two
 *   concurrent registrations for the same name cannot both pass the check.
 * - Role-specific fields: skills only for volunteers, specializations only for organizers.
 */

import type { Logger } from '../../../../shared/logger/logger';
import type { PathLock } from '../../../../shared/store/path-lock';
import type { UserModule } from '../../../users/user.module';
import { UserErrors } from '../../../users/user.errors';
import { USER_ROLES, type UserRole } from '../../../users/user.types';
import type { AuthResult } from '../../auth.types';

export type RegisterParams = {
  username: string;
  password: string;
  role: UserRole;
  name: string;
  surname: string;
  email?: string | null;
  skills?: string[];
  specializations?: string[];
  requestId?: string;
};

async function usernameTaken(users: UserModule, username: string): Promise<boolean> {
  for (const role of USER_ROLES) {
    if (await users.account(role, username).exists()) return true;
  }
  return false;
}

export async function executeRegisterFlow(
  deps: {
    users: UserModule;
    registrationLock: PathLock;
    logger: Logger;
  },
  params: RegisterParams,
): Promise<AuthResult> {
  if (params.skills !== undefined && params.role !== 'VOLUNTEER') {
    throw UserErrors.fieldNotForRole('skills');
  }
  if (params.specializations !== undefined && params.role !== 'ORGANIZER') {
    throw UserErrors.fieldNotForRole('specializations');
  }

  // Validates the username before any I/O.
  const account = deps.users.account(params.role, params.username);

  return deps.registrationLock.runExclusive(params.username, async () => {
    if (await usernameTaken(deps.users, params.username)) {
      deps.logger.warn({
        msg: 'auth.register.username_taken',
        flow: 'auth.register',
        requestId: params.requestId,
        username: params.username,
      });
      throw UserErrors.usernameTaken({ username: params.username });
    }

    const user = await account.create(params.password, {
      name: params.name,
      surname: params.surname,
      email: params.email ?? null,
      skills: params.skills,
      specializations: params.specializations,
    });

    deps.logger.info({
      msg: 'auth.register.success',
      flow: 'auth.register',
      requestId: params.requestId,
      username: user.username,
      role: user.role,
    });

    return {
      status: 'AUTHENTICATED',
      username: user.username,
      role: user.role,
      token: user.token,
    };
  });
}
