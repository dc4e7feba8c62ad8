/**
 * src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring.
 * - Users module is a support module (no routes of its own).
 *   Auth and social modules consume its accounts and repo.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { DocumentStore } from '../../shared/store/document-store';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { Logger } from '../../shared/logger/logger';
import { UserRepo } from './dal/user.repo';
import { UserAccount, type UserWriteListener } from './user-account';
import type { UserRole } from './user.types';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: {
  store: DocumentStore;
  passwordHasher: PasswordHasher;
  logger: Logger;
  tokenBytes: number;
  defaultAvatarUrl: string;
  onUserWritten?: UserWriteListener;
}) {
  const userRepo = new UserRepo(deps.store);

  return {
    userRepo,
    account(role: UserRole, username: string): UserAccount {
      return new UserAccount(deps, role, username);
    },
  };
}
