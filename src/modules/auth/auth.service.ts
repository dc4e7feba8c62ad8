/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Orchestrates registration, login and the "my account" operations
 *   (profile, password, skills) for the authenticated user.
 *
 * RULES:
 * - No direct store access (accounts go through UserAccount).
 * - Never store/log raw passwords or tokens.
 * - Rate limit at the start of login (inside the flow).
 *
 * STRUCTURE:
 * - register()/login(): delegate to flows/.
 * - everything else: small methods on top of UserAccount.
 */

import type { Logger } from '../../shared/logger/logger';
import type { RateLimiter } from '../../shared/security/rate-limit';
import { PathLock } from '../../shared/store/path-lock';
import type { DirectoryIndex } from '../directory/directory.types';
import type { UserModule } from '../users/user.module';
import { UserErrors } from '../users/user.errors';
import { toUserProfile, type ProfilePatch, type UserProfile, type UserRole } from '../users/user.types';

import { AuthErrors } from './auth.errors';
import type { AuthResult, BasicCredentials } from './auth.types';
import { executeRegisterFlow, type RegisterParams } from './flows/register/execute-register-flow';
import { executeLoginFlow, type LoginRateLimit } from './flows/login/execute-login-flow';

export type AccountRef = { username: string; role: UserRole };

export class AuthService {
  private readonly registrationLock = new PathLock();

  constructor(
    private readonly deps: {
      users: UserModule;
      directory: DirectoryIndex;
      rateLimiter: RateLimiter;
      loginRateLimit: LoginRateLimit;
      logger: Logger;
    },
  ) {}

  async register(params: RegisterParams): Promise<AuthResult> {
    return executeRegisterFlow(
      { users: this.deps.users, registrationLock: this.registrationLock, logger: this.deps.logger },
      params,
    );
  }

  async login(params: BasicCredentials & { requestId?: string }): Promise<AuthResult> {
    return executeLoginFlow(this.deps, params);
  }

  async me(ref: AccountRef): Promise<UserProfile> {
    const profile = await this.deps.users.account(ref.role, ref.username).getProfile();
    if (!profile) throw UserErrors.userNotFound({ username: ref.username });
    return profile;
  }

  async changePassword(
    ref: AccountRef,
    params: { oldPassword: string; newPassword: string },
  ): Promise<void> {
    const changed = await this.deps.users
      .account(ref.role, ref.username)
      .changePassword(params.oldPassword, params.newPassword);

    if (!changed) {
      throw AuthErrors.passwordChangeRejected({ username: ref.username });
    }
  }

  async updateProfile(ref: AccountRef, patch: ProfilePatch): Promise<UserProfile> {
    const user = await this.deps.users.account(ref.role, ref.username).updateProfile(patch);

    this.deps.logger.info({
      msg: 'auth.profile.updated',
      flow: 'auth.update-profile',
      username: ref.username,
      fields: Object.entries(patch)
        .filter(([, value]) => value !== undefined)
        .map(([key]) => key),
    });

    return toUserProfile(user);
  }

  async getSkills(ref: AccountRef): Promise<string[]> {
    const profile = await this.me(ref);
    return profile.skills;
  }

  async setSkills(ref: AccountRef, skills: string[]): Promise<string[]> {
    const profile = await this.updateProfile(ref, { skills });
    return profile.skills;
  }
}
