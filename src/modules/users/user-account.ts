/**
 * src/modules/users/user-account.ts
 *
 * WHY:
 * - One UserAccount = one account document (role + username -> deterministic path).
 * - Owns password operations (hash/verify via PasswordHasher) and token rotation.
 *
 * RULES:
 * - Every mutation persists before returning. No in-memory cache: two UserAccount
 *   instances for the same path always read the file.
 * - Field updates are load -> merge -> save via DocumentStore.update (per-path lock).
 * - Argon2 work happens OUTSIDE the lock. The write then checks that the document
 *   still holds the hash that was verified (compare-and-swap on password_hash),
 *   so a concurrent password change is never silently overwritten.
 * - create() overwrites an existing document. Uniqueness is the caller's job
 *   (see AuthService.register).
 * - verify()/tokenVerify()/changePassword() return booleans, never throw on mismatch.
 */

import type { DocumentStore } from '../../shared/store/document-store';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { Logger } from '../../shared/logger/logger';
import { generateSalt } from '../../shared/security/salt';
import { generatePrefixedToken, tokensEqual } from '../../shared/security/token';

import {
  parseUserDocument,
  profilePatchToFields,
  toNewUserDocument,
} from './dal/user.document';
import { isValidUsername, tokenPrefixForRole, userDocumentPath } from './user.paths';
import { UserErrors } from './user.errors';
import {
  toUserProfile,
  type NewUserProfile,
  type ProfilePatch,
  type User,
  type UserProfile,
  type UserRole,
} from './user.types';

/** Called after every write that changes username/token visibility (index maintenance). */
export type UserWriteListener = (user: User) => void;

export type UserAccountDeps = {
  store: DocumentStore;
  passwordHasher: PasswordHasher;
  logger: Logger;
  tokenBytes: number;
  defaultAvatarUrl: string;
  onUserWritten?: UserWriteListener;
};

export class UserAccount {
  readonly path: string;

  constructor(
    private readonly deps: UserAccountDeps,
    readonly role: UserRole,
    readonly username: string,
  ) {
    if (!isValidUsername(username)) {
      throw UserErrors.invalidUsername({ username });
    }
    this.path = userDocumentPath(role, username);
  }

  private issueToken(): string {
    return generatePrefixedToken(tokenPrefixForRole(this.role), this.deps.tokenBytes);
  }

  private notifyWritten(user: User): void {
    this.deps.onUserWritten?.(user);
  }

  async exists(): Promise<boolean> {
    const result = await this.deps.store.read(this.path);
    return result.status === 'ok';
  }

  /** Current document as a User, or undefined when missing/malformed. */
  async load(): Promise<User | undefined> {
    const document = await this.deps.store.load(this.path);
    return parseUserDocument(document);
  }

  async getProfile(): Promise<UserProfile | undefined> {
    const user = await this.load();
    return user ? toUserProfile(user) : undefined;
  }

  async create(password: string, profile: NewUserProfile): Promise<User> {
    const salt = generateSalt();
    const passwordHash = await this.deps.passwordHasher.hash(password, salt);

    const user: User = {
      username: this.username,
      role: this.role,
      name: profile.name,
      surname: profile.surname,
      email: profile.email ?? null,
      passwordHash,
      salt,
      token: this.issueToken(),
      avatar: this.deps.defaultAvatarUrl,
      skills: this.role === 'VOLUNTEER' ? (profile.skills ?? []) : [],
      specializations: this.role === 'ORGANIZER' ? (profile.specializations ?? []) : [],
      events: [],
      ratings: [],
      followers: [],
      following: [],
    };

    await this.deps.store.save(this.path, toNewUserDocument(user));
    this.notifyWritten(user);

    this.deps.logger.info({
      msg: 'users.account.created',
      flow: 'users.create',
      username: this.username,
      role: this.role,
    });

    return user;
  }

  async verify(password: string): Promise<boolean> {
    const user = await this.load();
    if (!user) return false;
    return this.deps.passwordHasher.verify(password, user.salt, user.passwordHash);
  }

  async tokenVerify(token: string): Promise<boolean> {
    if (!token) return false;
    const user = await this.load();
    if (!user?.token) return false;
    return tokensEqual(user.token, token);
  }

  async changePassword(oldPassword: string, newPassword: string): Promise<boolean> {
    const user = await this.load();
    if (!user) return false;

    const ok = await this.deps.passwordHasher.verify(oldPassword, user.salt, user.passwordHash);
    if (!ok) return false;

    // Fresh salt on every change: the same password never yields a reused input.
    const salt = generateSalt();
    const passwordHash = await this.deps.passwordHasher.hash(newPassword, salt);

    const changed = await this.deps.store.update<boolean>(this.path, (document) => {
      if (document.password_hash !== user.passwordHash) {
        return { write: false, value: false };
      }
      document.password_hash = passwordHash;
      document.salt = salt;
      return { write: true, value: true };
    });

    this.deps.logger.info({
      msg: changed ? 'users.password.changed' : 'users.password.change_conflict',
      flow: 'users.change-password',
      username: this.username,
    });

    return changed;
  }

  async updateProfile(patch: ProfilePatch): Promise<User> {
    if (patch.skills !== undefined && this.role !== 'VOLUNTEER') {
      throw UserErrors.fieldNotForRole('skills', { username: this.username });
    }
    if (patch.specializations !== undefined && this.role !== 'ORGANIZER') {
      throw UserErrors.fieldNotForRole('specializations', { username: this.username });
    }

    const fields = profilePatchToFields(patch);

    const updated = await this.deps.store.update<User | undefined>(this.path, (document) => {
      if (!parseUserDocument(document)) return { write: false, value: undefined };

      Object.assign(document, fields);
      return { write: true, value: parseUserDocument(document) };
    });

    if (!updated) {
      throw UserErrors.userNotFound({ username: this.username });
    }
    return updated;
  }

  /** Issues a new bearer token; the previous one stops working immediately. */
  async rotateToken(): Promise<string> {
    const token = this.issueToken();

    const updated = await this.deps.store.update<User | undefined>(this.path, (document) => {
      if (!parseUserDocument(document)) return { write: false, value: undefined };

      document.token = token;
      return { write: true, value: parseUserDocument(document) };
    });

    if (!updated) {
      throw UserErrors.userNotFound({ username: this.username });
    }

    this.notifyWritten(updated);
    return token;
  }
}
