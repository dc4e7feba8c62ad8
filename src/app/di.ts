/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra ONCE (document store, hasher, cache) and shares it safely.
 * - Keeps modules testable (tests inject an in-memory store).
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (e.g. disable rate limits in test) belong HERE,
 *   not inside the classes themselves (DIP).
 * - The directory index hears about every account write through `onUserWritten`;
 *   this is the only place the two are connected.
 */

import type { AppConfig } from './config';

import type { DocumentStore } from '../shared/store/document-store';
import { JsonFileStore } from '../shared/store/json-file-store';

import { InMemCache } from '../shared/cache/inmem-cache';
import type { Cache } from '../shared/cache/cache';

import { RateLimiter } from '../shared/security/rate-limit';
import type { PasswordHasher } from '../shared/security/password-hasher';
import { Argon2PasswordHasher } from '../shared/security/argon2-password-hasher';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { createDirectoryModule } from '../modules/directory/directory.module';
import type { DirectoryModule } from '../modules/directory/directory.module';

import { createUserModule } from '../modules/users/user.module';
import type { UserModule } from '../modules/users/user.module';

import { createAuthModule } from '../modules/auth/auth.module';
import type { AuthModule } from '../modules/auth/auth.module';

import { createSocialModule } from '../modules/social/social.module';
import type { SocialModule } from '../modules/social/social.module';

import { createApplicationModule } from '../modules/applications/application.module';
import type { ApplicationModule } from '../modules/applications/application.module';

import { createEventModule } from '../modules/events/event.module';
import type { EventModule } from '../modules/events/event.module';

export type AppDeps = {
  store: DocumentStore;
  cache: Cache;

  logger: Logger;

  rateLimiter: RateLimiter;
  passwordHasher: PasswordHasher;

  // modules
  directory: DirectoryModule;
  users: UserModule;
  auth: AuthModule;
  social: SocialModule;
  applications: ApplicationModule;
  events: EventModule;

  // lifecycle
  close: () => Promise<void>;
};

export type BuildDepsOverrides = {
  store?: DocumentStore;
  passwordHasher?: PasswordHasher;
};

export function buildDeps(config: AppConfig, overrides: BuildDepsOverrides = {}): AppDeps {
  const store: DocumentStore = overrides.store ?? new JsonFileStore(config.dataRoot, logger);

  const passwordHasher: PasswordHasher =
    overrides.passwordHasher ??
    new Argon2PasswordHasher({
      pepper: config.passwordPepper,
      ...config.argon2,
      logger,
    });

  const cache: Cache = new InMemCache();

  // Composition root decides when rate limiting is disabled.
  // The RateLimiter class itself has no knowledge of environments.
  const rateLimiter = new RateLimiter(cache, {
    prefix: 'rl',
    disabled: config.nodeEnv === 'test',
  });

  // modules (no HTTP / no business logic here)
  const directory = createDirectoryModule({ store, logger, mode: config.directoryIndex });

  const users = createUserModule({
    store,
    passwordHasher,
    logger,
    tokenBytes: config.tokenBytes,
    defaultAvatarUrl: config.defaultAvatarUrl,
    onUserWritten: (user) => directory.directory.record(user),
  });

  const auth = createAuthModule({
    users,
    directory: directory.directory,
    rateLimiter,
    loginRateLimit: config.loginRateLimit,
    logger,
  });

  const social = createSocialModule({
    directory: directory.directory,
    userRepo: users.userRepo,
    logger,
  });

  const applications = createApplicationModule({ store, logger });
  const events = createEventModule({ store, userRepo: users.userRepo, logger });

  return {
    store,
    cache,
    logger,
    rateLimiter,
    passwordHasher,
    directory,
    users,
    auth,
    social,
    applications,
    events,
    // Nothing to release: the file store holds no open handles.
    close: () => Promise.resolve(),
  };
}
