/**
 * src/shared/security/argon2-password-hasher.ts
 *
 * WHY:
 * - Argon2id is memory-hard and time-costed; cost parameters come from config.
 * - We encapsulate it behind PasswordHasher so the rest of the app stays clean.
 *
 * INPUT:
 * - argon2 hashes `password + salt + pepper`. The argon2 string carries its own
 *   internal salt and parameters, so verify() needs no cost options.
 *
 * HOW TO USE:
 * - const hasher = new Argon2PasswordHasher({ pepper, timeCost: 4, memoryCost: 102400 })
 * - const hash = await hasher.hash('secret', salt)
 * - const ok = await hasher.verify('secret', salt, hash)
 */

import * as argon2 from 'argon2';
import type { PasswordHasher } from './password-hasher';
import type { Logger } from '../logger/logger';

export type Argon2Options = {
  pepper: string;
  timeCost?: number;
  memoryCost?: number;
  parallelism?: number;
  hashLength?: number;
  logger?: Logger;
};

export class Argon2PasswordHasher implements PasswordHasher {
  private readonly pepper: string;
  private readonly timeCost: number;
  private readonly memoryCost: number;
  private readonly parallelism: number;
  private readonly hashLength: number;
  private readonly logger?: Logger;

  constructor(opts: Argon2Options) {
    if (!opts.pepper) {
      throw new Error('Argon2PasswordHasher: pepper must not be empty.');
    }

    this.pepper = opts.pepper;
    this.timeCost = opts.timeCost ?? 4;
    this.memoryCost = opts.memoryCost ?? 102400;
    this.parallelism = opts.parallelism ?? 8;
    this.hashLength = opts.hashLength ?? 64;
    this.logger = opts.logger;
  }

  private season(plain: string, salt: string): string {
    return `${plain}${salt}${this.pepper}`;
  }

  async hash(plain: string, salt: string): Promise<string> {
    return argon2.hash(this.season(plain, salt), {
      type: argon2.argon2id,
      timeCost: this.timeCost,
      memoryCost: this.memoryCost,
      parallelism: this.parallelism,
      hashLength: this.hashLength,
    });
  }

  async verify(plain: string, salt: string, hash: string): Promise<boolean> {
    if (!hash.startsWith('$argon2')) {
      this.logger?.warn({ msg: 'security.password_hash_unreadable', flow: 'security.verify' });
      return false;
    }

    try {
      return await argon2.verify(hash, this.season(plain, salt));
    } catch (err: unknown) {
      // argon2 rejects on a corrupted hash string; that is a failed check, not a crash.
      this.logger?.warn({
        msg: 'security.password_hash_unreadable',
        flow: 'security.verify',
        message: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
  }
}
