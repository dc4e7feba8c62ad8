import { describe, it, expect } from 'vitest';
import { createTestHasher } from '../../../helpers/test-deps';
import { generateSalt } from '../../../../src/shared/security/salt';
import { Argon2PasswordHasher } from '../../../../src/shared/security/argon2-password-hasher';

describe('Argon2PasswordHasher', () => {
  it('verifies the password it hashed, with the same salt', async () => {
    const hasher = createTestHasher();
    const salt = generateSalt();

    const hash = await hasher.hash('correct horse', salt);
    expect(hash.startsWith('$argon2id$')).toBe(true);

    expect(await hasher.verify('correct horse', salt, hash)).toBe(true);
    expect(await hasher.verify('wrong horse', salt, hash)).toBe(false);
  });

  it('fails when the salt differs', async () => {
    const hasher = createTestHasher();
    const hash = await hasher.hash('correct horse', 'aaaa');

    expect(await hasher.verify('correct horse', 'bbbb', hash)).toBe(false);
  });

  it('fails when the pepper differs', async () => {
    const salt = generateSalt();
    const hash = await createTestHasher('pepper-one-for-tests').hash('pw', salt);

    expect(await createTestHasher('pepper-two-for-tests').verify('pw', salt, hash)).toBe(false);
  });

  it('returns false for a hash it cannot read', async () => {
    const hasher = createTestHasher();

    expect(await hasher.verify('pw', 'salt', 'not-a-hash')).toBe(false);
    expect(await hasher.verify('pw', 'salt', '$argon2id$garbage')).toBe(false);
  });

  it('refuses an empty pepper', () => {
    expect(() => new Argon2PasswordHasher({ pepper: '' })).toThrowError(
      'Argon2PasswordHasher: pepper must not be empty.',
    );
  });
});
