/**
 * src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Password hashing must be consistent, safe, and easy to swap.
 * - Services depend on this interface, not on argon2 directly.
 *
 * HOW TO USE:
 * - const salt = generateSalt()
 * - const hash = await hasher.hash(password, salt)
 * - const ok = await hasher.verify(password, salt, hash)
 *
 * RULES:
 * - The per-account salt is stored beside the hash; the pepper never is.
 * - verify() resolves to false on mismatch AND on an unreadable hash. It never rejects.
 */

export interface PasswordHasher {
  hash(plain: string, salt: string): Promise<string>;
  verify(plain: string, salt: string, hash: string): Promise<boolean>;
}
