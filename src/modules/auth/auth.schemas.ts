/**
 * src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Auth module.
 * - Prevents invalid payloads from reaching services.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Username format is checked again by UserAccount (single source: user.paths.ts).
 * - Role-specific fields (skills vs specializations) are checked by the service.
 */

import { z } from 'zod';
import { USER_ROLES } from '../users/user.types';
import { USERNAME_PATTERN } from '../users/user.paths';
import { PASSWORD_MAX_LENGTH, PASSWORD_MIN_LENGTH } from './auth.constants';

const passwordSchema = z
  .string()
  .min(PASSWORD_MIN_LENGTH, `Password must be at least ${PASSWORD_MIN_LENGTH} characters`)
  .max(PASSWORD_MAX_LENGTH);

const tagListSchema = z.array(z.string().trim().min(1).max(100)).max(50);

export const registerSchema = z.object({
  username: z.string().regex(USERNAME_PATTERN, 'Invalid username'),
  password: passwordSchema,
  role: z.enum(USER_ROLES),
  name: z.string().trim().min(1, 'Name is required').max(200),
  surname: z.string().trim().min(1, 'Surname is required').max(200),
  email: z.string().email('Invalid email address').nullish(),
  skills: tagListSchema.optional(),
  specializations: tagListSchema.optional(),
});

export type RegisterInput = z.infer<typeof registerSchema>;

export const changePasswordSchema = z.object({
  oldPassword: z.string().min(1, 'Current password is required'),
  newPassword: passwordSchema,
});

export type ChangePasswordInput = z.infer<typeof changePasswordSchema>;

/** The enumerated mutable profile fields; anything else is stripped. */
export const updateProfileSchema = z
  .object({
    name: z.string().trim().min(1).max(200).optional(),
    surname: z.string().trim().min(1).max(200).optional(),
    email: z.string().email('Invalid email address').nullable().optional(),
    avatar: z.string().min(1).max(2048).optional(),
    skills: tagListSchema.optional(),
    specializations: tagListSchema.optional(),
  })
  .refine((patch) => Object.values(patch).some((v) => v !== undefined), {
    message: 'At least one field is required',
  });

export type UpdateProfileInput = z.infer<typeof updateProfileSchema>;

export const setSkillsSchema = z.object({
  skills: tagListSchema,
});
