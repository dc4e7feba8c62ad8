/**
 * src/modules/social/social.schemas.ts
 *
 * WHY:
 * - Request validation for follow / rating endpoints.
 *
 * RULES:
 * - Score range [0, 5] is enforced HERE; the service stores what it is given.
 */

import { z } from 'zod';

export const usernameParamsSchema = z.object({
  username: z.string().min(1, 'Username is required').max(64),
});

export type UsernameParams = z.infer<typeof usernameParamsSchema>;

export const rateSchema = z.object({
  rate: z.number().min(0, 'Rate must be between 0 and 5').max(5, 'Rate must be between 0 and 5'),
  comment: z.string().max(2000).nullish(),
});

export type RateInput = z.infer<typeof rateSchema>;
