/**
 * src/modules/applications/application.schemas.ts
 *
 * WHY:
 * - Request validation for the /applications endpoints.
 * - Wire format is snake_case (start_time, end_time), matching the stored items.
 */

import { z } from 'zod';
import { APPLICATION_STATUSES } from './application.types';

export const applicationIdParamsSchema = z.object({
  id: z.coerce.number().int().min(1, 'Invalid application id'),
});

export const applicationBodySchema = z.object({
  title: z.string().min(1, 'Title is required').max(200),
  description: z.string().max(5000).default(''),
  location: z.object({
    lat: z.number().min(-90).max(90),
    lng: z.number().min(-180).max(180),
    landmark: z.string().max(200).default(''),
  }),
  skills: z.array(z.string().min(1).max(100)).max(50).default([]),
  start_time: z.string().min(1, 'start_time is required'),
  end_time: z.string().min(1, 'end_time is required'),
  reward: z.boolean().default(false),
});

export type ApplicationBody = z.infer<typeof applicationBodySchema>;

export const applicationStatusBodySchema = z.object({
  status: z.enum(APPLICATION_STATUSES),
});

export const applicationListQuerySchema = z.object({
  status: z.enum(APPLICATION_STATUSES).optional(),
});
