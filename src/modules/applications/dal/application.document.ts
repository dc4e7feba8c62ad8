/**
 * src/modules/applications/dal/application.document.ts
 *
 * WHY:
 * - applications.json items use snake_case keys (created_at, who_created, ...).
 * - This is the ONLY place that knows them.
 */

import { z } from 'zod';
import { APPLICATION_STATUSES, type Application } from '../application.types';

export const APPLICATIONS_DOCUMENT = 'applications.json';
export const APPLICATIONS_KEY = 'applications';

export const applicationDocumentSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  description: z.string().default(''),
  location: z.object({
    lat: z.number(),
    lng: z.number(),
    landmark: z.string().default(''),
  }),
  created_at: z.string(),
  who_created: z.string(),
  skills: z.array(z.string()).default([]),
  start_time: z.string(),
  end_time: z.string(),
  reward: z.boolean().default(false),
  volunteers: z.array(z.string()).default([]),
  status: z.enum(APPLICATION_STATUSES).default('open'),
});

export type ApplicationDocument = z.infer<typeof applicationDocumentSchema>;

export function toApplication(doc: ApplicationDocument): Application {
  return {
    id: doc.id,
    title: doc.title,
    description: doc.description,
    location: { ...doc.location },
    createdAt: doc.created_at,
    whoCreated: doc.who_created,
    skills: doc.skills,
    startTime: doc.start_time,
    endTime: doc.end_time,
    reward: doc.reward,
    volunteers: doc.volunteers,
    status: doc.status,
  };
}

export function toApplicationDocument(app: Application): ApplicationDocument {
  return {
    id: app.id,
    title: app.title,
    description: app.description,
    location: { ...app.location },
    created_at: app.createdAt,
    who_created: app.whoCreated,
    skills: app.skills,
    start_time: app.startTime,
    end_time: app.endTime,
    reward: app.reward,
    volunteers: app.volunteers,
    status: app.status,
  };
}
