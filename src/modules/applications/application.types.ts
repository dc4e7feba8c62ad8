/**
 * src/modules/applications/application.types.ts
 *
 * WHY:
 * - Domain types for volunteering applications (an organizer's call for help).
 *
 * RULES:
 * - Keep aligned with the collection item (dal/application.document.ts maps both ways).
 * - Soft delete only: status 'deleted', the record stays in the collection.
 */

export const APPLICATION_STATUSES = ['open', 'closed', 'deleted'] as const;

export type ApplicationStatus = (typeof APPLICATION_STATUSES)[number];

export type GeoLocation = {
  lat: number;
  lng: number;
  landmark: string;
};

export type Application = {
  id: number;
  title: string;
  description: string;
  location: GeoLocation;
  createdAt: string;
  whoCreated: string;
  skills: string[];
  startTime: string;
  endTime: string;
  reward: boolean;
  volunteers: string[];
  status: ApplicationStatus;
};

/** Fields a creator supplies (create) or replaces wholesale (update). */
export type ApplicationInput = {
  title: string;
  description: string;
  location: GeoLocation;
  skills: string[];
  startTime: string;
  endTime: string;
  reward: boolean;
};
