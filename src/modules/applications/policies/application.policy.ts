/**
 * src/modules/applications/policies/application.policy.ts
 *
 * WHY:
 * - Ownership and lifecycle rules for applications.
 * - Pure logic (no I/O) => easy to unit test.
 */

import type { Application } from '../application.types';
import { ApplicationErrors } from '../application.errors';

export function assertApplicationExists(
  app: Application | undefined,
  id: number,
): asserts app is Application {
  if (!app) throw ApplicationErrors.applicationNotFound({ applicationId: id });
}

export function assertIsCreator(app: Application, username: string): void {
  if (app.whoCreated !== username) {
    throw ApplicationErrors.notCreator({ applicationId: app.id, username });
  }
}

export function assertIsOpen(app: Application): void {
  if (app.status !== 'open') {
    throw ApplicationErrors.applicationNotOpen({ applicationId: app.id, status: app.status });
  }
}
