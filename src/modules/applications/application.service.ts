/**
 * src/modules/applications/application.service.ts
 *
 * WHY:
 * - Orchestrates the application lifecycle: create, edit, status changes,
 *   soft delete and volunteer sign-up.
 *
 * RULES:
 * - Ownership/lifecycle checks run INSIDE the repo's change callback, i.e. under
 *   the collection lock, so they see the version that gets written.
 * - update() replaces the editable fields wholesale; id, created_at, who_created,
 *   volunteers and status always survive.
 * - list()/listByCreator() hide deleted applications unless a status is asked for.
 */

import type { Logger } from '../../shared/logger/logger';
import type { ApplicationRepo } from './dal/application.repo';
import {
  assertApplicationExists,
  assertIsCreator,
  assertIsOpen,
} from './policies/application.policy';
import type { Application, ApplicationInput, ApplicationStatus } from './application.types';

export type ApplicationListFilter = {
  status?: ApplicationStatus;
};

function matchesStatus(app: Application, filter: ApplicationListFilter): boolean {
  return filter.status ? app.status === filter.status : app.status !== 'deleted';
}

export class ApplicationService {
  constructor(
    private readonly deps: {
      applicationRepo: ApplicationRepo;
      logger: Logger;
      now?: () => Date;
    },
  ) {}

  private nowIso(): string {
    return (this.deps.now?.() ?? new Date()).toISOString();
  }

  async create(params: { creator: string; input: ApplicationInput }): Promise<Application> {
    const createdAt = this.nowIso();

    const app = await this.deps.applicationRepo.insert((id) => ({
      id,
      ...params.input,
      location: { ...params.input.location },
      createdAt,
      whoCreated: params.creator,
      volunteers: [],
      status: 'open',
    }));

    this.deps.logger.info({
      msg: 'applications.created',
      flow: 'applications.create',
      applicationId: app.id,
      username: params.creator,
    });

    return app;
  }

  async list(filter: ApplicationListFilter = {}): Promise<Application[]> {
    const all = await this.deps.applicationRepo.listAll();
    return all.filter((app) => matchesStatus(app, filter));
  }

  async get(id: number): Promise<Application> {
    const app = await this.deps.applicationRepo.findById(id);
    assertApplicationExists(app, id);
    return app;
  }

  async listByCreator(username: string, filter: ApplicationListFilter = {}): Promise<Application[]> {
    const all = await this.deps.applicationRepo.listAll();
    return all.filter((app) => app.whoCreated === username && matchesStatus(app, filter));
  }

  async update(params: { id: number; actor: string; input: ApplicationInput }): Promise<Application> {
    const result = await this.deps.applicationRepo.modify(params.id, (current) => {
      assertIsCreator(current, params.actor);
      return {
        ...current,
        ...params.input,
        location: { ...params.input.location },
        id: current.id,
        createdAt: current.createdAt,
        whoCreated: current.whoCreated,
      };
    });

    const app = result.status === 'not_found' ? undefined : result.item;
    assertApplicationExists(app, params.id);

    this.deps.logger.info({
      msg: 'applications.updated',
      flow: 'applications.update',
      applicationId: params.id,
      username: params.actor,
    });

    return app;
  }

  async updateStatus(params: {
    id: number;
    actor: string;
    status: ApplicationStatus;
  }): Promise<Application> {
    const result = await this.deps.applicationRepo.modify(params.id, (current) => {
      assertIsCreator(current, params.actor);
      if (current.status === params.status) return undefined;
      return { ...current, status: params.status };
    });

    const app = result.status === 'not_found' ? undefined : result.item;
    assertApplicationExists(app, params.id);

    if (result.status === 'updated') {
      this.deps.logger.info({
        msg: 'applications.status_changed',
        flow: 'applications.update-status',
        applicationId: params.id,
        status: params.status,
        username: params.actor,
      });
    }

    return app;
  }

  async softDelete(params: { id: number; actor: string }): Promise<Application> {
    return this.updateStatus({ ...params, status: 'deleted' });
  }

  /**
   * Signs a volunteer up. Returns false when they were already on the list.
   * Throws NotFound for an unknown id, Conflict when the application is not open.
   */
  async assignVolunteer(params: { id: number; volunteer: string }): Promise<boolean> {
    const result = await this.deps.applicationRepo.modify(params.id, (current) => {
      if (current.volunteers.includes(params.volunteer)) return undefined;
      assertIsOpen(current);
      return { ...current, volunteers: [...current.volunteers, params.volunteer] };
    });

    const app = result.status === 'not_found' ? undefined : result.item;
    assertApplicationExists(app, params.id);

    const assigned = result.status === 'updated';
    this.deps.logger.info({
      msg: assigned ? 'applications.volunteer_assigned' : 'applications.volunteer_already_assigned',
      flow: 'applications.assign-volunteer',
      applicationId: params.id,
      username: params.volunteer,
    });

    return assigned;
  }

  async getVolunteers(id: number): Promise<string[]> {
    const app = await this.get(id);
    return app.volunteers;
  }
}
