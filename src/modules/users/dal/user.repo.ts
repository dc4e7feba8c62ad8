/**
 * src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - DAL WRITES for the relationship lists inside an account document
 *   (followers, following, events) and the rating list.
 * - Each call is one locked load -> mutate -> save on ONE document.
 *
 * RULES:
 * - No AppError (callers decide what "missing" means).
 * - No policies.
 * - Never spans two documents. Multi-document operations live in the social module.
 */

import type { DocumentStore, JsonObject } from '../../../shared/store/document-store';
import { userDocumentPath } from '../user.paths';
import type { Rating, UserRole } from '../user.types';
import { parseUserDocument, toRatingDocument } from './user.document';

export type UserListField = 'followers' | 'following' | 'events';

export type ListAddResult = 'added' | 'present' | 'missing';
export type ListRemoveResult = 'removed' | 'absent' | 'missing';

function stringListOf(document: JsonObject, field: UserListField): string[] {
  const raw = document[field];
  if (!Array.isArray(raw)) return [];
  return raw.filter((v): v is string => typeof v === 'string');
}

export class UserRepo {
  constructor(private readonly store: DocumentStore) {}

  /** Appends `value` to the list unless it is already there. */
  async addToList(params: {
    role: UserRole;
    username: string;
    field: UserListField;
    value: string;
  }): Promise<ListAddResult> {
    return this.store.update<ListAddResult>(
      userDocumentPath(params.role, params.username),
      (document) => {
        if (!parseUserDocument(document)) return { write: false, value: 'missing' };

        const list = stringListOf(document, params.field);
        if (list.includes(params.value)) return { write: false, value: 'present' };

        document[params.field] = [...list, params.value];
        return { write: true, value: 'added' };
      },
    );
  }

  /** Removes every occurrence of `value` from the list. */
  async removeFromList(params: {
    role: UserRole;
    username: string;
    field: UserListField;
    value: string;
  }): Promise<ListRemoveResult> {
    return this.store.update<ListRemoveResult>(
      userDocumentPath(params.role, params.username),
      (document) => {
        if (!parseUserDocument(document)) return { write: false, value: 'missing' };

        const list = stringListOf(document, params.field);
        if (!list.includes(params.value)) return { write: false, value: 'absent' };

        document[params.field] = list.filter((v) => v !== params.value);
        return { write: true, value: 'removed' };
      },
    );
  }

  /** Appends a rating entry. Returns false when the account document is missing. */
  async appendRating(params: { role: UserRole; username: string; rating: Rating }): Promise<boolean> {
    return this.store.update(userDocumentPath(params.role, params.username), (document) => {
      if (!parseUserDocument(document)) return { write: false, value: false };

      const existing = Array.isArray(document.rating) ? document.rating : [];
      document.rating = [...existing, toRatingDocument(params.rating)];
      return { write: true, value: true };
    });
  }
}
