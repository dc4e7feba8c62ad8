/**
 * src/modules/users/dal/user.document.ts
 *
 * WHY:
 * - The on-disk account document uses snake_case keys (password_hash, who_rate, ...).
 * - This is the ONLY place that knows those keys. Everything above works with User.
 *
 * RULES:
 * - Lists default to [] so older documents (missing followers/following/...) still parse.
 * - password_hash, salt, username and role are required: without them the document
 *   is treated as malformed by callers.
 * - toDocumentFields() returns only the keys it knows, so callers can merge it into
 *   a loaded document without dropping fields this version doesn't model.
 */

import { z } from 'zod';
import type { JsonObject } from '../../../shared/store/document-store';
import { USER_ROLES, type ProfilePatch, type Rating, type User } from '../user.types';

const stringList = z.array(z.string()).default([]);

export const ratingDocumentSchema = z.object({
  id: z.number().int(),
  who_rate: z.string(),
  rate: z.number(),
  comment: z.string().nullable().default(null),
});

export const userDocumentSchema = z.object({
  username: z.string().min(1),
  role: z.enum(USER_ROLES),
  name: z.string().default(''),
  surname: z.string().default(''),
  email: z.string().nullable().default(null),

  password_hash: z.string().min(1),
  salt: z.string().min(1),
  token: z.string().default(''),

  avatar: z.string().default(''),
  skills: stringList,
  specializations: stringList,
  events: stringList,
  rating: z.array(ratingDocumentSchema).default([]),
  followers: stringList,
  following: stringList,
});

export type UserDocument = z.infer<typeof userDocumentSchema>;
export type RatingDocument = z.infer<typeof ratingDocumentSchema>;

export function toRating(doc: RatingDocument): Rating {
  return {
    id: doc.id,
    whoRate: doc.who_rate,
    rate: doc.rate,
    comment: doc.comment,
  };
}

export function toRatingDocument(rating: Rating): RatingDocument {
  return {
    id: rating.id,
    who_rate: rating.whoRate,
    rate: rating.rate,
    comment: rating.comment,
  };
}

export function toUser(doc: UserDocument): User {
  return {
    username: doc.username,
    role: doc.role,
    name: doc.name,
    surname: doc.surname,
    email: doc.email,
    passwordHash: doc.password_hash,
    salt: doc.salt,
    token: doc.token,
    avatar: doc.avatar,
    skills: doc.skills,
    specializations: doc.specializations,
    events: doc.events,
    ratings: doc.rating.map(toRating),
    followers: doc.followers,
    following: doc.following,
  };
}

/** Parses a loaded document. Returns undefined when it isn't a valid account. */
export function parseUserDocument(document: JsonObject): User | undefined {
  const parsed = userDocumentSchema.safeParse(document);
  return parsed.success ? toUser(parsed.data) : undefined;
}

/**
 * Full document for a brand-new account. Volunteers carry `skills`, organizers
 * carry `specializations`; both carry the follow lists.
 */
export function toNewUserDocument(user: User): JsonObject {
  const roleFields =
    user.role === 'VOLUNTEER' ? { skills: user.skills } : { specializations: user.specializations };

  return {
    username: user.username,
    name: user.name,
    surname: user.surname,
    password_hash: user.passwordHash,
    salt: user.salt,
    email: user.email,
    avatar: user.avatar,
    role: user.role,
    events: user.events,
    rating: user.ratings.map(toRatingDocument),
    token: user.token,
    followers: user.followers,
    following: user.following,
    ...roleFields,
  };
}

/** Document keys for the enumerated mutable profile fields. */
export function profilePatchToFields(patch: ProfilePatch): JsonObject {
  const fields: JsonObject = {};
  if (patch.name !== undefined) fields.name = patch.name;
  if (patch.surname !== undefined) fields.surname = patch.surname;
  if (patch.email !== undefined) fields.email = patch.email;
  if (patch.avatar !== undefined) fields.avatar = patch.avatar;
  if (patch.skills !== undefined) fields.skills = patch.skills;
  if (patch.specializations !== undefined) fields.specializations = patch.specializations;
  return fields;
}
