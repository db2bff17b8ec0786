import { z } from 'zod';
import { User } from '../../domain/users/user.js';

export const USER_ENTITY = 'user';
export const EMAIL_GUARD_ENTITY = 'email';

/**
 * Stored shape of a user. Partition key is `id`.
 */
export interface UserItem {
  id: string;
  entityType: typeof USER_ENTITY;
  email: string;
  name: string;
  active: boolean;
  createdAt: string;
  updatedAt: string;
}

/**
 * Item whose conditional write claims an email for one user.
 */
export interface EmailGuardItem {
  id: string;
  entityType: typeof EMAIL_GUARD_ENTITY;
  userId: string;
}

const userItemSchema = z.object({
  id: z.string().min(1),
  entityType: z.literal(USER_ENTITY),
  email: z.string(),
  name: z.string(),
  active: z.boolean(),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});

const emailGuardItemSchema = z.object({
  id: z.string().min(1),
  entityType: z.literal(EMAIL_GUARD_ENTITY),
  userId: z.string().min(1),
});

export function emailGuardKey(email: string): string {
  return `email#${email}`;
}

export function toUserItem(user: User): UserItem {
  return {
    id: user.id,
    entityType: USER_ENTITY,
    email: user.email,
    name: user.name,
    active: user.active,
    createdAt: user.createdAt.toISOString(),
    updatedAt: user.updatedAt.toISOString(),
  };
}

export function toEmailGuardItem(user: User): EmailGuardItem {
  return {
    id: emailGuardKey(user.email),
    entityType: EMAIL_GUARD_ENTITY,
    userId: user.id,
  };
}

/**
 * Parse an unmarshalled item. Returns null for anything that is not a
 * well-formed user item (email guards included).
 */
export function fromUserItem(item: Record<string, unknown>): User | null {
  const parsed = userItemSchema.safeParse(item);
  if (!parsed.success) {
    return null;
  }

  const { id, email, name, active, createdAt, updatedAt } = parsed.data;
  return User.restore({
    id,
    email,
    name,
    active,
    createdAt: new Date(createdAt),
    updatedAt: new Date(updatedAt),
  });
}

/** Owner of an email guard item, or null when the item is not one. */
export function guardOwner(item: Record<string, unknown>): string | null {
  const parsed = emailGuardItemSchema.safeParse(item);
  return parsed.success ? parsed.data.userId : null;
}
