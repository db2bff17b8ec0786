import { randomUUID } from 'crypto';
import { ValidationError } from '../errors.js';
import { Result, ok, err } from '../result.js';

const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
export const MAX_NAME_LENGTH = 200;

export interface UserProps {
  readonly id: string;
  readonly email: string;
  readonly name: string;
  readonly active: boolean;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface NewUser {
  email: string;
  name: string;
  active?: boolean;
}

/**
 * Wire shape of a user: timestamps as ISO-8601 strings.
 */
export interface UserSnapshot {
  id: string;
  email: string;
  name: string;
  active: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface UserFactoryOptions {
  generateId?: () => string;
  now?: Date;
}

/**
 * User entity. Instances are immutable: every mutation returns a new
 * User with a refreshed `updatedAt` and the same `id`.
 */
export class User {
  private readonly props: UserProps;

  // Dates are mutable; keep private copies so no caller can reach ours
  private constructor(props: UserProps) {
    this.props = copyProps(props);
  }

  /**
   * Build a brand-new user, normalizing email and name.
   */
  static create(input: NewUser, options: UserFactoryOptions = {}): Result<User, ValidationError> {
    const email = normalizeEmail(input.email);
    if (!EMAIL_PATTERN.test(email)) {
      return err(new ValidationError('Invalid email', { field: 'email' }));
    }

    const name = validateName(input.name);
    if (!name.ok) {
      return name;
    }

    const now = options.now ?? new Date();
    const generateId = options.generateId ?? randomUUID;

    return ok(
      new User({
        id: generateId(),
        email,
        name: name.value,
        active: input.active ?? true,
        createdAt: now,
        updatedAt: now,
      })
    );
  }

  /**
   * Rehydrate a user that was already persisted. No validation is applied.
   */
  static restore(props: UserProps): User {
    return new User(props);
  }

  get id(): string {
    return this.props.id;
  }

  get email(): string {
    return this.props.email;
  }

  get name(): string {
    return this.props.name;
  }

  get active(): boolean {
    return this.props.active;
  }

  get createdAt(): Date {
    return new Date(this.props.createdAt.getTime());
  }

  get updatedAt(): Date {
    return new Date(this.props.updatedAt.getTime());
  }

  rename(name: string, now: Date = new Date()): Result<User, ValidationError> {
    const validated = validateName(name);
    if (!validated.ok) {
      return validated;
    }
    return ok(new User({ ...this.props, name: validated.value, updatedAt: now }));
  }

  activate(now: Date = new Date()): User {
    return new User({ ...this.props, active: true, updatedAt: now });
  }

  deactivate(now: Date = new Date()): User {
    return new User({ ...this.props, active: false, updatedAt: now });
  }

  toProps(): UserProps {
    return copyProps(this.props);
  }

  toJSON(): UserSnapshot {
    return {
      id: this.props.id,
      email: this.props.email,
      name: this.props.name,
      active: this.props.active,
      createdAt: this.props.createdAt.toISOString(),
      updatedAt: this.props.updatedAt.toISOString(),
    };
  }
}

function copyProps(props: UserProps): UserProps {
  return {
    ...props,
    createdAt: new Date(props.createdAt.getTime()),
    updatedAt: new Date(props.updatedAt.getTime()),
  };
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

function validateName(name: string): Result<string, ValidationError> {
  const trimmed = name.trim();
  if (trimmed.length === 0) {
    return err(new ValidationError('Name is required', { field: 'name' }));
  }
  if (trimmed.length > MAX_NAME_LENGTH) {
    return err(
      new ValidationError(`Name must be at most ${MAX_NAME_LENGTH} characters`, { field: 'name' })
    );
  }
  return ok(trimmed);
}
