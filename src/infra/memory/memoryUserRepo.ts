import { User, normalizeEmail, type UserProps } from '../../domain/users/user.js';
import { ConflictError, NotFoundError, type UnavailableError, type ValidationError } from '../../domain/errors.js';
import { type Result, ok, err } from '../../domain/result.js';
import type { UserFilter, UserRepository } from '../../application/ports/userRepository.js';

/**
 * Process-local user store. Lists in insertion order.
 */
export class MemoryUserRepository implements UserRepository {
  private readonly users = new Map<string, UserProps>();
  private readonly emails = new Map<string, string>();

  async create(user: User): Promise<Result<User, ConflictError | ValidationError | UnavailableError>> {
    if (this.users.has(user.id)) {
      return err(new ConflictError(`User ${user.id} already exists`, { field: 'id' }));
    }
    if (this.emails.has(user.email)) {
      return err(new ConflictError('User with this email already exists', { field: 'email' }));
    }

    this.users.set(user.id, user.toProps());
    this.emails.set(user.email, user.id);
    return ok(User.restore(user.toProps()));
  }

  async getById(id: string): Promise<Result<User, NotFoundError | UnavailableError>> {
    const props = this.users.get(id);
    if (!props) {
      return err(notFound(id));
    }
    return ok(User.restore(props));
  }

  async findByEmail(email: string): Promise<Result<User, NotFoundError | UnavailableError>> {
    const normalized = normalizeEmail(email);
    const id = this.emails.get(normalized);
    const props = id === undefined ? undefined : this.users.get(id);
    if (!props) {
      return err(new NotFoundError(`User with email ${normalized} not found`, { email: normalized }));
    }
    return ok(User.restore(props));
  }

  async list(filter: UserFilter = {}): Promise<Result<User[], UnavailableError>> {
    const users = [...this.users.values()]
      .filter((props) => filter.active === undefined || props.active === filter.active)
      .map((props) => User.restore(props));
    return ok(users);
  }

  async update(user: User): Promise<Result<User, NotFoundError | UnavailableError>> {
    const stored = this.users.get(user.id);
    if (!stored) {
      return err(notFound(user.id));
    }

    const next: UserProps = {
      ...stored,
      name: user.name,
      active: user.active,
      updatedAt: user.updatedAt,
    };
    this.users.set(user.id, next);
    return ok(User.restore(next));
  }

  async delete(id: string): Promise<Result<void, NotFoundError | UnavailableError>> {
    const stored = this.users.get(id);
    if (!stored) {
      return err(notFound(id));
    }
    this.users.delete(id);
    this.emails.delete(stored.email);
    return ok(undefined);
  }

  async ping(): Promise<Result<void, never>> {
    return ok(undefined);
  }
}

function notFound(id: string): NotFoundError {
  return new NotFoundError(`User with ID ${id} not found`, { id });
}
