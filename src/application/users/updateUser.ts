import type { User } from '../../domain/users/user.js';
import {
  ValidationError,
  type NotFoundError,
  type UnavailableError,
} from '../../domain/errors.js';
import { type Result, err } from '../../domain/result.js';
import type { CallOptions, UserRepository } from '../ports/userRepository.js';

export interface UpdateUserCommand {
  id: string;
  name?: string;
  active?: boolean;
}

export class UpdateUserUseCase {
  constructor(
    private userRepository: UserRepository,
    private clock: () => Date = () => new Date()
  ) {}

  async execute(
    command: UpdateUserCommand,
    options?: CallOptions
  ): Promise<Result<User, ValidationError | NotFoundError | UnavailableError>> {
    if (command.name === undefined && command.active === undefined) {
      return err(new ValidationError('Nothing to update'));
    }

    const existing = await this.userRepository.getById(command.id, options);
    if (!existing.ok) {
      return existing;
    }

    const now = this.clock();
    let user = existing.value;

    if (command.name !== undefined) {
      const renamed = user.rename(command.name, now);
      if (!renamed.ok) {
        return renamed;
      }
      user = renamed.value;
    }

    if (command.active !== undefined) {
      user = command.active ? user.activate(now) : user.deactivate(now);
    }

    return this.userRepository.update(user, options);
  }
}
