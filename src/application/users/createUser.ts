import { User } from '../../domain/users/user.js';
import type { ConflictError, UnavailableError, ValidationError } from '../../domain/errors.js';
import type { Result } from '../../domain/result.js';
import type { CallOptions, UserRepository } from '../ports/userRepository.js';

export interface CreateUserCommand {
  email: string;
  name: string;
  active?: boolean;
}

export class CreateUserUseCase {
  constructor(
    private userRepository: UserRepository,
    private clock: () => Date = () => new Date()
  ) {}

  async execute(
    command: CreateUserCommand,
    options?: CallOptions
  ): Promise<Result<User, ValidationError | ConflictError | UnavailableError>> {
    // Field validation happens in the entity; uniqueness in the store
    const user = User.create(command, { now: this.clock() });
    if (!user.ok) {
      return user;
    }

    return this.userRepository.create(user.value, options);
  }
}
