import type { User } from '../../domain/users/user.js';
import type { NotFoundError, UnavailableError } from '../../domain/errors.js';
import type { Result } from '../../domain/result.js';
import type { CallOptions, UserRepository } from '../ports/userRepository.js';

export class GetUserUseCase {
  constructor(private userRepository: UserRepository) {}

  async execute(
    id: string,
    options?: CallOptions
  ): Promise<Result<User, NotFoundError | UnavailableError>> {
    return this.userRepository.getById(id, options);
  }
}
