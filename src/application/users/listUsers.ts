import type { User } from '../../domain/users/user.js';
import type { UnavailableError } from '../../domain/errors.js';
import type { Result } from '../../domain/result.js';
import type { CallOptions, UserFilter, UserRepository } from '../ports/userRepository.js';

export class ListUsersUseCase {
  constructor(private userRepository: UserRepository) {}

  /**
   * An empty store yields an empty list, not an error.
   */
  async execute(
    filter: UserFilter = {},
    options?: CallOptions
  ): Promise<Result<User[], UnavailableError>> {
    return this.userRepository.list(filter, options);
  }
}
