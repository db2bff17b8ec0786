import type { NotFoundError, UnavailableError } from '../../domain/errors.js';
import type { Result } from '../../domain/result.js';
import type { CallOptions, UserRepository } from '../ports/userRepository.js';

export class DeleteUserUseCase {
  constructor(private userRepository: UserRepository) {}

  async execute(
    id: string,
    options?: CallOptions
  ): Promise<Result<void, NotFoundError | UnavailableError>> {
    return this.userRepository.delete(id, options);
  }
}
