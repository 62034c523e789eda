import { UserRepository } from './userRepository.js';
import { NotFoundError } from '../errors.js';
import { usersLogger } from '../../lib/logger.js';

export interface DeleteUserCommand {
  userId: string;
  actorId: string;
}

/**
 * Soft delete: the row stays and can be brought back with RestoreUserUseCase.
 */
export class DeleteUserUseCase {
  constructor(private userRepo: UserRepository) {}

  async execute(command: DeleteUserCommand): Promise<void> {
    const deleted = await this.userRepo.softDelete(command.userId);
    if (!deleted) {
      throw new NotFoundError('User not found');
    }

    usersLogger.info({ userId: command.userId, actorId: command.actorId }, 'User soft-deleted');
  }
}

/**
 * Physically removes the row, deleted or not.
 */
export class PurgeUserUseCase {
  constructor(private userRepo: UserRepository) {}

  async execute(command: DeleteUserCommand): Promise<void> {
    const removed = await this.userRepo.hardDelete(command.userId);
    if (!removed) {
      throw new NotFoundError('User not found');
    }

    usersLogger.warn({ userId: command.userId, actorId: command.actorId }, 'User permanently deleted');
  }
}
