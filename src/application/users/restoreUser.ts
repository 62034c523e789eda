import { User } from '../../domain/users/user.js';
import { UserRepository } from './userRepository.js';
import { ConflictError, NotFoundError } from '../errors.js';
import { usersLogger } from '../../lib/logger.js';

export interface RestoreUserCommand {
  userId: string;
  actorId: string;
}

export class RestoreUserUseCase {
  constructor(private userRepo: UserRepository) {}

  async execute(command: RestoreUserCommand): Promise<User> {
    const user = await this.userRepo.findByIdIncludingDeleted(command.userId);
    if (!user) {
      throw new NotFoundError('User not found');
    }

    if (!user.isDeleted) {
      throw new ConflictError('User is not deleted');
    }

    // Someone may have registered the address while this user was deleted
    const owner = await this.userRepo.findByEmail(user.email);
    if (owner) {
      throw new ConflictError('Email address is now used by another user');
    }

    const restored = await this.userRepo.restore(user.id);
    if (!restored) {
      throw new NotFoundError('User not found');
    }

    usersLogger.info({ userId: restored.id, actorId: command.actorId }, 'User restored');

    return restored;
  }
}
