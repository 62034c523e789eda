import { Password } from '../../domain/auth/password.js';
import { User } from '../../domain/users/user.js';
import { UserChanges, UserRepository } from './userRepository.js';
import { ConflictError, NotFoundError } from '../errors.js';
import { usersLogger } from '../../lib/logger.js';

export interface UpdateUserCommand {
  userId: string;
  actorId: string;
  name?: string;
  email?: string;
  age?: number | null;
  password?: string;
}

export class UpdateUserUseCase {
  constructor(private userRepo: UserRepository) {}

  async execute(command: UpdateUserCommand): Promise<User> {
    const user = await this.userRepo.findById(command.userId);
    if (!user) {
      throw new NotFoundError('User not found');
    }

    const changes: UserChanges = {};

    if (command.name !== undefined) {
      changes.name = command.name;
    }

    if (command.age !== undefined) {
      changes.age = command.age;
    }

    if (command.email !== undefined && command.email !== user.email) {
      const owner = await this.userRepo.findByEmail(command.email);
      if (owner && owner.id !== user.id) {
        throw new ConflictError('User with this email already exists');
      }
      changes.email = command.email;
    }

    if (command.password !== undefined) {
      changes.passwordHash = await Password.hash(command.password);
    }

    const updated = await this.userRepo.update(user.id, changes);
    if (!updated) {
      // Deleted between the read and the write
      throw new NotFoundError('User not found');
    }

    usersLogger.info(
      { userId: updated.id, actorId: command.actorId, fields: Object.keys(changes) },
      'User updated'
    );

    return updated;
  }
}
