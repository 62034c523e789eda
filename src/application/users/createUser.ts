import { Password } from '../../domain/auth/password.js';
import { User } from '../../domain/users/user.js';
import { UserRepository } from './userRepository.js';
import { ConflictError } from '../errors.js';
import { usersLogger } from '../../lib/logger.js';

export interface CreateUserCommand {
  name: string;
  email: string;
  password: string;
  age?: number | null;
}

/**
 * Who asked for the account: the new user themselves (registration),
 * an authenticated caller (admin create) or the seed script.
 */
export type CreatedBy = { kind: 'self' } | { kind: 'seed' } | { kind: 'user'; userId: string };

export class CreateUserUseCase {
  constructor(private userRepo: UserRepository) {}

  async execute(command: CreateUserCommand, createdBy: CreatedBy): Promise<User> {
    const existing = await this.userRepo.findByEmail(command.email);
    if (existing) {
      throw new ConflictError('User with this email already exists');
    }

    const passwordHash = await Password.hash(command.password);

    // The repo still rejects a racing insert through the unique index
    const user = await this.userRepo.create({
      name: command.name,
      email: command.email,
      age: command.age ?? null,
      passwordHash,
    });

    usersLogger.info(
      {
        userId: user.id,
        createdBy: createdBy.kind === 'user' ? createdBy.userId : createdBy.kind,
      },
      'User created'
    );

    return user;
  }
}
