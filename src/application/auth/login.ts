import { Password } from '../../domain/auth/password.js';
import { UserRepository } from '../users/userRepository.js';
import { TokenService } from './tokens.js';
import { UnauthorizedError } from '../errors.js';
import { authLogger } from '../../lib/logger.js';

export interface LoginCommand {
  email: string;
  password: string;
}

export interface LoginResult {
  token: string;
  tokenType: 'Bearer';
  expiresIn: number;
  userId: string;
  email: string;
}

export class LoginUseCase {
  constructor(
    private userRepo: UserRepository,
    private tokens: TokenService
  ) {}

  async execute(command: LoginCommand): Promise<LoginResult> {
    // Soft-deleted users cannot log in
    const user = await this.userRepo.findByEmail(command.email);
    if (!user) {
      authLogger.info({ email: command.email }, 'Login failed: unknown email');
      throw new UnauthorizedError('Invalid email or password');
    }

    const isValid = await Password.verify(command.password, user.passwordHash);
    if (!isValid) {
      authLogger.info({ userId: user.id }, 'Login failed: wrong password');
      throw new UnauthorizedError('Invalid email or password');
    }

    if (Password.needsRehash(user.passwordHash)) {
      await this.userRepo.update(user.id, {
        passwordHash: await Password.hash(command.password),
      });
      authLogger.info({ userId: user.id }, 'Password hash upgraded');
    }

    const { token, expiresIn } = this.tokens.issue(user.id);
    authLogger.info({ userId: user.id }, 'User logged in');

    return {
      token,
      tokenType: 'Bearer',
      expiresIn,
      userId: user.id,
      email: user.email,
    };
  }
}
