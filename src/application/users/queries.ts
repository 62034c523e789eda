import { User } from '../../domain/users/user.js';
import { UserRepository } from './userRepository.js';
import { NotFoundError } from '../errors.js';

export class UserQueries {
  constructor(private userRepo: UserRepository) {}

  async listUsers(): Promise<User[]> {
    return this.userRepo.list();
  }

  async getUser(userId: string): Promise<User> {
    const user = await this.userRepo.findById(userId);
    if (!user) {
      throw new NotFoundError('User not found');
    }
    return user;
  }

  async searchUsers(keyword: string): Promise<User[]> {
    return this.userRepo.search(keyword);
  }
}
