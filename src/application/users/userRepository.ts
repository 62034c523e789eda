import { User } from '../../domain/users/user.js';

export interface NewUser {
  name: string;
  email: string;
  age: number | null;
  passwordHash: string;
}

export interface UserChanges {
  name?: string;
  email?: string;
  age?: number | null;
  passwordHash?: string;
}

/**
 * Persistence port for users. Every lookup except
 * `findByIdIncludingDeleted` ignores soft-deleted records.
 *
 * Writes that would give two non-deleted users the same email
 * (compared case-insensitively) reject with `ConflictError`.
 */
export interface UserRepository {
  create(user: NewUser): Promise<User>;
  findById(id: string): Promise<User | null>;
  findByIdIncludingDeleted(id: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  list(): Promise<User[]>;
  /** Case-insensitive substring match on name or email. */
  search(keyword: string): Promise<User[]>;
  update(id: string, changes: UserChanges): Promise<User | null>;
  softDelete(id: string): Promise<boolean>;
  restore(id: string): Promise<User | null>;
  hardDelete(id: string): Promise<boolean>;
}
