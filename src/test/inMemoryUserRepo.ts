import { randomUUID } from 'crypto';
import { User } from '../domain/users/user.js';
import { NewUser, UserChanges, UserRepository } from '../application/users/userRepository.js';
import { ConflictError } from '../application/errors.js';

/**
 * In-process stand-in for PgUserRepo with the same visibility and
 * uniqueness rules (partial unique index on lower(email) of live rows).
 */
export class InMemoryUserRepo implements UserRepository {
  private rows = new Map<string, User>();
  private tick = 0;

  /** Every stored row, deleted ones included. */
  all(): User[] {
    return [...this.rows.values()];
  }

  async create(user: NewUser): Promise<User> {
    this.assertEmailFree(user.email, null);
    const now = this.now();
    const created: User = {
      id: randomUUID(),
      name: user.name,
      email: user.email,
      age: user.age,
      passwordHash: user.passwordHash,
      createdAt: now,
      updatedAt: now,
      isDeleted: false,
      deletedAt: null,
    };
    this.rows.set(created.id, created);
    return created;
  }

  async findById(id: string): Promise<User | null> {
    const user = this.rows.get(id);
    return user && !user.isDeleted ? user : null;
  }

  async findByIdIncludingDeleted(id: string): Promise<User | null> {
    return this.rows.get(id) ?? null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const wanted = email.toLowerCase();
    return this.live().find((u) => u.email.toLowerCase() === wanted) ?? null;
  }

  async list(): Promise<User[]> {
    return this.live();
  }

  async search(keyword: string): Promise<User[]> {
    const needle = keyword.toLowerCase();
    return this.live().filter(
      (u) => u.name.toLowerCase().includes(needle) || u.email.toLowerCase().includes(needle)
    );
  }

  async update(id: string, changes: UserChanges): Promise<User | null> {
    const user = await this.findById(id);
    if (!user) {
      return null;
    }
    if (changes.email !== undefined) {
      this.assertEmailFree(changes.email, id);
    }
    const updated: User = {
      ...user,
      name: changes.name ?? user.name,
      email: changes.email ?? user.email,
      age: changes.age !== undefined ? changes.age : user.age,
      passwordHash: changes.passwordHash ?? user.passwordHash,
      updatedAt: this.now(),
    };
    this.rows.set(id, updated);
    return updated;
  }

  async softDelete(id: string): Promise<boolean> {
    const user = await this.findById(id);
    if (!user) {
      return false;
    }
    const now = this.now();
    this.rows.set(id, { ...user, isDeleted: true, deletedAt: now, updatedAt: now });
    return true;
  }

  async restore(id: string): Promise<User | null> {
    const user = this.rows.get(id);
    if (!user || !user.isDeleted) {
      return null;
    }
    this.assertEmailFree(user.email, id);
    const restored: User = { ...user, isDeleted: false, deletedAt: null, updatedAt: this.now() };
    this.rows.set(id, restored);
    return restored;
  }

  async hardDelete(id: string): Promise<boolean> {
    return this.rows.delete(id);
  }

  private live(): User[] {
    return this.all().filter((u) => !u.isDeleted);
  }

  private assertEmailFree(email: string, exceptId: string | null): void {
    const wanted = email.toLowerCase();
    const clash = this.live().some((u) => u.id !== exceptId && u.email.toLowerCase() === wanted);
    if (clash) {
      throw new ConflictError('User with this email already exists');
    }
  }

  // Strictly increasing timestamps keep list order deterministic
  private now(): Date {
    this.tick += 1;
    return new Date(Date.UTC(2024, 0, 1) + this.tick * 1000);
  }
}
