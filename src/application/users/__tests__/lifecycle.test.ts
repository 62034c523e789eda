import { describe, it, expect, beforeEach } from 'vitest';
import { randomUUID } from 'crypto';
import { CreateUserUseCase } from '../createUser.js';
import { DeleteUserUseCase, PurgeUserUseCase } from '../deleteUser.js';
import { RestoreUserUseCase } from '../restoreUser.js';
import { UserQueries } from '../queries.js';
import { ConflictError, NotFoundError } from '../../errors.js';
import { User } from '../../../domain/users/user.js';
import { InMemoryUserRepo } from '../../../test/inMemoryUserRepo.js';

describe('user lifecycle', () => {
  let userRepo: InMemoryUserRepo;
  let createUser: CreateUserUseCase;
  let deleteUser: DeleteUserUseCase;
  let purgeUser: PurgeUserUseCase;
  let restoreUser: RestoreUserUseCase;
  let queries: UserQueries;
  let alice: User;
  const actorId = randomUUID();

  beforeEach(async () => {
    userRepo = new InMemoryUserRepo();
    createUser = new CreateUserUseCase(userRepo);
    deleteUser = new DeleteUserUseCase(userRepo);
    purgeUser = new PurgeUserUseCase(userRepo);
    restoreUser = new RestoreUserUseCase(userRepo);
    queries = new UserQueries(userRepo);
    alice = await createUser.execute(
      { name: 'Alice', email: 'a@x.com', password: 'secret123' },
      { kind: 'self' }
    );
  });

  describe('soft delete', () => {
    it('hides the user from list, search and get but keeps the row', async () => {
      await deleteUser.execute({ userId: alice.id, actorId });

      expect(await queries.listUsers()).toEqual([]);
      expect(await queries.searchUsers('ali')).toEqual([]);
      await expect(queries.getUser(alice.id)).rejects.toThrow(new NotFoundError('User not found'));

      const row = await userRepo.findByIdIncludingDeleted(alice.id);
      expect(row?.isDeleted).toBe(true);
      expect(row?.deletedAt).toBeInstanceOf(Date);
    });

    it('reports an unknown or already deleted user', async () => {
      await expect(deleteUser.execute({ userId: randomUUID(), actorId })).rejects.toBeInstanceOf(
        NotFoundError
      );

      await deleteUser.execute({ userId: alice.id, actorId });
      await expect(deleteUser.execute({ userId: alice.id, actorId })).rejects.toBeInstanceOf(
        NotFoundError
      );
    });
  });

  describe('restore', () => {
    it('brings a soft-deleted user back', async () => {
      await deleteUser.execute({ userId: alice.id, actorId });

      const restored = await restoreUser.execute({ userId: alice.id, actorId });

      expect(restored.isDeleted).toBe(false);
      expect(restored.deletedAt).toBeNull();
      expect((await queries.getUser(alice.id)).email).toBe('a@x.com');
    });

    it('refuses a user that is not deleted', async () => {
      await expect(restoreUser.execute({ userId: alice.id, actorId })).rejects.toThrow(
        new ConflictError('User is not deleted')
      );
    });

    it('refuses when the email was taken while the user was deleted', async () => {
      await deleteUser.execute({ userId: alice.id, actorId });
      await createUser.execute(
        { name: 'Alice Again', email: 'a@x.com', password: 'secret123' },
        { kind: 'self' }
      );

      await expect(restoreUser.execute({ userId: alice.id, actorId })).rejects.toThrow(
        new ConflictError('Email address is now used by another user')
      );
    });

    it('reports an unknown user', async () => {
      await expect(restoreUser.execute({ userId: randomUUID(), actorId })).rejects.toBeInstanceOf(
        NotFoundError
      );
    });
  });

  describe('purge', () => {
    it('removes the row for good', async () => {
      await purgeUser.execute({ userId: alice.id, actorId });

      expect(userRepo.all()).toEqual([]);
      await expect(restoreUser.execute({ userId: alice.id, actorId })).rejects.toBeInstanceOf(
        NotFoundError
      );
    });

    it('also removes a soft-deleted user', async () => {
      await deleteUser.execute({ userId: alice.id, actorId });
      await purgeUser.execute({ userId: alice.id, actorId });

      expect(userRepo.all()).toEqual([]);
    });

    it('reports an unknown user', async () => {
      await expect(purgeUser.execute({ userId: randomUUID(), actorId })).rejects.toBeInstanceOf(
        NotFoundError
      );
    });
  });

  describe('search', () => {
    it('matches name or email case-insensitively', async () => {
      await createUser.execute(
        { name: 'Bob Stone', email: 'bob@alien.org', password: 'secret123' },
        { kind: 'self' }
      );

      expect((await queries.searchUsers('ALI')).map((u) => u.name)).toEqual(['Alice', 'Bob Stone']);
      expect((await queries.searchUsers('stone')).map((u) => u.name)).toEqual(['Bob Stone']);
      expect(await queries.searchUsers('zed')).toEqual([]);
    });
  });
});
