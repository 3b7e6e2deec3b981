import { describe, it, expect, beforeEach } from 'vitest';
import { UserAdmin } from '../userAdmin.js';
import { InMemoryUserRepo } from '../../../testing/inMemoryRepos.js';
import { DuplicateUsernameError, NotFoundError, ProtectedResourceError } from '../../errors.js';
import { Password } from '../../../domain/auth/password.js';

describe('UserAdmin', () => {
  let userRepo: InMemoryUserRepo;
  let userAdmin: UserAdmin;
  let primaryId: number;

  beforeEach(async () => {
    userRepo = new InMemoryUserRepo();
    userAdmin = new UserAdmin(userRepo);
    const primary = await userRepo.create({
      username: 'owner',
      passwordHash: 'not-a-real-hash',
      role: 'admin',
      isPrimary: true,
    });
    primaryId = primary.id;
  });

  describe('addUser', () => {
    it('should create a user with a hashed password', async () => {
      const created = await userAdmin.addUser({ username: 'desk1', password: 'test-password', role: 'operator' });

      expect(created).toMatchObject({ username: 'desk1', role: 'operator', isPrimary: false });
      expect(created).not.toHaveProperty('passwordHash');

      const stored = await userRepo.findByUsername('desk1');
      expect(stored?.passwordHash).not.toBe('test-password');
      expect(await Password.verify('test-password', stored?.passwordHash ?? '')).toBe(true);
    });

    it('should reject a username that already exists', async () => {
      await userAdmin.addUser({ username: 'desk1', password: 'test-password', role: 'operator' });

      await expect(
        userAdmin.addUser({ username: 'desk1', password: 'other-password', role: 'admin' })
      ).rejects.toThrow(DuplicateUsernameError);
      expect(await userRepo.list()).toHaveLength(2);
    });
  });

  describe('deleteUser', () => {
    it('should delete an ordinary user', async () => {
      const created = await userAdmin.addUser({ username: 'desk1', password: 'test-password', role: 'operator' });

      await userAdmin.deleteUser(created.id);

      expect(await userRepo.findById(created.id)).toBeNull();
    });

    it('should refuse to delete the primary admin', async () => {
      await userAdmin.addUser({ username: 'desk1', password: 'test-password', role: 'operator' });
      const before = await userRepo.list();

      await expect(userAdmin.deleteUser(primaryId)).rejects.toThrow(ProtectedResourceError);
      expect(await userRepo.list()).toEqual(before);
    });

    it('should allow deleting another admin', async () => {
      const other = await userAdmin.addUser({ username: 'manager', password: 'test-password', role: 'admin' });

      await userAdmin.deleteUser(other.id);

      expect(await userRepo.findById(other.id)).toBeNull();
    });

    it('should throw NotFoundError for an unknown id', async () => {
      await expect(userAdmin.deleteUser(999)).rejects.toThrow(NotFoundError);
    });
  });

  describe('listUsers', () => {
    it('should list users without password hashes', async () => {
      await userAdmin.addUser({ username: 'desk1', password: 'test-password', role: 'operator' });

      const users = await userAdmin.listUsers();

      expect(users.map((u) => u.username)).toEqual(['owner', 'desk1']);
      for (const user of users) {
        expect(user).not.toHaveProperty('passwordHash');
      }
    });
  });
});
