import { Password } from '../../domain/auth/password.js';
import { toUserSummary, type Role, type UserSummary } from '../../domain/auth/user.js';
import type { UserRepository } from '../ports.js';
import { DuplicateUsernameError, NotFoundError, ProtectedResourceError } from '../errors.js';

export interface AddUserCommand {
  username: string;
  password: string;
  role: Role;
}

export class UserAdmin {
  constructor(private userRepo: UserRepository) {}

  async listUsers(): Promise<UserSummary[]> {
    const users = await this.userRepo.list();
    return users.map(toUserSummary);
  }

  async addUser(command: AddUserCommand): Promise<UserSummary> {
    const existing = await this.userRepo.findByUsername(command.username);
    if (existing) {
      throw new DuplicateUsernameError(command.username);
    }

    const passwordHash = await Password.hash(command.password);
    const user = await this.userRepo.create({
      username: command.username,
      passwordHash,
      role: command.role,
      isPrimary: false,
    });
    return toUserSummary(user);
  }

  async deleteUser(id: number): Promise<void> {
    const user = await this.userRepo.findById(id);
    if (!user) {
      throw new NotFoundError(`User not found: ${id}`);
    }
    if (user.isPrimary) {
      throw new ProtectedResourceError();
    }

    const deleted = await this.userRepo.delete(id);
    if (!deleted) {
      throw new NotFoundError(`User not found: ${id}`);
    }
  }
}
