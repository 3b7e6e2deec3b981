import type { UserRepository } from '../ports.js';

/**
 * Invalidates every token issued to the user so far.
 */
export class LogoutUseCase {
  constructor(private userRepo: UserRepository) {}

  async execute(userId: number): Promise<void> {
    await this.userRepo.incrementTokenVersion(userId);
  }
}
