import { Password } from '../../domain/auth/password.js';
import type { Logger } from '../../infra/logger.js';
import type { UserRepository } from '../ports.js';

export interface AdminCredentials {
  username: string;
  password: string;
}

export type BootstrapOutcome = 'created' | 'exists' | 'missing-credentials';

/**
 * Creates the primary admin on first run from operator-supplied credentials.
 * There is no built-in default password.
 */
export class BootstrapAdminUseCase {
  constructor(
    private userRepo: UserRepository,
    private logger: Logger
  ) {}

  async execute(credentials?: AdminCredentials): Promise<BootstrapOutcome> {
    const primary = await this.userRepo.findPrimary();
    if (primary) {
      return 'exists';
    }

    if (!credentials) {
      this.logger.warn(
        'No primary admin exists. Set ADMIN_USERNAME and ADMIN_PASSWORD or run `npm run create-admin -- <username> <password>`'
      );
      return 'missing-credentials';
    }

    const passwordHash = await Password.hash(credentials.password);
    const admin = await this.userRepo.create({
      username: credentials.username,
      passwordHash,
      role: 'admin',
      isPrimary: true,
    });
    this.logger.info('Primary admin created', { userId: admin.id, username: admin.username });
    return 'created';
  }
}
