import jwt from 'jsonwebtoken';
import { Password } from '../../domain/auth/password.js';
import type { Role } from '../../domain/auth/user.js';
import type { UserRepository } from '../ports.js';
import { InvalidCredentialsError } from '../errors.js';

export interface LoginCommand {
  username: string;
  password: string;
}

export interface LoginResult {
  token: string;
  userId: number;
  username: string;
  role: Role;
}

export interface TokenOptions {
  secret: string;
  /** Lifetime in seconds. */
  expiresIn: number;
}

export class LoginUseCase {
  constructor(
    private userRepo: UserRepository,
    private tokens: TokenOptions
  ) {}

  async execute(command: LoginCommand): Promise<LoginResult> {
    // Same error for unknown user and wrong password
    const user = await this.userRepo.findByUsername(command.username);
    if (!user) {
      throw new InvalidCredentialsError();
    }

    const isValid = await Password.verify(command.password, user.passwordHash);
    if (!isValid) {
      throw new InvalidCredentialsError();
    }

    const token = jwt.sign(
      {
        userId: user.id,
        username: user.username,
        role: user.role,
        tokenVersion: user.tokenVersion,
      },
      this.tokens.secret,
      {
        expiresIn: this.tokens.expiresIn,
      }
    );

    return {
      token,
      userId: user.id,
      username: user.username,
      role: user.role,
    };
  }
}
