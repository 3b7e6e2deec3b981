import { describe, it, expect, beforeEach } from 'vitest';
import jwt from 'jsonwebtoken';
import { LoginUseCase } from '../login.js';
import { LogoutUseCase } from '../logout.js';
import { InMemoryUserRepo } from '../../../testing/inMemoryRepos.js';
import { InvalidCredentialsError } from '../../errors.js';
import { Password } from '../../../domain/auth/password.js';

describe('LoginUseCase', () => {
  const secret = 'test-secret';
  let userRepo: InMemoryUserRepo;
  let useCase: LoginUseCase;

  beforeEach(async () => {
    userRepo = new InMemoryUserRepo();
    useCase = new LoginUseCase(userRepo, { secret, expiresIn: 3600 });
    await userRepo.create({
      username: 'desk1',
      passwordHash: await Password.hash('test-password'),
      role: 'operator',
      isPrimary: false,
    });
  });

  it('should issue a token carrying the user id, role and token version', async () => {
    const result = await useCase.execute({ username: 'desk1', password: 'test-password' });

    expect(result).toMatchObject({ userId: 1, username: 'desk1', role: 'operator' });
    expect(jwt.verify(result.token, secret)).toMatchObject({
      userId: 1,
      username: 'desk1',
      role: 'operator',
      tokenVersion: 0,
    });
  });

  it('should reject a wrong password', async () => {
    await expect(useCase.execute({ username: 'desk1', password: 'wrong-password' })).rejects.toThrow(
      InvalidCredentialsError
    );
  });

  it('should give the same error for an unknown user', async () => {
    const unknown = await useCase.execute({ username: 'nobody', password: 'test-password' }).catch((e: unknown) => e);
    const wrong = await useCase.execute({ username: 'desk1', password: 'nope' }).catch((e: unknown) => e);

    expect(unknown).toBeInstanceOf(InvalidCredentialsError);
    expect(wrong).toBeInstanceOf(InvalidCredentialsError);
    expect(unknown).toEqual(wrong);
  });
});

describe('LogoutUseCase', () => {
  it('should bump the token version', async () => {
    const userRepo = new InMemoryUserRepo();
    const user = await userRepo.create({
      username: 'desk1',
      passwordHash: 'not-a-real-hash',
      role: 'operator',
      isPrimary: false,
    });

    await new LogoutUseCase(userRepo).execute(user.id);

    expect((await userRepo.findById(user.id))?.tokenVersion).toBe(1);
  });
});
