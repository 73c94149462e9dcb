import { IPasswordHasherPort, IUserRepositoryPort } from '@application/ports';
import { AuthenticateUserCommand, AuthenticateUserHandler } from '@application/use-cases';
import { User } from '@domain/entities';
import { createPasswordHasherMock, createTestUser, createUserRepositoryMock } from '../fixtures';

describe('AuthenticateUserHandler', () => {
  let userRepository: jest.Mocked<IUserRepositoryPort>;
  let passwordHasher: jest.Mocked<IPasswordHasherPort>;
  let handler: AuthenticateUserHandler;
  let user: User;

  const login = () => handler.handle(new AuthenticateUserCommand('dana@clinic.test', 'Attempt1'));

  beforeEach(() => {
    userRepository = createUserRepositoryMock();
    passwordHasher = createPasswordHasherMock();
    handler = new AuthenticateUserHandler(userRepository, passwordHasher, {
      maxFailedLogins: 2,
      lockoutMinutes: 15,
      emailTokenTtlHours: 24,
      passwordResetTtlMinutes: 60,
    });
    user = createTestUser();
    userRepository.findByEmail.mockResolvedValue(user);
  });

  it('should commit its failure results', () => {
    expect(new AuthenticateUserCommand('a@b.test', 'x').commitFailedResults).toBe(true);
  });

  it('should sign in with the right password', async () => {
    // Arrange
    passwordHasher.verify.mockResolvedValue(true);

    // Act
    const result = await login();

    // Assert
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.user.id).toBe('user-1');
    expect(result.value.user.lastLoginAt).toBe(result.value.authenticatedAt);
    expect(passwordHasher.verify).toHaveBeenCalledWith('Attempt1', 'stored-hash');
  });

  it('should not reveal whether the email exists', async () => {
    userRepository.findByEmail.mockResolvedValue(null);

    const result = await login();

    expect(result).toEqual({
      ok: false,
      kind: 'unauthorized',
      errors: ['Invalid email or password.'],
    });
  });

  it('should count a wrong password', async () => {
    passwordHasher.verify.mockResolvedValue(false);

    const result = await login();

    expect(result).toEqual({
      ok: false,
      kind: 'unauthorized',
      errors: ['Invalid email or password.'],
    });
    expect(user.failedLoginAttempts).toBe(1);
    expect(userRepository.save).toHaveBeenCalledWith(user);
  });

  it('should lock the account after too many failures', async () => {
    passwordHasher.verify.mockResolvedValue(false);

    await login();
    const result = await login();

    expect(result).toEqual({
      ok: false,
      kind: 'unauthorized',
      errors: ['Account is locked. Try again later.'],
    });
    expect(user.isLocked()).toBe(true);
  });

  it('should refuse a locked account even with the right password', async () => {
    passwordHasher.verify.mockResolvedValueOnce(false).mockResolvedValueOnce(false);
    await login();
    await login();
    passwordHasher.verify.mockResolvedValue(true);

    const result = await login();

    expect(result.ok).toBe(false);
    expect(result.ok ? [] : result.errors).toEqual(['Account is locked. Try again later.']);
    expect(passwordHasher.verify).toHaveBeenCalledTimes(2);
  });

  it('should refuse an inactive account', async () => {
    user.deactivate();

    const result = await login();

    expect(result).toEqual({ ok: false, kind: 'unauthorized', errors: ['Account is inactive.'] });
  });
});
