import { Password } from '../../domain/auth/password.js';
import { PublicUser, normalizeEmail, toPublicUser } from '../../domain/auth/user.js';
import { UnauthorizedError } from '../errors.js';
import { UserRepository } from '../repositories.js';
import { CredentialIssuer } from './credentialIssuer.js';

export interface LoginCommand {
  email: string;
  password: string;
}

export interface LoginResult {
  user: PublicUser;
  accessToken: string;
  refreshToken: string;
}

export const INVALID_CREDENTIALS_MESSAGE = 'Invalid email or password';

export class LoginUseCase {
  constructor(
    private userRepo: UserRepository,
    private issuer: CredentialIssuer
  ) {}

  async execute(command: LoginCommand): Promise<LoginResult> {
    // Find user
    const user = await this.userRepo.findByEmail(normalizeEmail(command.email));
    if (!user) {
      throw new UnauthorizedError(INVALID_CREDENTIALS_MESSAGE);
    }

    // Verify password
    const isValid = await Password.verify(command.password, user.passwordHash);
    if (!isValid) {
      throw new UnauthorizedError(INVALID_CREDENTIALS_MESSAGE);
    }

    return {
      user: toPublicUser(user),
      ...this.issuer.issue(user.id),
    };
  }
}
