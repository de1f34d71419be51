import { Password } from '../../domain/auth/password.js';
import { PublicUser, Role, normalizeEmail, toPublicUser } from '../../domain/auth/user.js';
import { ValidationError, ValidationIssue } from '../errors.js';
import { UserRepository } from '../repositories.js';
import { CredentialIssuer } from './credentialIssuer.js';

export interface RegisterCommand {
  username: string;
  email: string;
  password: string;
  passwordConfirm: string;
  role?: Role;
}

export interface RegisterResult {
  user: PublicUser;
  accessToken: string;
  refreshToken: string;
}

export class RegisterUseCase {
  constructor(
    private userRepo: UserRepository,
    private issuer: CredentialIssuer
  ) {}

  async execute(command: RegisterCommand): Promise<RegisterResult> {
    const email = normalizeEmail(command.email);
    const username = command.username.trim();
    const issues: ValidationIssue[] = [];

    if (command.password !== command.passwordConfirm) {
      issues.push({ path: 'passwordConfirm', message: "Passwords don't match" });
    }
    for (const message of Password.weaknesses(command.password, [username, email])) {
      issues.push({ path: 'password', message });
    }

    // Check uniqueness
    if (await this.userRepo.findByEmail(email)) {
      issues.push({ path: 'email', message: 'A user with this email already exists' });
    }
    if (await this.userRepo.findByUsername(username)) {
      issues.push({ path: 'username', message: 'A user with this username already exists' });
    }

    if (issues.length > 0) {
      throw new ValidationError(issues);
    }

    const passwordHash = await Password.hash(command.password);
    const user = await this.userRepo.create({
      username,
      email,
      passwordHash,
      role: command.role ?? 'user',
    });

    return {
      user: toPublicUser(user),
      ...this.issuer.issue(user.id),
    };
  }
}
