import { randomUUID } from 'crypto';
import { NewUser, User } from '../../domain/auth/user.js';
import { ValidationError } from '../../application/errors.js';
import { UserRepository } from '../../application/repositories.js';

/**
 * Process-local user store for tests and `STORAGE=memory` runs.
 * Enforces the same unique keys as the `users` table.
 */
export class InMemoryUserRepo implements UserRepository {
  private users = new Map<string, User>();

  constructor(private now: () => Date = () => new Date()) {}

  async findById(id: string): Promise<User | null> {
    return this.users.get(id) ?? null;
  }

  async findByEmail(email: string): Promise<User | null> {
    return [...this.users.values()].find((user) => user.email === email) ?? null;
  }

  async findByUsername(username: string): Promise<User | null> {
    return [...this.users.values()].find((user) => user.username === username) ?? null;
  }

  async create(newUser: NewUser): Promise<User> {
    if (await this.findByEmail(newUser.email)) {
      throw new ValidationError([{ path: 'email', message: 'A user with this email already exists' }]);
    }
    if (await this.findByUsername(newUser.username)) {
      throw new ValidationError([
        { path: 'username', message: 'A user with this username already exists' },
      ]);
    }

    const now = this.now();
    const user: User = { id: randomUUID(), ...newUser, createdAt: now, updatedAt: now };
    this.users.set(user.id, user);
    return user;
  }
}
