export const ROLES = ['admin', 'user'] as const;

export type Role = (typeof ROLES)[number];

/**
 * User domain entity. Email is the login identifier and is stored lower-cased.
 */
export interface User {
  readonly id: string;
  readonly username: string;
  readonly email: string;
  readonly passwordHash: string;
  readonly role: Role;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface NewUser {
  username: string;
  email: string;
  passwordHash: string;
  role: Role;
}

/**
 * What the API exposes about a user (never the password hash).
 */
export interface PublicUser {
  id: string;
  username: string;
  email: string;
  role: Role;
  createdAt: Date;
  updatedAt: Date;
}

export function toPublicUser(user: User): PublicUser {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    role: user.role,
    createdAt: user.createdAt,
    updatedAt: user.updatedAt,
  };
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}
