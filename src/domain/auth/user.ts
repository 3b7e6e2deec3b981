export const ROLES = ['admin', 'operator'] as const;

export type Role = (typeof ROLES)[number];

/**
 * Staff account allowed to issue bills.
 * `isPrimary` marks the bootstrap administrator, which can never be deleted.
 */
export interface User {
  readonly id: number;
  readonly username: string;
  readonly passwordHash: string;
  readonly role: Role;
  readonly isPrimary: boolean;
  readonly tokenVersion: number;
  readonly createdAt: Date;
}

/**
 * User as exposed over the API (no password hash, no token version).
 */
export interface UserSummary {
  id: number;
  username: string;
  role: Role;
  isPrimary: boolean;
  createdAt: Date;
}

export function isRole(value: string): value is Role {
  return ROLES.some((role) => role === value);
}

export function toUserSummary(user: User): UserSummary {
  return {
    id: user.id,
    username: user.username,
    role: user.role,
    isPrimary: user.isPrimary,
    createdAt: user.createdAt,
  };
}
