/**
 * User account persistence (Neon Postgres)
 *
 * Writes are compare-and-swap on the row `version`: an update built from a
 * stale read matches no row and returns null, so the caller can re-read.
 */

import type { NeonQueryFunction } from '@neondatabase/serverless';
import { toUtcDate } from '../utils/otp.js';

export interface PendingOtp {
  code: string;
  expiresAt: Date;
}

export interface UserRecord {
  id: number;
  username: string;
  email: string;
  fullName: string;
  passwordHash: string;
  isVerified: boolean;
  isActive: boolean;
  otp: PendingOtp | null;
  version: number;
  createdAt: Date;
}

export interface NewUser {
  username: string;
  email: string;
  fullName: string;
  passwordHash: string;
  otp: PendingOtp;
}

export type UserChanges = Partial<Pick<UserRecord, 'passwordHash' | 'isVerified' | 'isActive' | 'otp'>>;

export interface UserRepository {
  findById(id: number): Promise<UserRecord | null>;
  findByEmail(email: string): Promise<UserRecord | null>;
  findByEmailOrUsername(email: string, username: string): Promise<UserRecord | null>;
  /** Returns null when the email or username is already taken. */
  create(user: NewUser): Promise<UserRecord | null>;
  /** Returns null when the row changed since `user` was read. */
  update(user: UserRecord, changes: UserChanges): Promise<UserRecord | null>;
}

type Row = Record<string, unknown>;

function toDate(value: unknown): Date {
  if (value instanceof Date) return value;
  if (typeof value === 'string') return toUtcDate(value);
  return new Date(Number(value));
}

export function toUserRecord(row: Row): UserRecord {
  const otpCode = typeof row.otp_code === 'string' ? row.otp_code.trim() : null;
  const otpExpiry = row.otp_expiry === null || row.otp_expiry === undefined ? null : toDate(row.otp_expiry);

  return {
    id: Number(row.id),
    username: String(row.username),
    email: String(row.email),
    fullName: typeof row.full_name === 'string' ? row.full_name : '',
    passwordHash: String(row.hashed_password),
    isVerified: row.is_verified === true,
    isActive: row.is_active === true,
    otp: otpCode && otpExpiry ? { code: otpCode, expiresAt: otpExpiry } : null,
    version: Number(row.version),
    createdAt: toDate(row.created_at),
  };
}

const first = (rows: Row[]): UserRecord | null => (rows.length > 0 ? toUserRecord(rows[0]) : null);

export function createUserRepository(sql: NeonQueryFunction<false, false>): UserRepository {
  return {
    async findById(id) {
      return first(await sql`SELECT * FROM users WHERE id = ${id}`);
    },

    async findByEmail(email) {
      return first(await sql`SELECT * FROM users WHERE email = ${email}`);
    },

    async findByEmailOrUsername(email, username) {
      return first(await sql`
        SELECT * FROM users
        WHERE email = ${email} OR username = ${username}
        LIMIT 1
      `);
    },

    async create(user) {
      const rows = await sql`
        INSERT INTO users (
          username,
          email,
          full_name,
          hashed_password,
          is_verified,
          is_active,
          otp_code,
          otp_expiry
        ) VALUES (
          ${user.username},
          ${user.email},
          ${user.fullName},
          ${user.passwordHash},
          false,
          false,
          ${user.otp.code},
          ${user.otp.expiresAt.toISOString()}
        )
        ON CONFLICT DO NOTHING
        RETURNING *
      `;
      return first(rows);
    },

    async update(user, changes) {
      const next = { ...user, ...changes };
      const rows = await sql`
        UPDATE users
        SET hashed_password = ${next.passwordHash},
            is_verified = ${next.isVerified},
            is_active = ${next.isActive},
            otp_code = ${next.otp?.code ?? null},
            otp_expiry = ${next.otp ? next.otp.expiresAt.toISOString() : null},
            version = version + 1
        WHERE id = ${user.id} AND version = ${user.version}
        RETURNING *
      `;
      return first(rows);
    },
  };
}
