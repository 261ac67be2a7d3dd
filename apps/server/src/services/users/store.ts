import { randomUUID } from 'node:crypto';
import { toIsoString, type User } from '@socialdraft/shared';
import type { SqlExecutor } from '../../db';
import { getParamPlaceholders, toBoolean } from '../../utils/db';
import { ConflictError, ValidationError } from '../../utils/errors';

interface UserRow {
  id: string;
  email: string;
  full_name: string | null;
  is_active: unknown;
  created_at: unknown;
}

export interface CreateUserInput {
  email: string;
  fullName?: string | null;
}

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    fullName: row.full_name ?? null,
    isActive: toBoolean(row.is_active),
    createdAt: toIsoString(row.created_at) ?? '',
  };
}

export async function getUserById(db: SqlExecutor, userId: string): Promise<User | null> {
  const [idPlaceholder] = getParamPlaceholders(db.dialect, 1);
  const rows = await db.query<UserRow>(`SELECT * FROM users WHERE id = ${idPlaceholder} LIMIT 1`, [userId]);
  return rows.length ? toUser(rows[0]) : null;
}

export async function getUserByEmail(db: SqlExecutor, email: string): Promise<User | null> {
  const [emailPlaceholder] = getParamPlaceholders(db.dialect, 1);
  const rows = await db.query<UserRow>(`SELECT * FROM users WHERE email = ${emailPlaceholder} LIMIT 1`, [
    email.trim().toLowerCase(),
  ]);
  return rows.length ? toUser(rows[0]) : null;
}

export async function createUser(db: SqlExecutor, input: CreateUserInput): Promise<User> {
  const email = input.email.trim().toLowerCase();
  if (!EMAIL_PATTERN.test(email)) {
    throw new ValidationError('email is invalid');
  }
  if (await getUserByEmail(db, email)) {
    throw new ConflictError(`user already exists: ${email}`);
  }

  const user: User = {
    id: randomUUID(),
    email,
    fullName: input.fullName?.trim() || null,
    isActive: true,
    createdAt: new Date().toISOString(),
  };

  const placeholders = getParamPlaceholders(db.dialect, 5);
  await db.execute(
    `INSERT INTO users (id, email, full_name, is_active, created_at)
     VALUES (${placeholders.join(', ')})`,
    [user.id, user.email, user.fullName, user.isActive, user.createdAt],
  );
  return user;
}
