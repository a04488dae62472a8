import bcrypt from 'bcryptjs';
import { z } from 'zod';
import type { Queryable } from '@/lib/db';
import { parseRole } from '@/lib/permissions';
import { anonymizeIp } from '@/lib/client-ip';
import { LOGIN_RATE_LIMITED_MESSAGE, MAX_FAILED_LOGINS } from '@/lib/constants/auth';
import type { Role } from '@/lib/constants/enums';
import {
  countRecentFailures,
  recordLoginAttempt,
  UNKNOWN_IP,
  type LoginFailureReason,
} from '@/lib/login-attempts';

interface UserRow {
  id: number;
  email: string;
  password: string;
  firstname: string;
  lastname: string;
  role: string;
}

export interface AuthorizedUser {
  id: string;
  email: string;
  name: string;
  role: Role;
}

const credentialsSchema = z.object({
  email: z.string().trim().email(),
  password: z.string().min(1),
});

export async function findUserByEmail(db: Queryable, email: string): Promise<UserRow | null> {
  const rows = await db.query<UserRow[]>(
    'SELECT id, email, password, firstname, lastname, role FROM users WHERE email = ? LIMIT 1',
    [email.trim().toLowerCase()]
  );
  return rows[0] ?? null;
}

function toAuthorizedUser(row: UserRow): AuthorizedUser {
  return {
    id: String(row.id),
    email: row.email,
    name: `${row.firstname} ${row.lastname}`.trim(),
    role: parseRole(row.role),
  };
}

/** Request details recorded with each credentials sign-in. */
export interface LoginContext {
  ipAddress?: string | null;
  userAgent?: string | null;
}

/** Thrown while the caller's address is locked out after repeated failures. */
export class LoginRateLimitedError extends Error {
  constructor() {
    super(LOGIN_RATE_LIMITED_MESSAGE);
    this.name = 'LoginRateLimitedError';
  }
}

function attemptedEmail(credentials: Partial<Record<string, unknown>> | undefined): string | null {
  const email = credentials?.email;
  return typeof email === 'string' && email.trim() ? email.trim().toLowerCase().slice(0, 255) : null;
}

/**
 * Email/password sign-in. Null for malformed input, unknown users and wrong
 * passwords alike; every attempt is recorded, and an address with
 * MAX_FAILED_LOGINS recent failures is refused before any lookup.
 */
export async function authorizeCredentials(
  db: Queryable,
  credentials: Partial<Record<string, unknown>> | undefined,
  context: LoginContext = {}
): Promise<AuthorizedUser | null> {
  const ipAddress = anonymizeIp(context.ipAddress) ?? UNKNOWN_IP;
  const attempt = {
    email: attemptedEmail(credentials),
    userId: null,
    ipAddress,
    userAgent: context.userAgent ?? null,
  };
  const fail = async (failureReason: LoginFailureReason) => {
    await recordLoginAttempt(db, { ...attempt, success: false, failureReason });
    return null;
  };

  if ((await countRecentFailures(db, ipAddress)) >= MAX_FAILED_LOGINS) {
    await fail('rate_limited');
    console.warn(`Login blocked for ${ipAddress}: too many failed attempts`);
    throw new LoginRateLimitedError();
  }

  const parsed = credentialsSchema.safeParse(credentials ?? {});
  if (!parsed.success) return fail('invalid_input');

  const user = await findUserByEmail(db, parsed.data.email);
  if (!user?.password) return fail('user_not_found');

  const isValid = await bcrypt.compare(parsed.data.password, user.password);
  if (!isValid) return fail('invalid_password');

  await recordLoginAttempt(db, { ...attempt, userId: user.id, success: true, failureReason: null });
  return toAuthorizedUser(user);
}

/** Single sign-on only admits addresses that already have an account. */
export async function authorizeSsoUser(
  db: Queryable,
  email: string | null | undefined
): Promise<AuthorizedUser | null> {
  if (!email) return null;
  const user = await findUserByEmail(db, email);
  return user ? toAuthorizedUser(user) : null;
}
