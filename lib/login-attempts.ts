import { LOGIN_LOCKOUT_MINUTES } from '@/lib/constants/auth';
import type { Queryable } from '@/lib/db';

export type LoginFailureReason = 'invalid_input' | 'user_not_found' | 'invalid_password' | 'rate_limited';

export interface LoginAttempt {
  email: string | null;
  userId: number | null;
  /** Already anonymized; see anonymizeIp. */
  ipAddress: string;
  success: boolean;
  failureReason: LoginFailureReason | null;
  userAgent: string | null;
}

/** Stored in place of an address the request did not carry. */
export const UNKNOWN_IP = 'unknown';
const USER_AGENT_MAX_LENGTH = 500;

interface CountRow {
  total: number | bigint;
}

/**
 * Failed attempts from an address inside the lockout window. Attempts that
 * were refused because of the lockout do not extend it.
 */
export async function countRecentFailures(db: Queryable, ipAddress: string): Promise<number> {
  const rows = await db.query<CountRow[]>(
    `SELECT COUNT(*) AS total FROM login_attempts
     WHERE ip_address = ? AND success = 0 AND failure_reason <> 'rate_limited'
       AND attempt_time > DATE_SUB(NOW(), INTERVAL ? MINUTE)`,
    [ipAddress, LOGIN_LOCKOUT_MINUTES]
  );
  return rows.length > 0 ? Number(rows[0].total) : 0;
}

/** Never throws: a failed write must not block or admit a sign-in. */
export async function recordLoginAttempt(db: Queryable, attempt: LoginAttempt): Promise<void> {
  try {
    await db.query(
      `INSERT INTO login_attempts (email, user_id, ip_address, success, failure_reason, user_agent)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [
        attempt.email,
        attempt.userId,
        attempt.ipAddress,
        attempt.success ? 1 : 0,
        attempt.failureReason,
        attempt.userAgent?.slice(0, USER_AGENT_MAX_LENGTH) ?? null,
      ]
    );
  } catch (error) {
    console.error('Failed to record login attempt:', error);
  }
}
