import { format } from 'date-fns';
import { logAudit } from '@/lib/audit/repository';
import { AuditAction, AuditTargetType, Role } from '@/lib/constants/enums';
import type { Queryable, WriteResult } from '@/lib/db';
import { hasFullAccess } from '@/lib/permissions';

export interface PendingAlumni {
  id: number;
  firstname: string;
  lastname: string;
  email: string;
  requestedAt: Date | null;
  createdAt: Date;
}

interface PendingAlumniRow {
  id: number;
  firstname: string;
  lastname: string;
  email: string;
  alumni_status_requested_at: Date | null;
  created_at: Date;
}

export interface Validator {
  userId: number;
  role: Role;
  ipAddress?: string | null;
}

/** Alumni awaiting board validation, oldest request first. */
export async function getPendingAlumniValidations(db: Queryable): Promise<PendingAlumni[]> {
  const rows = await db.query<PendingAlumniRow[]>(
    `SELECT id, firstname, lastname, email, alumni_status_requested_at, created_at
     FROM users
     WHERE role = ? AND is_alumni_validated = 0
     ORDER BY alumni_status_requested_at IS NULL, alumni_status_requested_at ASC, id ASC`,
    [Role.ALUMNI]
  );
  return rows.map((row) => ({
    id: row.id,
    firstname: row.firstname,
    lastname: row.lastname,
    email: row.email,
    requestedAt: row.alumni_status_requested_at,
    createdAt: row.created_at,
  }));
}

/**
 * Marks a pending alumni as validated. True only when exactly that pending
 * alumni row changed; validators without full access change nothing.
 */
export async function validateAlumniStatus(
  db: Queryable,
  alumniUserId: number,
  validator: Validator
): Promise<boolean> {
  if (!hasFullAccess(validator.role)) return false;

  const result = await db.query<WriteResult>(
    'UPDATE users SET is_alumni_validated = 1 WHERE id = ? AND role = ? AND is_alumni_validated = 0',
    [alumniUserId, Role.ALUMNI]
  );
  if (result.affectedRows !== 1) return false;

  await db.query('UPDATE alumni_profiles SET is_alumni_validated = 1 WHERE user_id = ?', [
    alumniUserId,
  ]);

  await logAudit(db, {
    userId: validator.userId,
    action: AuditAction.VALIDATE,
    targetType: AuditTargetType.ALUMNI,
    targetId: alumniUserId,
    ipAddress: validator.ipAddress,
  });
  console.info(`Alumni #${alumniUserId} validated by user #${validator.userId}`);
  return true;
}

export interface PendingAlumniView {
  id: number;
  name: string;
  email: string;
  /** `dd.MM.yyyy HH:mm`, or "Nicht verfügbar" for requests from before the timestamp existed. */
  requestedAt: string;
  memberSince: string;
}

export function toPendingAlumniView(alumni: PendingAlumni[]): PendingAlumniView[] {
  return alumni.map((entry) => ({
    id: entry.id,
    name: `${entry.firstname} ${entry.lastname}`,
    email: entry.email,
    requestedAt: entry.requestedAt ? format(entry.requestedAt, 'dd.MM.yyyy HH:mm') : 'Nicht verfügbar',
    memberSince: format(entry.createdAt, 'dd.MM.yyyy'),
  }));
}
