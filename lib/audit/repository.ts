import { AuditTargetType, type AuditAction } from '@/lib/constants/enums';
import type { Queryable } from '@/lib/db';
import type { AuditLogEntry, AuditLogFilters } from '@/types/audit';

export const DEFAULT_LOG_LIMIT = 100;
export const MAX_LOG_LIMIT = 1000;

export interface AuditLogData {
  userId: number;
  action: AuditAction;
  targetType: AuditTargetType;
  targetId: number;
  details?: Record<string, unknown>;
  ipAddress?: string | null;
}

/** Read side of system_logs, as the audit page consumes it. */
export interface AuditLogReader {
  fetchLogs(filters: AuditLogFilters): Promise<AuditLogEntry[]>;
  countLogs(filters: AuditLogFilters): Promise<number>;
  resolveTargetName(targetType: string | null, targetId: number | null): Promise<string | null>;
}

interface SystemLogRow {
  id: number;
  timestamp: Date;
  action: string;
  target_type: string | null;
  target_id: number | null;
  user_id: number | null;
  firstname: string | null;
  lastname: string | null;
  email: string | null;
}

interface CountRow {
  total: number | bigint;
}

interface NameRow {
  name: string | null;
}

function buildWhere(filters: AuditLogFilters): { clause: string; values: unknown[] } {
  const conditions: string[] = [];
  const values: unknown[] = [];

  if (filters.targetType) {
    conditions.push('sl.target_type = ?');
    values.push(filters.targetType);
  }
  if (filters.action) {
    conditions.push('sl.action = ?');
    values.push(filters.action);
  }
  if (filters.userId != null) {
    conditions.push('sl.user_id = ?');
    values.push(filters.userId);
  }
  if (filters.targetId != null) {
    conditions.push('sl.target_id = ?');
    values.push(filters.targetId);
  }
  if (filters.dateFrom) {
    conditions.push('sl.timestamp >= ?');
    values.push(filters.dateFrom);
  }
  if (filters.dateTo) {
    conditions.push('sl.timestamp <= ?');
    values.push(filters.dateTo);
  }

  return {
    clause: conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '',
    values,
  };
}

/** Limit in 1..1000 (default 100), offset >= 0. */
export function clampPaging(filters: AuditLogFilters): { limit: number; offset: number } {
  const limit = Math.trunc(filters.limit ?? DEFAULT_LOG_LIMIT);
  const offset = Math.trunc(filters.offset ?? 0);
  return {
    limit: Math.min(Math.max(Number.isFinite(limit) ? limit : DEFAULT_LOG_LIMIT, 1), MAX_LOG_LIMIT),
    offset: Math.max(Number.isFinite(offset) ? offset : 0, 0),
  };
}

function toEntry(row: SystemLogRow): AuditLogEntry {
  return {
    id: row.id,
    timestamp: row.timestamp,
    action: row.action,
    targetType: row.target_type,
    targetId: row.target_id,
    actorUserId: row.user_id,
    actorFirstname: row.firstname,
    actorLastname: row.lastname,
    actorEmail: row.email,
  };
}

const TARGET_NAME_QUERIES: Partial<Record<string, string>> = {
  [AuditTargetType.INVENTORY]: 'SELECT name FROM inventory WHERE id = ?',
  [AuditTargetType.NEWS]: 'SELECT title AS name FROM news WHERE id = ?',
  [AuditTargetType.ALUMNI]: "SELECT CONCAT(firstname, ' ', lastname) AS name FROM users WHERE id = ?",
};

export function createAuditLogRepository(db: Queryable): AuditLogReader {
  return {
    async fetchLogs(filters) {
      const { clause, values } = buildWhere(filters);
      const { limit, offset } = clampPaging(filters);
      const rows = await db.query<SystemLogRow[]>(
        `SELECT sl.id, sl.timestamp, sl.action, sl.target_type, sl.target_id, sl.user_id,
                u.firstname, u.lastname, u.email
         FROM system_logs sl
         LEFT JOIN users u ON u.id = sl.user_id${clause}
         ORDER BY sl.timestamp DESC, sl.id DESC
         LIMIT ? OFFSET ?`,
        [...values, limit, offset]
      );
      return rows.map(toEntry);
    },

    async countLogs(filters) {
      const { clause, values } = buildWhere(filters);
      const rows = await db.query<CountRow[]>(
        `SELECT COUNT(*) AS total FROM system_logs sl${clause}`,
        values
      );
      return rows.length > 0 ? Number(rows[0].total) : 0;
    },

    async resolveTargetName(targetType, targetId) {
      if (!targetType || targetId == null) return null;
      const sql = TARGET_NAME_QUERIES[targetType];
      if (!sql) return null;
      const rows = await db.query<NameRow[]>(sql, [targetId]);
      return rows[0]?.name ?? null;
    },
  };
}

/** Records an administrative action. Never throws: a failed audit write must not undo the action. */
export async function logAudit(db: Queryable, data: AuditLogData): Promise<boolean> {
  try {
    await db.query(
      `INSERT INTO system_logs (user_id, action, target_type, target_id, details, ip_address)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [
        data.userId,
        data.action,
        data.targetType,
        data.targetId,
        data.details ? JSON.stringify(data.details) : null,
        data.ipAddress ?? null,
      ]
    );
    return true;
  } catch (error) {
    console.error('Failed to create audit log:', error);
    return false;
  }
}
