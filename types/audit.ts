/** Filters for querying system_logs (client-safe, no server deps). */
export interface AuditLogFilters {
  targetType?: string;
  action?: string;
  userId?: number;
  targetId?: number;
  /** `YYYY-MM-DD` or `YYYY-MM-DD HH:mm:ss`, compared against the row timestamp. */
  dateFrom?: string;
  dateTo?: string;
  limit?: number;
  offset?: number;
}

/** One system_logs row joined with the acting user. */
export interface AuditLogEntry {
  id: number;
  timestamp: Date;
  action: string;
  targetType: string | null;
  targetId: number | null;
  actorUserId: number | null;
  actorFirstname: string | null;
  actorLastname: string | null;
  actorEmail: string | null;
}

export interface ResolvedAuditLogEntry extends AuditLogEntry {
  targetName: string | null;
}

/** Raw query values the inventory audit page was opened with. */
export interface AuditQueryParams {
  action?: string;
  date_from?: string;
  date_to?: string;
}
