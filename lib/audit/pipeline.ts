import type { AuditLogFilters, ResolvedAuditLogEntry } from '@/types/audit';
import type { AuditLogReader } from './repository';

export interface AuditLogPage {
  entries: ResolvedAuditLogEntry[];
  total: number;
}

/**
 * Reads one page of log entries with the total match count and attaches the
 * display name of each entry's target. A name lookup that fails leaves that
 * entry unnamed; the page still renders.
 */
export async function loadAuditLogPage(
  reader: AuditLogReader,
  filters: AuditLogFilters
): Promise<AuditLogPage> {
  const [logs, total] = await Promise.all([reader.fetchLogs(filters), reader.countLogs(filters)]);

  const entries = await Promise.all(
    logs.map(async (entry): Promise<ResolvedAuditLogEntry> => {
      try {
        const targetName = await reader.resolveTargetName(entry.targetType, entry.targetId);
        return { ...entry, targetName };
      } catch (error) {
        console.error(`Failed to resolve audit target ${entry.targetType}#${entry.targetId}:`, error);
        return { ...entry, targetName: null };
      }
    })
  );

  return { entries, total };
}
