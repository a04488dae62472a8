import { format } from 'date-fns';
import { AuditAction } from '@/lib/constants/enums';
import type { AuditLogFilters, ResolvedAuditLogEntry } from '@/types/audit';
import { hasDateFilter } from './filters';

export type AuditTone = 'success' | 'info' | 'danger' | 'warning' | 'primary';

export interface AuditActionMeta {
  label: string;
  tone: AuditTone;
}

export const UNKNOWN_TARGET = 'Unbekannt';
export const INVENTORY_PAGE_HREF = '/backoffice/inventory';

const ACTION_META: Partial<Record<string, AuditActionMeta>> = {
  [AuditAction.CREATE]: { label: 'Erstellt', tone: 'success' },
  [AuditAction.UPDATE]: { label: 'Aktualisiert', tone: 'info' },
  [AuditAction.DELETE]: { label: 'Gelöscht', tone: 'danger' },
  [AuditAction.ADJUST_QUANTITY]: { label: 'Menge angepasst', tone: 'warning' },
};

/** Options of the action filter; '' means no filter. */
export const AUDIT_ACTION_OPTIONS: { value: string; label: string }[] = [
  { value: '', label: 'Alle Aktionen' },
  { value: AuditAction.CREATE, label: 'Erstellt' },
  { value: AuditAction.UPDATE, label: 'Aktualisiert' },
  { value: AuditAction.DELETE, label: 'Gelöscht' },
  { value: AuditAction.ADJUST_QUANTITY, label: 'Menge angepasst' },
];

export function getActionMeta(action: string): AuditActionMeta {
  return ACTION_META[action] ?? { label: action, tone: 'primary' };
}

/** `dd.MM.yyyy` and `HH:mm:ss Uhr` in server-local time. */
export function formatAuditTimestamp(timestamp: Date): { date: string; time: string } {
  return {
    date: format(timestamp, 'dd.MM.yyyy'),
    time: `${format(timestamp, 'HH:mm:ss')} Uhr`,
  };
}

export interface AuditRow {
  id: number;
  date: string;
  time: string;
  action: AuditActionMeta;
  targetName: string;
  targetIdLabel: string;
  actorName: string;
  actorEmail: string;
  /** Deleted records have nothing to navigate to. */
  href: string | null;
}

export function buildAuditRows(entries: ResolvedAuditLogEntry[]): AuditRow[] {
  return entries.map((entry) => {
    const { date, time } = formatAuditTimestamp(entry.timestamp);
    return {
      id: entry.id,
      date,
      time,
      action: getActionMeta(entry.action),
      targetName: entry.targetName ?? UNKNOWN_TARGET,
      targetIdLabel: `ID: ${entry.targetId ?? ''}`,
      actorName: `${entry.actorFirstname ?? ''} ${entry.actorLastname ?? ''}`.trim(),
      actorEmail: entry.actorEmail ?? '',
      href: entry.action === AuditAction.DELETE ? null : INVENTORY_PAGE_HREF,
    };
  });
}

export interface AuditStats {
  total: number;
  shown: number;
  period: 'Gefiltert' | 'Alle';
  /** Set when more entries match than the page shows. */
  truncationNotice: string | null;
}

export function buildAuditStats(
  filters: AuditLogFilters,
  total: number,
  shown: number
): AuditStats {
  return {
    total,
    shown,
    period: hasDateFilter(filters) ? 'Gefiltert' : 'Alle',
    truncationNotice:
      total > shown ? `Es werden die ersten ${shown} von ${total} Einträgen angezeigt.` : null,
  };
}
