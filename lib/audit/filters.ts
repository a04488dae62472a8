import { AuditTargetType } from '@/lib/constants/enums';
import type { AuditLogFilters, AuditQueryParams } from '@/types/audit';

export const INVENTORY_AUDIT_PAGE_SIZE = 50;

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const END_OF_DAY = ' 23:59:59';

type RawParam = string | string[] | undefined;

/** First value of a possibly repeated query parameter. */
export function firstParam(value: RawParam): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/** Query values as the page received them, repeated keys collapsed. */
export function readAuditQueryParams(searchParams: Record<string, RawParam>): AuditQueryParams {
  return {
    action: firstParam(searchParams.action),
    date_from: firstParam(searchParams.date_from),
    date_to: firstParam(searchParams.date_to),
  };
}

function isCalendarDate(value: string | undefined): value is string {
  return value !== undefined && DATE_PATTERN.test(value);
}

/**
 * Filters for the inventory audit page. Dates that are not `YYYY-MM-DD` are
 * dropped without notice; `date_to` covers the whole day.
 */
export function buildInventoryAuditFilters(params: AuditQueryParams): AuditLogFilters {
  const filters: AuditLogFilters = {
    targetType: AuditTargetType.INVENTORY,
    limit: INVENTORY_AUDIT_PAGE_SIZE,
    offset: 0,
  };

  if (params.action) {
    filters.action = params.action;
  }
  if (isCalendarDate(params.date_from)) {
    filters.dateFrom = params.date_from;
  }
  if (isCalendarDate(params.date_to)) {
    filters.dateTo = params.date_to + END_OF_DAY;
  }

  return filters;
}

export function hasDateFilter(filters: AuditLogFilters): boolean {
  return Boolean(filters.dateFrom || filters.dateTo);
}
