import { History } from 'lucide-react';
import { AuditFilterForm } from '@/components/audit/AuditFilterForm';
import { AuditLogTable } from '@/components/audit/AuditLogTable';
import { AuditStats } from '@/components/audit/AuditStats';
import { Card, CardContent, CardHeader, CardTitle } from '@/components/ui/card';
import { buildInventoryAuditFilters, readAuditQueryParams } from '@/lib/audit/filters';
import { loadAuditLogPage } from '@/lib/audit/pipeline';
import { buildAuditRows, buildAuditStats } from '@/lib/audit/presenter';
import { createAuditLogRepository } from '@/lib/audit/repository';
import { Capability } from '@/lib/constants/enums';
import { getPool } from '@/lib/db';
import { requireCapability } from '@/lib/guards';

export const dynamic = 'force-dynamic';

const PAGE_PATH = '/backoffice/inventory/audit';

export default async function InventoryAuditPage({
  searchParams,
}: {
  searchParams: Promise<Record<string, string | string[] | undefined>>;
}) {
  await requireCapability(Capability.VIEW_INVENTORY_AUDIT);

  const params = readAuditQueryParams(await searchParams);
  const filters = buildInventoryAuditFilters(params);
  const { entries, total } = await loadAuditLogPage(createAuditLogRepository(getPool()), filters);
  const stats = buildAuditStats(filters, total, entries.length);

  return (
    <div className="space-y-6">
      <div>
        <h1 className="flex items-center gap-2 text-2xl font-bold tracking-tight">
          <History className="h-6 w-6" />
          Inventar-Audit
        </h1>
        <p className="text-muted-foreground">
          Vollständiger Verlauf aller Änderungen am Inventar - wer, was, wann.
        </p>
      </div>

      <AuditStats stats={stats} />
      <AuditFilterForm params={params} action={PAGE_PATH} />

      <Card>
        <CardHeader>
          <CardTitle>Audit-Protokoll</CardTitle>
        </CardHeader>
        <CardContent>
          <AuditLogTable rows={buildAuditRows(entries)} truncationNotice={stats.truncationNotice} />
        </CardContent>
      </Card>
    </div>
  );
}
