import { Settings } from 'lucide-react';
import { InventoryConfigManager } from '@/components/inventory/InventoryConfigManager';
import { Capability } from '@/lib/constants/enums';
import { getPool } from '@/lib/db';
import { requireCapability } from '@/lib/guards';
import { listCategories, listLocations } from '@/lib/inventory/config';

export const dynamic = 'force-dynamic';

export default async function InventoryConfigPage() {
  const session = await requireCapability(Capability.MANAGE_INVENTORY_CONFIG);

  const db = getPool();
  const [locations, categories] = await Promise.all([listLocations(db), listCategories(db)]);

  return (
    <div className="space-y-6">
      <div>
        <h1 className="flex items-center gap-2 text-2xl font-bold tracking-tight">
          <Settings className="h-6 w-6" />
          Inventar-Konfiguration
        </h1>
        <p className="text-muted-foreground">
          Standorte und Kategorien verwalten. Belegte Einträge können nicht gelöscht werden.
        </p>
      </div>

      <InventoryConfigManager
        locations={locations.map(({ id, name, isActive }) => ({ id, name, isActive }))}
        categories={categories.map(({ id, keyName, displayName, isActive }) => ({
          id,
          keyName,
          displayName,
          isActive,
        }))}
        csrfToken={session.csrfToken}
      />
    </div>
  );
}
