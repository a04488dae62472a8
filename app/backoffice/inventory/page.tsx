import Link from 'next/link';
import { ArrowRight, History, Package, Settings } from 'lucide-react';
import { buttonVariants } from '@/components/ui/button';
import { Card, CardContent, CardDescription, CardHeader, CardTitle } from '@/components/ui/card';
import { Capability } from '@/lib/constants/enums';
import { requireCapability } from '@/lib/guards';
import { can } from '@/lib/permissions';

export default async function InventoryPage() {
  const session = await requireCapability(Capability.VIEW_INVENTORY);
  const { role } = session.user;

  const sections = [
    {
      title: 'Inventar-Audit',
      description: 'Verlauf aller Änderungen am Inventar - wer, was, wann.',
      href: '/backoffice/inventory/audit',
      icon: History,
      visible: can(role, Capability.VIEW_INVENTORY_AUDIT),
    },
    {
      title: 'Inventar-Konfiguration',
      description: 'Standorte und Kategorien verwalten.',
      href: '/backoffice/inventory/config',
      icon: Settings,
      visible: can(role, Capability.MANAGE_INVENTORY_CONFIG),
    },
  ].filter((section) => section.visible);

  return (
    <div className="space-y-6">
      <div>
        <h1 className="flex items-center gap-2 text-2xl font-bold tracking-tight">
          <Package className="h-6 w-6" />
          Inventar
        </h1>
        <p className="text-muted-foreground">Verwaltung rund um das Vereinsinventar.</p>
      </div>

      {sections.length === 0 ? (
        <p className="text-sm text-muted-foreground">
          Für Ihre Rolle stehen hier keine Verwaltungsbereiche zur Verfügung.
        </p>
      ) : (
        <div className="grid gap-4 md:grid-cols-2">
          {sections.map(({ title, description, href, icon: Icon }) => (
            <Card key={href}>
              <CardHeader>
                <CardTitle className="flex items-center gap-2">
                  <Icon className="h-5 w-5" />
                  {title}
                </CardTitle>
                <CardDescription>{description}</CardDescription>
              </CardHeader>
              <CardContent>
                <Link href={href} className={buttonVariants({ variant: 'outline', size: 'sm' })}>
                  Öffnen
                  <ArrowRight className="h-3.5 w-3.5" />
                </Link>
              </CardContent>
            </Card>
          ))}
        </div>
      )}
    </div>
  );
}
