import { Clock, Filter, List } from 'lucide-react';
import { Card, CardContent } from '@/components/ui/card';
import type { AuditStats as AuditStatsData } from '@/lib/audit/presenter';

export function AuditStats({ stats }: { stats: AuditStatsData }) {
  const items = [
    { label: 'Gesamt Einträge', value: String(stats.total), icon: List, color: 'bg-blue-600' },
    { label: 'Angezeigte Einträge', value: String(stats.shown), icon: Filter, color: 'bg-green-600' },
    { label: 'Zeitraum', value: stats.period, icon: Clock, color: 'bg-sky-500' },
  ];

  return (
    <div className="grid gap-4 md:grid-cols-3">
      {items.map(({ label, value, icon: Icon, color }) => (
        <Card key={label}>
          <CardContent className="flex items-center gap-4 p-4">
            <div className={`flex h-10 w-10 items-center justify-center rounded-lg text-white ${color}`}>
              <Icon className="h-5 w-5" />
            </div>
            <div>
              <p className="text-sm text-muted-foreground">{label}</p>
              <p className="text-xl font-semibold" data-stat={label}>
                {value}
              </p>
            </div>
          </CardContent>
        </Card>
      ))}
    </div>
  );
}
