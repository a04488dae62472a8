import Link from 'next/link';
import { Filter, Search, X } from 'lucide-react';
import { Button, buttonVariants } from '@/components/ui/button';
import { Card, CardContent, CardHeader, CardTitle } from '@/components/ui/card';
import { Input } from '@/components/ui/input';
import { Label } from '@/components/ui/label';
import { AUDIT_ACTION_OPTIONS } from '@/lib/audit/presenter';
import type { AuditQueryParams } from '@/types/audit';

interface AuditFilterFormProps {
  /** Raw query values, echoed back so the form keeps what the user typed. */
  params: AuditQueryParams;
  action: string;
}

export function AuditFilterForm({ params, action }: AuditFilterFormProps) {
  return (
    <Card>
      <CardHeader className="pb-4">
        <CardTitle className="flex items-center gap-2 text-base">
          <Filter className="h-4 w-4" />
          Filter
        </CardTitle>
      </CardHeader>
      <CardContent>
        <form method="GET" action={action} className="space-y-4">
          <div className="grid gap-4 md:grid-cols-3">
            <div className="space-y-2">
              <Label htmlFor="action">Aktion</Label>
              <select
                id="action"
                name="action"
                defaultValue={params.action ?? ''}
                className="flex h-9 w-full rounded-md border bg-transparent px-3 text-sm"
              >
                {AUDIT_ACTION_OPTIONS.map((option) => (
                  <option key={option.value} value={option.value}>
                    {option.label}
                  </option>
                ))}
              </select>
            </div>
            <div className="space-y-2">
              <Label htmlFor="date_from">Von Datum</Label>
              <Input type="date" id="date_from" name="date_from" defaultValue={params.date_from ?? ''} />
            </div>
            <div className="space-y-2">
              <Label htmlFor="date_to">Bis Datum</Label>
              <Input type="date" id="date_to" name="date_to" defaultValue={params.date_to ?? ''} />
            </div>
          </div>
          <div className="flex gap-2">
            <Button type="submit">
              <Search className="h-4 w-4" />
              Filtern
            </Button>
            <Link href={action} className={buttonVariants({ variant: 'secondary' })}>
              <X className="h-4 w-4" />
              Filter zurücksetzen
            </Link>
          </div>
        </form>
      </CardContent>
    </Card>
  );
}
