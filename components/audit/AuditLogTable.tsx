import Link from 'next/link';
import { AlertTriangle, ArrowRight, Calendar, Clock, Inbox, Info, UserCircle } from 'lucide-react';
import { Badge } from '@/components/ui/badge';
import { buttonVariants } from '@/components/ui/button';
import { Table, TableBody, TableCell, TableHead, TableHeader, TableRow } from '@/components/ui/table';
import type { AuditRow, AuditTone } from '@/lib/audit/presenter';

const toneClasses: Record<AuditTone, string> = {
  success: 'bg-green-100 text-green-800 border-green-200',
  info: 'bg-sky-100 text-sky-800 border-sky-200',
  danger: 'bg-red-100 text-red-800 border-red-200',
  warning: 'bg-yellow-100 text-yellow-800 border-yellow-200',
  primary: 'bg-blue-100 text-blue-800 border-blue-200',
};

interface AuditLogTableProps {
  rows: AuditRow[];
  truncationNotice: string | null;
}

export function AuditLogTable({ rows, truncationNotice }: AuditLogTableProps) {
  if (rows.length === 0) {
    return (
      <div className="flex flex-col items-center gap-2 py-12 text-center text-muted-foreground">
        <Inbox className="h-10 w-10" />
        <p>Keine Audit-Einträge gefunden.</p>
        <small>Versuchen Sie andere Filtereinstellungen.</small>
      </div>
    );
  }

  return (
    <div className="space-y-4">
      <Table>
        <TableHeader>
          <TableRow>
            <TableHead>Zeitstempel</TableHead>
            <TableHead>Aktion</TableHead>
            <TableHead>Gegenstand</TableHead>
            <TableHead>Benutzer</TableHead>
            <TableHead>Details</TableHead>
          </TableRow>
        </TableHeader>
        <TableBody>
          {rows.map((row) => (
            <TableRow key={row.id}>
              <TableCell>
                <span className="flex items-center gap-1 whitespace-nowrap">
                  <Calendar className="h-3.5 w-3.5 text-muted-foreground" />
                  {row.date}
                </span>
                <small className="flex items-center gap-1 text-muted-foreground">
                  <Clock className="h-3 w-3" />
                  {row.time}
                </small>
              </TableCell>
              <TableCell>
                <Badge variant="outline" className={toneClasses[row.action.tone]}>
                  {row.action.label}
                </Badge>
              </TableCell>
              <TableCell>
                <strong>{row.targetName}</strong>
                <br />
                <small className="text-muted-foreground">{row.targetIdLabel}</small>
              </TableCell>
              <TableCell>
                <div className="flex items-center gap-2">
                  <UserCircle className="h-5 w-5 text-primary" />
                  <div>
                    <strong>{row.actorName}</strong>
                    <br />
                    <small className="text-muted-foreground">{row.actorEmail}</small>
                  </div>
                </div>
              </TableCell>
              <TableCell>
                {row.href ? (
                  <Link href={row.href} className={buttonVariants({ variant: 'outline', size: 'sm' })}>
                    <ArrowRight className="h-3.5 w-3.5" />
                    Zum Inventar
                  </Link>
                ) : (
                  <span className="flex items-center gap-1 text-red-600">
                    <AlertTriangle className="h-3.5 w-3.5" />
                    Datensatz gelöscht
                  </span>
                )}
              </TableCell>
            </TableRow>
          ))}
        </TableBody>
      </Table>

      {truncationNotice && (
        <div className="flex items-center gap-2 rounded-md border border-sky-200 bg-sky-50 p-3 text-sm text-sky-800">
          <Info className="h-4 w-4" />
          <span>{truncationNotice}</span>
          <span>Verwenden Sie Filter für eine detailliertere Ansicht.</span>
        </div>
      )}
    </div>
  );
}
