'use client';

import { useActionState } from 'react';
import { AlertTriangle, Check, CheckCircle2 } from 'lucide-react';
import { validateAlumniAction } from '@/app/actions/alumni';
import { Button } from '@/components/ui/button';
import { Table, TableBody, TableCell, TableHead, TableHeader, TableRow } from '@/components/ui/table';
import { CSRF_FIELD } from '@/lib/constants/csrf';
import type { PendingAlumniView } from '@/lib/alumni';
import type { AlumniActionState } from '@/types/alumni';

const initialState: AlumniActionState = { status: 'idle', message: '' };

interface AlumniValidationPanelProps {
  pending: PendingAlumniView[];
  csrfToken: string;
}

export function AlumniValidationPanel({ pending, csrfToken }: AlumniValidationPanelProps) {
  const [state, formAction, isPending] = useActionState(validateAlumniAction, initialState);

  return (
    <div className="space-y-4">
      {state.status === 'success' && (
        <div role="status" className="flex items-center gap-2 rounded-md border border-green-200 bg-green-50 p-3 text-sm text-green-800">
          <CheckCircle2 className="h-4 w-4" />
          {state.message}
        </div>
      )}
      {state.status === 'error' && (
        <div role="alert" className="flex items-center gap-2 rounded-md border border-red-200 bg-red-50 p-3 text-sm text-red-800">
          <AlertTriangle className="h-4 w-4" />
          {state.message}
        </div>
      )}

      {pending.length === 0 ? (
        <div className="flex flex-col items-center gap-2 py-12 text-center text-muted-foreground">
          <CheckCircle2 className="h-10 w-10" />
          <p>Keine ausstehenden Alumni-Validierungen.</p>
          <small>Alle Alumni-Profile sind validiert.</small>
        </div>
      ) : (
        <Table>
          <TableHeader>
            <TableRow>
              <TableHead>Name</TableHead>
              <TableHead>E-Mail</TableHead>
              <TableHead>Beantragt am</TableHead>
              <TableHead>Mitglied seit</TableHead>
              <TableHead>Aktionen</TableHead>
            </TableRow>
          </TableHeader>
          <TableBody>
            {pending.map((alumni) => (
              <TableRow key={alumni.id}>
                <TableCell>
                  <strong>{alumni.name}</strong>
                </TableCell>
                <TableCell>{alumni.email}</TableCell>
                <TableCell>{alumni.requestedAt}</TableCell>
                <TableCell>{alumni.memberSince}</TableCell>
                <TableCell>
                  <form action={formAction}>
                    <input type="hidden" name={CSRF_FIELD} value={csrfToken} />
                    <input type="hidden" name="user_id" value={alumni.id} />
                    <Button type="submit" size="sm" disabled={isPending}>
                      <Check className="h-3.5 w-3.5" />
                      Validieren
                    </Button>
                  </form>
                </TableCell>
              </TableRow>
            ))}
          </TableBody>
        </Table>
      )}
    </div>
  );
}
