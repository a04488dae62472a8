import { Clock, UserCheck } from 'lucide-react';
import { AlumniValidationPanel } from '@/components/alumni/AlumniValidationPanel';
import { Card, CardContent, CardHeader, CardTitle } from '@/components/ui/card';
import { getPendingAlumniValidations, toPendingAlumniView } from '@/lib/alumni';
import { Capability } from '@/lib/constants/enums';
import { getPool } from '@/lib/db';
import { requireCapability } from '@/lib/guards';

export const dynamic = 'force-dynamic';

export default async function AlumniValidationPage() {
  const session = await requireCapability(Capability.VALIDATE_ALUMNI);
  const pending = toPendingAlumniView(await getPendingAlumniValidations(getPool()));

  return (
    <div className="space-y-6">
      <div>
        <h1 className="flex items-center gap-2 text-2xl font-bold tracking-tight">
          <UserCheck className="h-6 w-6" />
          Alumni Validierung
        </h1>
        <p className="text-muted-foreground">
          Validieren Sie Alumni-Profile, um ihnen vollen Zugang zum Verzeichnis zu gewähren.
        </p>
      </div>

      <Card className="max-w-xs">
        <CardContent className="flex items-center gap-4 p-4">
          <div className="flex h-10 w-10 items-center justify-center rounded-lg bg-amber-500 text-white">
            <Clock className="h-5 w-5" />
          </div>
          <div>
            <p className="text-sm text-muted-foreground">Ausstehende Validierungen</p>
            <p className="text-xl font-semibold">{pending.length}</p>
          </div>
        </CardContent>
      </Card>

      <Card>
        <CardHeader>
          <CardTitle>Ausstehende Alumni-Validierungen</CardTitle>
        </CardHeader>
        <CardContent>
          <AlumniValidationPanel pending={pending} csrfToken={session.csrfToken} />
        </CardContent>
      </Card>

      <Card>
        <CardHeader>
          <CardTitle className="text-base">Alumni-Validierungs-Workflow</CardTitle>
        </CardHeader>
        <CardContent className="space-y-2 text-sm">
          <ol className="list-decimal space-y-1 pl-5">
            <li>
              <strong>Antrag:</strong> Beantragt ein Mitglied den Alumni-Status, gilt es bis zur
              Validierung als ausstehend.
            </li>
            <li>
              <strong>Zugriffsbeschränkung:</strong> Der Zugriff auf aktive Projektdaten wird sofort entzogen.
            </li>
            <li>
              <strong>Validierung:</strong> Der Vorstand prüft das Profil und validiert den Alumni-Status hier.
            </li>
            <li>
              <strong>Freischaltung:</strong> Danach ist das Profil im Alumni-Verzeichnis sichtbar.
            </li>
          </ol>
          <p className="text-muted-foreground">
            <strong>Hinweis:</strong> Nur validierte Alumni sind im Verzeichnis sichtbar.
          </p>
        </CardContent>
      </Card>
    </div>
  );
}
