import { LoginForm } from '@/components/auth/LoginForm';
import { Card, CardContent, CardDescription, CardHeader, CardTitle } from '@/components/ui/card';
import { MICROSOFT_PROVIDER_ID } from '@/lib/auth';
import { getConfig } from '@/lib/config';

export const dynamic = 'force-dynamic';

const ERROR_MESSAGES: Record<string, string> = {
  AccessDenied: 'Für diese Microsoft-Adresse existiert kein Konto.',
  CredentialsSignin: 'E-Mail oder Passwort ist falsch.',
};

export default async function LoginPage({
  searchParams,
}: {
  searchParams: Promise<{ error?: string | string[] }>;
}) {
  const config = getConfig();
  const { error } = await searchParams;
  const errorCode = Array.isArray(error) ? error[0] : error;
  const errorMessage = errorCode ? (ERROR_MESSAGES[errorCode] ?? 'Anmeldung fehlgeschlagen.') : null;

  return (
    <div className="flex min-h-screen items-center justify-center bg-muted p-4">
      <Card className="w-full max-w-sm">
        <CardHeader>
          <CardTitle className="text-xl">{config.siteName}</CardTitle>
          <CardDescription>Melden Sie sich mit Ihrem Mitgliedskonto an.</CardDescription>
        </CardHeader>
        <CardContent className="space-y-4">
          {errorMessage && (
            <p role="alert" className="rounded-md border border-red-200 bg-red-50 p-3 text-sm text-red-800">
              {errorMessage}
            </p>
          )}
          <LoginForm
            microsoftEnabled={config.auth.microsoft !== null}
            microsoftProviderId={MICROSOFT_PROVIDER_ID}
          />
        </CardContent>
      </Card>
    </div>
  );
}
