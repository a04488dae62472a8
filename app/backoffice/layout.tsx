import type { Metadata } from 'next';
import { redirect } from 'next/navigation';
import { Sidebar } from '@/components/backoffice/Sidebar';
import { SignOutButton } from '@/components/backoffice/SignOutButton';
import { getConfig } from '@/lib/config';
import { LOGIN_PAGE } from '@/lib/guards';
import { getCurrentSession } from '@/lib/session';

export const dynamic = 'force-dynamic';

export function generateMetadata(): Metadata {
  return { title: `${getConfig().siteName} - Verwaltung` };
}

export default async function BackofficeLayout({
  children,
}: {
  children: React.ReactNode;
}) {
  const session = await getCurrentSession();
  if (!session?.user) {
    redirect(LOGIN_PAGE);
  }
  const { siteName } = getConfig();

  return (
    <div className="flex min-h-screen">
      <aside className="hidden w-64 border-r bg-card lg:block">
        <Sidebar role={session.user.role} siteName={siteName} />
      </aside>

      <div className="flex min-w-0 flex-1 flex-col">
        <header className="flex h-16 items-center justify-between border-b bg-card px-4 lg:px-6">
          <h2 className="hidden text-lg font-semibold sm:block">{siteName}</h2>
          <div className="flex items-center gap-4">
            <div className="text-right">
              <p className="text-sm font-medium">{session.user.name || session.user.email}</p>
              <p className="text-xs text-muted-foreground">{session.user.role}</p>
            </div>
            <SignOutButton />
          </div>
        </header>

        <main className="flex-1 overflow-auto p-4 lg:p-6">{children}</main>
      </div>
    </div>
  );
}
