import Link from 'next/link';
import { Card, CardDescription, CardHeader, CardTitle } from '@/components/ui/card';
import { visibleNavItems } from '@/lib/navigation';
import { getCurrentSession } from '@/lib/session';
import { redirect } from 'next/navigation';
import { LOGIN_PAGE } from '@/lib/guards';

export default async function BackofficeHomePage() {
  const session = await getCurrentSession();
  if (!session?.user) {
    redirect(LOGIN_PAGE);
  }

  const shortcuts = visibleNavItems(session.user.role).filter((item) => item.href !== '/backoffice');

  return (
    <div className="space-y-6">
      <div>
        <h1 className="text-2xl font-bold tracking-tight">
          Willkommen, {session.user.name || session.user.email}
        </h1>
        <p className="text-muted-foreground">Ihre Bereiche in der Verwaltung.</p>
      </div>

      <div className="grid gap-4 sm:grid-cols-2 lg:grid-cols-3">
        {shortcuts.map((item) => {
          const Icon = item.icon;
          return (
            <Link key={item.href} href={item.href}>
              <Card className="transition-colors hover:bg-accent">
                <CardHeader>
                  <CardTitle className="flex items-center gap-2 text-base">
                    <Icon className="h-5 w-5" />
                    {item.label}
                  </CardTitle>
                  <CardDescription>{item.href}</CardDescription>
                </CardHeader>
              </Card>
            </Link>
          );
        })}
      </div>
    </div>
  );
}
