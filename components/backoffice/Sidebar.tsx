'use client';

import Link from 'next/link';
import { usePathname } from 'next/navigation';
import type { Role } from '@/lib/constants/enums';
import { activeNavHref, visibleNavItems } from '@/lib/navigation';
import { cn } from '@/lib/utils';

export function Sidebar({ role, siteName }: { role: Role; siteName: string }) {
  const pathname = usePathname();
  const items = visibleNavItems(role);
  const activeHref = activeNavHref(items, pathname);

  return (
    <div className="flex h-full flex-col">
      <div className="flex items-center gap-3 border-b px-4 py-4">
        <div className="flex h-10 w-10 items-center justify-center rounded-lg bg-primary">
          <span className="text-lg font-bold text-primary-foreground">{siteName.charAt(0)}</span>
        </div>
        <h1 className="text-lg font-bold">{siteName}</h1>
      </div>

      <nav className="flex-1 space-y-1 overflow-auto px-3 py-4">
        {items.map((item) => {
          const Icon = item.icon;
          const isActive = item.href === activeHref;

          return (
            <Link
              key={item.href}
              href={item.href}
              className={cn(
                'flex items-center gap-3 rounded-lg px-3 py-2.5 text-sm font-medium transition-colors',
                isActive
                  ? 'bg-primary text-primary-foreground'
                  : 'text-muted-foreground hover:bg-accent hover:text-accent-foreground'
              )}
            >
              <Icon className="h-5 w-5" />
              {item.label}
            </Link>
          );
        })}
      </nav>
    </div>
  );
}
