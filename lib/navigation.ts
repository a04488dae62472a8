import type { ElementType } from 'react';
import { History, LayoutDashboard, Package, Settings, UserCheck } from 'lucide-react';
import { Capability, type Role } from '@/lib/constants/enums';
import { can } from '@/lib/permissions';

export interface NavItem {
  label: string;
  href: string;
  icon: ElementType;
  /** Null: every signed-in user. */
  capability: Capability | null;
}

export const navItems: NavItem[] = [
  { label: 'Übersicht', href: '/backoffice', icon: LayoutDashboard, capability: null },
  { label: 'Inventar', href: '/backoffice/inventory', icon: Package, capability: Capability.VIEW_INVENTORY },
  {
    label: 'Inventar-Audit',
    href: '/backoffice/inventory/audit',
    icon: History,
    capability: Capability.VIEW_INVENTORY_AUDIT,
  },
  {
    label: 'Inventar-Konfiguration',
    href: '/backoffice/inventory/config',
    icon: Settings,
    capability: Capability.MANAGE_INVENTORY_CONFIG,
  },
  {
    label: 'Alumni Validierung',
    href: '/backoffice/alumni-validation',
    icon: UserCheck,
    capability: Capability.VALIDATE_ALUMNI,
  },
];

export function visibleNavItems(role: Role): NavItem[] {
  return navItems.filter((item) => item.capability === null || can(role, item.capability));
}

/** Deepest item whose href is the path or one of its parents. */
export function activeNavHref(items: NavItem[], pathname: string): string | null {
  const matches = items.filter(
    (item) => pathname === item.href || pathname.startsWith(`${item.href}/`)
  );
  matches.sort((a, b) => b.href.length - a.href.length);
  return matches[0]?.href ?? null;
}
