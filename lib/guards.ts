import type { Session } from 'next-auth';
import { redirect } from 'next/navigation';
import type { Capability } from '@/lib/constants/enums';
import { can } from '@/lib/permissions';
import { getCurrentSession } from '@/lib/session';

export const DEFAULT_LANDING_PAGE = '/backoffice';
export const LOGIN_PAGE = '/login';

/** Sends the visitor to the landing page and ends rendering when access is denied. */
export function enforceAccess(allowed: boolean): void {
  if (!allowed) {
    redirect(DEFAULT_LANDING_PAGE);
  }
}

/** First statement of every gated page: signed-out visitors go to login, others without the capability to the landing page. */
export async function requireCapability(capability: Capability): Promise<Session> {
  const session = await getCurrentSession();
  if (!session?.user) {
    redirect(LOGIN_PAGE);
  }
  enforceAccess(can(session.user.role, capability));
  return session;
}
