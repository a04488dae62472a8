import type { Session } from 'next-auth';
import { auth } from './auth';

/** Session of the current request, or null when signed out. */
export async function getCurrentSession(): Promise<Session | null> {
  return auth();
}
