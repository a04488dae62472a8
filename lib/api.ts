import type { Session } from 'next-auth';
import { NextResponse } from 'next/server';
import { z } from 'zod';
import type { Capability } from '@/lib/constants/enums';
import { CSRF_ERROR_MESSAGE, CSRF_HEADER, verifyCsrfToken } from '@/lib/csrf';
import { isDatabaseUnavailable } from '@/lib/errors';
import { can } from '@/lib/permissions';
import { getCurrentSession } from '@/lib/session';

export { clientIp } from '@/lib/client-ip';

export type ApiFailureBody = { success: false; message: string; details?: unknown };

export function jsonError(message: string, status: number, details?: unknown) {
  const body: ApiFailureBody = { success: false, message };
  if (details !== undefined) body.details = details;
  return NextResponse.json(body, { status });
}

type AuthorizeResult =
  | { ok: true; session: Session; userId: number }
  | { ok: false; response: NextResponse<ApiFailureBody> };

/**
 * Session, capability and (for writes) CSRF checks shared by the JSON routes.
 * The token travels in the `x-csrf-token` header.
 */
export async function authorizeApiRequest(
  req: Request,
  capability: Capability,
  { csrf = false }: { csrf?: boolean } = {}
): Promise<AuthorizeResult> {
  const session = await getCurrentSession();
  if (!session?.user) {
    return { ok: false, response: jsonError('Nicht angemeldet', 401) };
  }
  if (!can(session.user.role, capability)) {
    return { ok: false, response: jsonError('Keine Berechtigung', 403) };
  }
  if (csrf && !verifyCsrfToken(session.csrfToken, req.headers.get(CSRF_HEADER))) {
    return { ok: false, response: jsonError(CSRF_ERROR_MESSAGE, 403) };
  }
  return { ok: true, session, userId: Number(session.user.id) };
}

/** Maps an unexpected error to a response; `action` completes "Failed to …". */
export function handleRouteError(error: unknown, action: string) {
  if (error instanceof z.ZodError) {
    return jsonError('Ungültige Eingabe', 400, error.issues);
  }
  console.error(`Failed to ${action}:`, error);
  if (isDatabaseUnavailable(error)) {
    return jsonError('Dienst vorübergehend nicht verfügbar', 503);
  }
  return jsonError('Interner Serverfehler', 500);
}

/** Positive integer route id, or null. */
export function parseId(raw: string): number | null {
  return /^\d+$/.test(raw) && Number(raw) > 0 ? Number(raw) : null;
}
