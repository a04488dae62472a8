'use server';

import { z } from 'zod';
import { headers } from 'next/headers';
import { revalidatePath } from 'next/cache';
import { validateAlumniStatus } from '@/lib/alumni';
import { clientIp } from '@/lib/client-ip';
import { CSRF_ERROR_MESSAGE, CSRF_FIELD, verifyCsrfToken } from '@/lib/csrf';
import { getPool } from '@/lib/db';
import { hasFullAccess } from '@/lib/permissions';
import { getCurrentSession } from '@/lib/session';
import type { AlumniActionState } from '@/types/alumni';

const userIdSchema = z.coerce.number().int().positive();

function failure(message: string): AlumniActionState {
  return { status: 'error', message };
}

export async function validateAlumniAction(
  _prevState: AlumniActionState,
  formData: FormData
): Promise<AlumniActionState> {
  const session = await getCurrentSession();
  if (!session?.user || !hasFullAccess(session.user.role)) {
    return failure('Keine Berechtigung');
  }
  if (!verifyCsrfToken(session.csrfToken, formData.get(CSRF_FIELD))) {
    return failure(CSRF_ERROR_MESSAGE);
  }

  const userId = userIdSchema.safeParse(formData.get('user_id'));
  if (!userId.success) {
    return failure('Ungültige Benutzer-ID.');
  }

  try {
    const requestHeaders = await headers();
    const validated = await validateAlumniStatus(getPool(), userId.data, {
      userId: Number(session.user.id),
      role: session.user.role,
      ipAddress: clientIp(requestHeaders),
    });
    if (!validated) {
      return failure('Fehler beim Validieren des Alumni-Status.');
    }
  } catch (error) {
    console.error('Failed to validate alumni status:', error);
    return failure('Fehler beim Validieren des Alumni-Status.');
  }

  revalidatePath('/backoffice/alumni-validation');
  return { status: 'success', message: 'Alumni-Status erfolgreich validiert!' };
}
