import { randomBytes, timingSafeEqual } from 'crypto';

export { CSRF_ERROR_MESSAGE, CSRF_FIELD, CSRF_HEADER } from '@/lib/constants/csrf';

export function generateCsrfToken(): string {
  return randomBytes(32).toString('hex');
}

/** Constant-time comparison; anything that is not a non-empty string fails. */
export function verifyCsrfToken(expected: string | null | undefined, provided: unknown): boolean {
  if (!expected || typeof provided !== 'string' || provided.length === 0) return false;
  const a = Buffer.from(expected);
  const b = Buffer.from(provided);
  if (a.length !== b.length) return false;
  return timingSafeEqual(a, b);
}
