/** Where clients put the session's CSRF token. Client-safe. */
export const CSRF_HEADER = 'x-csrf-token';
export const CSRF_FIELD = 'csrf_token';
export const CSRF_ERROR_MESSAGE = 'Ungültiges CSRF-Token. Bitte laden Sie die Seite neu.';
