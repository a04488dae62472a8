export const MAX_FAILED_LOGINS = 5;
export const LOGIN_LOCKOUT_MINUTES = 15;

/** `code` of the sign-in error raised while an address is locked out. */
export const LOGIN_RATE_LIMITED_CODE = 'rate_limited';
export const LOGIN_RATE_LIMITED_MESSAGE = `Zu viele Anmeldeversuche. Bitte warten Sie ${LOGIN_LOCKOUT_MINUTES} Minuten und versuchen Sie es erneut.`;
