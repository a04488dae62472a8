export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  ssl: boolean;
  connectTimeout: number;
}

const DEFAULT_PORT = 3306;
const LOCAL_CONNECT_TIMEOUT_MS = 10_000;
// Remote TLS handshakes regularly exceed the driver's short default.
const REMOTE_CONNECT_TIMEOUT_MS = 30_000;

/**
 * True when DATABASE_URL points to local MySQL (localhost / 127.0.0.1).
 * Local databases get no forced SSL and the short timeout.
 */
export function isLocalDatabaseUrl(url: string): boolean {
  try {
    const parsed = new URL(url.replace(/^(mysql|mariadb):\/\//, 'https://'));
    const host = (parsed.hostname || '').toLowerCase();
    return host === 'localhost' || host === '127.0.0.1';
  } catch {
    return false;
  }
}

function readSslFlag(params: URLSearchParams): boolean | null {
  const ssl = params.get('ssl');
  if (ssl !== null) return ssl === 'true' || ssl === '1';
  const sslaccept = params.get('sslaccept');
  if (sslaccept !== null) return sslaccept.toLowerCase() === 'strict';
  return null;
}

/**
 * Turn DATABASE_URL into pool options.
 * - Remote hosts get ssl unless the URL says otherwise, plus a longer connectTimeout.
 * - Local MySQL (localhost / 127.0.0.1) is taken as-is.
 */
export function parseDatabaseUrl(url: string): DatabaseConfig {
  if (!/^(mysql|mariadb):\/\//.test(url)) {
    throw new Error('DATABASE_URL must start with mysql:// or mariadb://');
  }

  const parsed = new URL(url.replace(/^(mysql|mariadb):\/\//, 'https://'));
  const local = isLocalDatabaseUrl(url);
  const database = decodeURIComponent(parsed.pathname.replace(/^\//, ''));
  if (!database) {
    throw new Error('DATABASE_URL must name a database');
  }

  const timeoutParam = parsed.searchParams.get('connectTimeout');
  const connectTimeout =
    timeoutParam && /^\d+$/.test(timeoutParam)
      ? Number(timeoutParam)
      : local
        ? LOCAL_CONNECT_TIMEOUT_MS
        : REMOTE_CONNECT_TIMEOUT_MS;

  return {
    host: parsed.hostname,
    port: parsed.port ? Number(parsed.port) : DEFAULT_PORT,
    user: decodeURIComponent(parsed.username),
    password: decodeURIComponent(parsed.password),
    database,
    ssl: readSslFlag(parsed.searchParams) ?? !local,
    connectTimeout,
  };
}

/** URL safe for logs: password masked. */
export function maskDatabaseUrl(url: string): string {
  return url.replace(/:[^:@/]+@/, ':****@');
}
