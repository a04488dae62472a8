import { z } from 'zod';
import { parseDatabaseUrl, type DatabaseConfig } from './db-connection';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  SITE_NAME: z.string().min(1).default('IBC-Intra'),
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  AUTH_SECRET: z.string().min(1).optional(),
  NEXTAUTH_SECRET: z.string().min(1).optional(),
  SESSION_MAX_AGE: z.coerce.number().int().positive().default(8 * 60 * 60),
  MS_CLIENT_ID: z.string().optional(),
  MS_CLIENT_SECRET: z.string().optional(),
  MS_TENANT_ID: z.string().optional(),
});

export interface MicrosoftEntraConfig {
  clientId: string;
  clientSecret: string;
  tenantId: string;
}

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  siteName: string;
  database: DatabaseConfig;
  auth: {
    secret: string;
    sessionMaxAge: number;
    microsoft: MicrosoftEntraConfig | null;
  };
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  // Auth.js v5 reads AUTH_SECRET; older deployments still set NEXTAUTH_SECRET.
  const secret = values.AUTH_SECRET ?? values.NEXTAUTH_SECRET;
  if (!secret) {
    throw new ConfigError(['AUTH_SECRET: Required']);
  }

  const { MS_CLIENT_ID, MS_CLIENT_SECRET, MS_TENANT_ID } = values;
  const microsoft =
    MS_CLIENT_ID && MS_CLIENT_SECRET && MS_TENANT_ID
      ? { clientId: MS_CLIENT_ID, clientSecret: MS_CLIENT_SECRET, tenantId: MS_TENANT_ID }
      : null;

  return {
    env: values.NODE_ENV,
    siteName: values.SITE_NAME,
    database: parseDatabaseUrl(values.DATABASE_URL),
    auth: {
      secret,
      sessionMaxAge: values.SESSION_MAX_AGE,
      microsoft,
    },
  };
}

let cached: AppConfig | undefined;

/** Config for framework entry points; everything below them receives it explicitly. */
export function getConfig(): AppConfig {
  cached ??= loadConfig(process.env);
  return cached;
}
