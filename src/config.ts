import { z } from 'zod';
import type { LogLevel } from './logger.js';
import { providerSchema } from './schema.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  ZONES_DIR: z.string().min(1).default('dns_zones'),
  AWS_REGION: z.string().min(1).default('us-east-1'),
  CLOUDFLARE_API_TOKEN: z.string().min(1).optional(),
  CLOUDFLARE_ACCOUNT_ID: z.string().min(1).optional(),
  ZONE_SYNC_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),
  ZONE_SYNC_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  ZONE_SYNC_DEFAULT_PROVIDER: providerSchema.optional(),
  ZONE_SYNC_PRESERVE_EXTERNAL_DNS: booleanFlag.default('false'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
});

export interface ZoneSyncConfig {
  zonesDir: string;
  aws: { region: string };
  cloudflare: { apiToken?: string; accountId?: string };
  concurrency: number;
  retryAttempts: number;
  defaultProvider?: z.infer<typeof providerSchema>;
  preserveExternalDns: boolean;
  logLevel: LogLevel;
}

/**
 * Read configuration from environment variables.
 *
 * Blank values count as unset. Throws with every invalid variable listed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ZoneSyncConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const vars = parsed.data;
  const config: ZoneSyncConfig = {
    zonesDir: vars.ZONES_DIR,
    aws: { region: vars.AWS_REGION },
    cloudflare: {
      apiToken: vars.CLOUDFLARE_API_TOKEN,
      accountId: vars.CLOUDFLARE_ACCOUNT_ID,
    },
    concurrency: vars.ZONE_SYNC_CONCURRENCY,
    retryAttempts: vars.ZONE_SYNC_RETRY_ATTEMPTS,
    preserveExternalDns: vars.ZONE_SYNC_PRESERVE_EXTERNAL_DNS,
    logLevel: vars.LOG_LEVEL,
  };
  if (vars.ZONE_SYNC_DEFAULT_PROVIDER) {
    config.defaultProvider = vars.ZONE_SYNC_DEFAULT_PROVIDER;
  }
  return config;
}
