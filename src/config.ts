import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors/config-error';
import { Namespace } from './types/domain';
import { LogLevel } from './utils/logger';

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  SE_DROP_LIST_URL: z
    .string()
    .url()
    .default('https://data.internetstiftelsen.se/bardate_domains.json'),
  NU_DROP_LIST_URL: z
    .string()
    .url()
    .default('https://data.internetstiftelsen.se/bardate_domains_nu.json'),
  DROP_LIST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  DNS_TIMEOUT_MS: z.coerce.number().int().positive().default(3_000),
  SCAN_DELAY_MS: z.coerce.number().int().nonnegative().default(2_500),
  ARCHIVE_ROW_LIMIT: z.coerce.number().int().positive().default(500),
  ARCHIVE_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  SEARCH_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  INDEX_FALLBACK_ENABLED: booleanFlag.default('true'),
  MIN_INDEXED_PAGES: z.coerce.number().int().nonnegative().default(1),
  REPORT_DIR: z.string().min(1).default('reports'),
  USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
});

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  dropListUrls: Record<Namespace, string>;
  dropListTimeoutMs: number;
  dnsTimeoutMs: number;
  scanDelayMs: number;
  archiveRowLimit: number;
  archiveTimeoutMs: number;
  searchTimeoutMs: number;
  indexFallbackEnabled: boolean;
  minIndexedPages: number;
  reportDir: string;
  userAgent: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // blank values fall back to defaults, same as unset ones
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    logLevel: vars.LOG_LEVEL,
    dropListUrls: { se: vars.SE_DROP_LIST_URL, nu: vars.NU_DROP_LIST_URL },
    dropListTimeoutMs: vars.DROP_LIST_TIMEOUT_MS,
    dnsTimeoutMs: vars.DNS_TIMEOUT_MS,
    scanDelayMs: vars.SCAN_DELAY_MS,
    archiveRowLimit: vars.ARCHIVE_ROW_LIMIT,
    archiveTimeoutMs: vars.ARCHIVE_TIMEOUT_MS,
    searchTimeoutMs: vars.SEARCH_TIMEOUT_MS,
    indexFallbackEnabled: vars.INDEX_FALLBACK_ENABLED,
    minIndexedPages: vars.MIN_INDEXED_PAGES,
    reportDir: path.resolve(process.cwd(), vars.REPORT_DIR),
    userAgent: vars.USER_AGENT,
  };
}
