import { z } from 'zod';
import { ConfigurationError, DEFAULT_API_VERSION, DEFAULT_RATE_LIMIT_DELAY_MS } from '@stockbridge/integrations';

// Unset and blank variables both read as missing
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .default('true')
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

// Environment configuration schema
const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(8000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // Ledger
  LEDGER_HOST: optionalString,
  LEDGER_DATABASE: optionalString,
  LEDGER_USERNAME: optionalString,
  LEDGER_PASSWORD: optionalString,
  SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(840),

  // Storefront
  STOREFRONT_SHOP_URL: optionalString,
  STOREFRONT_ACCESS_TOKEN: optionalString,
  STOREFRONT_LOCATION_ID: optionalString,
  STOREFRONT_WEBHOOK_SECRET: optionalString,
  STOREFRONT_API_VERSION: z.string().default(DEFAULT_API_VERSION),
  STOREFRONT_RATE_LIMIT_DELAY_MS: z.coerce.number().int().nonnegative().default(DEFAULT_RATE_LIMIT_DELAY_MS),
  WEBHOOK_VALIDATE_SIGNATURE: booleanFlag,

  // HTTP transport
  API_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  API_MAX_RETRIES: z.coerce.number().int().positive().default(3),
  API_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),

  // Sync
  RECALC_PACING_MS: z.coerce.number().int().nonnegative().default(200),
  NIGHTLY_SYNC_HOUR: z.coerce.number().int().min(0).max(23).default(22),
  NIGHTLY_SYNC_MINUTE: z.coerce.number().int().min(0).max(59).default(0),
  STARTUP_SYNC_DELAY_MS: z.coerce.number().int().default(10000),
});

type Env = z.infer<typeof envSchema>;

export type Environment = Env['NODE_ENV'];

export interface AppConfig {
  env: Environment;
  server: { port: number; host: string };
  logLevel: string;
  ledger: {
    host: string;
    database: string;
    username: string;
    password: string;
    sessionTtlMs: number;
  };
  storefront: {
    shopUrl: string;
    accessToken: string;
    locationId: string;
    apiVersion: string;
    rateLimitDelayMs: number;
    webhookSecret?: string;
    validateSignature: boolean;
  };
  http: { timeoutMs: number; maxAttempts: number; retryDelayMs: number };
  sync: {
    recalcPacingMs: number;
    nightlyHour: number;
    nightlyMinute: number;
    startupDelayMs: number;
  };
}

const REQUIRED_CREDENTIALS = [
  'LEDGER_HOST',
  'LEDGER_DATABASE',
  'LEDGER_USERNAME',
  'LEDGER_PASSWORD',
  'STOREFRONT_SHOP_URL',
  'STOREFRONT_ACCESS_TOKEN',
  'STOREFRONT_LOCATION_ID',
] as const;

function parseEnv(env: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(env);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
  if (env.NODE_ENV === 'production') {
    throw new ConfigurationError('Invalid environment configuration', { issues });
  }

  // Outside production fall back to defaults
  console.error('Invalid environment configuration:');
  console.error(issues.join('\n'));
  return envSchema.parse({});
}

/**
 * Read configuration from the environment. In production every credential is required.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = parseEnv(env);

  if (parsed.NODE_ENV === 'production') {
    const missing = REQUIRED_CREDENTIALS.filter((name) => parsed[name] === undefined);
    if (missing.length > 0) {
      throw new ConfigurationError(`Missing required configuration: ${missing.join(', ')}`, { missing });
    }
  }

  return {
    env: parsed.NODE_ENV,
    server: { port: parsed.PORT, host: parsed.HOST },
    logLevel: parsed.LOG_LEVEL ?? (parsed.NODE_ENV === 'production' ? 'info' : 'debug'),
    ledger: {
      host: parsed.LEDGER_HOST ?? '',
      database: parsed.LEDGER_DATABASE ?? '',
      username: parsed.LEDGER_USERNAME ?? '',
      password: parsed.LEDGER_PASSWORD ?? '',
      sessionTtlMs: parsed.SESSION_TTL_SECONDS * 1000,
    },
    storefront: {
      shopUrl: parsed.STOREFRONT_SHOP_URL ?? '',
      accessToken: parsed.STOREFRONT_ACCESS_TOKEN ?? '',
      locationId: parsed.STOREFRONT_LOCATION_ID ?? '',
      apiVersion: parsed.STOREFRONT_API_VERSION,
      rateLimitDelayMs: parsed.STOREFRONT_RATE_LIMIT_DELAY_MS,
      webhookSecret: parsed.STOREFRONT_WEBHOOK_SECRET,
      validateSignature: parsed.WEBHOOK_VALIDATE_SIGNATURE,
    },
    http: {
      timeoutMs: parsed.API_TIMEOUT_MS,
      maxAttempts: parsed.API_MAX_RETRIES,
      retryDelayMs: parsed.API_RETRY_DELAY_MS,
    },
    sync: {
      recalcPacingMs: parsed.RECALC_PACING_MS,
      nightlyHour: parsed.NIGHTLY_SYNC_HOUR,
      nightlyMinute: parsed.NIGHTLY_SYNC_MINUTE,
      startupDelayMs: parsed.STARTUP_SYNC_DELAY_MS,
    },
  };
}

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  cachedConfig ??= loadConfig();
  return cachedConfig;
}

/**
 * Keep the first four characters of a secret
 */
export function maskSecret(value: string | undefined): string {
  if (!value) {
    return '(not set)';
  }
  return value.length <= 4 ? '****' : `${value.slice(0, 4)}****`;
}

/**
 * Flat, printable view of the configuration with secrets masked
 */
export function describeConfig(config: AppConfig): Array<[string, string]> {
  return [
    ['Environment', config.env],
    ['Ledger host', config.ledger.host || '(not set)'],
    ['Ledger database', config.ledger.database || '(not set)'],
    ['Ledger username', config.ledger.username || '(not set)'],
    ['Ledger password', maskSecret(config.ledger.password)],
    ['Session TTL', `${config.ledger.sessionTtlMs / 1000}s`],
    ['Storefront shop', config.storefront.shopUrl || '(not set)'],
    ['Storefront access token', maskSecret(config.storefront.accessToken)],
    ['Storefront location', config.storefront.locationId || '(not set)'],
    ['Storefront API version', config.storefront.apiVersion],
    ['Webhook secret', maskSecret(config.storefront.webhookSecret)],
    ['Webhook signature check', config.storefront.validateSignature ? 'enabled' : 'disabled'],
    ['Request timeout', `${config.http.timeoutMs}ms`],
    ['Max attempts', String(config.http.maxAttempts)],
    ['Recalculation pacing', `${config.sync.recalcPacingMs}ms`],
    [
      'Nightly sync',
      `${String(config.sync.nightlyHour).padStart(2, '0')}:${String(config.sync.nightlyMinute).padStart(2, '0')}`,
    ],
    ['Start-up sync delay', `${config.sync.startupDelayMs}ms`],
  ];
}
