import { z } from 'zod';
import dotenv from 'dotenv';

// Disable dotenv promotional messages (stdout must be clean JSON-RPC only)
process.env.DOTENV_CONFIG_QUIET = '1';
dotenv.config();

const integer = (fallback: string, name: string, min: number, max: number = Number.MAX_SAFE_INTEGER) =>
  z
    .string()
    .optional()
    .default(fallback)
    .transform((val) => parseInt(val, 10))
    .refine(
      (val) => !isNaN(val) && val >= min && val <= max,
      `${name} must be an integer between ${min} and ${max}`
    );

const optionalSecret = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() ? val.trim() : undefined));

// Zod schema for environment variables
const EnvSchema = z
  .object({
    TRELLO_API_URL: z
      .string()
      .url('TRELLO_API_URL must be a valid URL')
      .optional()
      .default('https://api.trello.com/1')
      .describe('Trello REST API base URL'),

    TRELLO_API_KEY: optionalSecret.describe('Pre-provisioned Trello API key'),
    TRELLO_TOKEN: optionalSecret.describe('Pre-provisioned Trello token'),

    TRELLO_LOGIN_URL: z
      .string()
      .url('TRELLO_LOGIN_URL must be a valid URL')
      .optional()
      .default('https://trello.com/app-key')
      .describe('Page where a user obtains an API key and token'),

    TRELLO_CREDENTIAL_TTL_MINUTES: integer('480', 'TRELLO_CREDENTIAL_TTL_MINUTES', 1)
      .describe('How long a resolved credential pair stays cached'),

    TRELLO_CREDENTIAL_MIN_LENGTH: integer('32', 'TRELLO_CREDENTIAL_MIN_LENGTH', 1, 256)
      .describe('Minimum length of an API key or token'),

    TRELLO_RATE_LIMIT_MAX_CALLS: integer('300', 'TRELLO_RATE_LIMIT_MAX_CALLS', 1)
      .describe('Outbound calls allowed per window'),

    TRELLO_RATE_LIMIT_WINDOW_MS: integer('10000', 'TRELLO_RATE_LIMIT_WINDOW_MS', 1)
      .describe('Rate limit sliding window length'),

    TRELLO_RATE_LIMIT_BACKOFF_MS: integer('1000', 'TRELLO_RATE_LIMIT_BACKOFF_MS', 0, 60000)
      .describe('Fixed delay before retrying a rate-limited call'),

    TRELLO_REQUEST_TIMEOUT_MS: integer('30000', 'TRELLO_REQUEST_TIMEOUT_MS', 1, 120000)
      .describe('Outbound request timeout'),

    TRELLO_BOARD_CACHE_TTL_SECONDS: integer('60', 'TRELLO_BOARD_CACHE_TTL_SECONDS', 0)
      .describe('Board directory cache TTL (0 to disable)'),

    TRELLO_MCP_TRANSPORT: z
      .enum(['stdio', 'http'])
      .optional()
      .default('stdio')
      .describe('Transport serving the JSON-RPC endpoint'),

    PORT: integer('8080', 'PORT', 1, 65535).describe('HTTP transport port'),

    HOST: z.string().optional().default('0.0.0.0').describe('HTTP transport bind address'),
  });

export type EnvConfig = z.output<typeof EnvSchema>;

export interface AppConfig {
  apiUrl: string;
  loginUrl: string;
  provisioned: { apiKey: string; token: string } | undefined;
  credentialTtlMs: number;
  credentialMinLength: number;
  rateLimit: { maxCalls: number; windowMs: number; backoffMs: number };
  requestTimeoutMs: number;
  boardCacheTtlMs: number;
  transport: 'stdio' | 'http';
  http: { port: number; host: string };
}

export type ConfigResult =
  | { success: true; config: AppConfig; warnings: string[] }
  | { success: false; errors: string[] };

const ENV_KEYS = [
  'TRELLO_API_URL',
  'TRELLO_API_KEY',
  'TRELLO_TOKEN',
  'TRELLO_LOGIN_URL',
  'TRELLO_CREDENTIAL_TTL_MINUTES',
  'TRELLO_CREDENTIAL_MIN_LENGTH',
  'TRELLO_RATE_LIMIT_MAX_CALLS',
  'TRELLO_RATE_LIMIT_WINDOW_MS',
  'TRELLO_RATE_LIMIT_BACKOFF_MS',
  'TRELLO_REQUEST_TIMEOUT_MS',
  'TRELLO_BOARD_CACHE_TTL_SECONDS',
  'TRELLO_MCP_TRANSPORT',
  'PORT',
  'HOST',
] as const;

function toAppConfig(env: EnvConfig): AppConfig {
  const provisioned =
    env.TRELLO_API_KEY !== undefined && env.TRELLO_TOKEN !== undefined
      ? { apiKey: env.TRELLO_API_KEY, token: env.TRELLO_TOKEN }
      : undefined;

  return {
    apiUrl: env.TRELLO_API_URL.replace(/\/+$/, ''),
    loginUrl: env.TRELLO_LOGIN_URL,
    provisioned,
    credentialTtlMs: env.TRELLO_CREDENTIAL_TTL_MINUTES * 60 * 1000,
    credentialMinLength: env.TRELLO_CREDENTIAL_MIN_LENGTH,
    rateLimit: {
      maxCalls: env.TRELLO_RATE_LIMIT_MAX_CALLS,
      windowMs: env.TRELLO_RATE_LIMIT_WINDOW_MS,
      backoffMs: env.TRELLO_RATE_LIMIT_BACKOFF_MS,
    },
    requestTimeoutMs: env.TRELLO_REQUEST_TIMEOUT_MS,
    boardCacheTtlMs: env.TRELLO_BOARD_CACHE_TTL_SECONDS * 1000,
    transport: env.TRELLO_MCP_TRANSPORT,
    http: { port: env.PORT, host: env.HOST },
  };
}

/**
 * Validates environment variables. A half-configured credential pair is not
 * fatal: it is reported as a warning and neither value is used.
 */
export function parseConfig(env: NodeJS.ProcessEnv): ConfigResult {
  const input: Record<string, string | undefined> = {};
  for (const key of ENV_KEYS) {
    input[key] = env[key];
  }

  const result = EnvSchema.safeParse(input);
  if (!result.success) {
    return {
      success: false,
      errors: result.error.errors.map((err) => `  - ${err.path.join('.')}: ${err.message}`),
    };
  }

  const warnings: string[] = [];
  const data = result.data;
  if ((data.TRELLO_API_KEY === undefined) !== (data.TRELLO_TOKEN === undefined)) {
    warnings.push('TRELLO_API_KEY and TRELLO_TOKEN must be set together; neither will be used');
    data.TRELLO_API_KEY = undefined;
    data.TRELLO_TOKEN = undefined;
  }

  return { success: true, config: toAppConfig(data), warnings };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = parseConfig(env);

  if (!result.success) {
    console.error('❌ Invalid environment configuration:');
    console.error(result.errors.join('\n'));
    console.error('\n💡 Please check your .env file.');
    console.error('   Optional: TRELLO_API_KEY + TRELLO_TOKEN, TRELLO_API_URL, TRELLO_MCP_TRANSPORT, PORT, TRELLO_RATE_LIMIT_*');
    process.exit(1);
  }

  for (const warning of result.warnings) {
    console.error(`⚠️  ${warning}`);
  }

  return result.config;
}
