/**
 * Run configuration.
 *
 * Reads settings from the environment (the CLI loads `.env` first), applies
 * command-line overrides and validates the result. Credentials are checked
 * up front so a run never starts half-configured.
 */

import type { SchemaObject } from 'ajv';
import { isLogLevel } from '../logger';
import { compileSchema, formatSchemaErrors } from '../schemas';
import { DEFAULT_HTTP_TIMEOUT_MS } from '../transport';
import { ConfigurationError } from './config_manager.types';
import type {
  ConfigEnv,
  ConfigOverrides,
  ConfluenceSettings,
  ReleaseDigestConfig,
} from './config_manager.types';

export const DEFAULT_CHANNEL_ID = 'C033MFEDQ2C';
export const DEFAULT_WINDOW_DAYS = 7;

const SLACK_VARIABLES = ['SLACK_TOKEN'] as const;
const CONFLUENCE_VARIABLES = [
  'ATLASSIAN_EMAIL',
  'ATLASSIAN_API_TOKEN',
  'ATLASSIAN_CLOUD_ID',
  'CONFLUENCE_PAGE_ID',
] as const;

const RELEASE_DIGEST_CONFIG_SCHEMA: SchemaObject = {
  type: 'object',
  required: ['slack', 'confluence', 'windowDays', 'rulesFile', 'httpTimeoutMs', 'logLevel', 'dryRun'],
  properties: {
    slack: {
      type: 'object',
      required: ['token', 'channelId'],
      properties: {
        token: { type: 'string', minLength: 1 },
        channelId: { type: 'string', pattern: '^[A-Z0-9]+$' },
      },
    },
    confluence: {
      type: 'object',
      nullable: true,
      required: ['email', 'apiToken', 'cloudId', 'pageId'],
      properties: {
        email: { type: 'string', format: 'email' },
        apiToken: { type: 'string', minLength: 1 },
        cloudId: { type: 'string', minLength: 1 },
        pageId: { type: 'string', pattern: '^[0-9]+$' },
      },
    },
    windowDays: { type: 'integer', minimum: 1, maximum: 365 },
    rulesFile: { type: 'string', nullable: true },
    httpTimeoutMs: { type: 'integer', minimum: 1 },
    logLevel: { type: 'string', nullable: true },
    dryRun: { type: 'boolean' },
  },
};

const validateConfig = compileSchema<ReleaseDigestConfig>(RELEASE_DIGEST_CONFIG_SCHEMA);

function read(env: ConfigEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readNumber(env: ConfigEnv, name: string, fallback: number): number {
  const value = read(env, name);
  return value === undefined ? fallback : Number(value);
}

/**
 * Loads the run configuration.
 *
 * @throws ConfigurationError listing every missing variable, or every invalid value
 *
 * @example
 * ```typescript
 * const config = loadReleaseDigestConfig(process.env, { windowDays: 14, dryRun: true });
 * ```
 */
export function loadReleaseDigestConfig(
  env: ConfigEnv = process.env,
  overrides: ConfigOverrides = {},
): ReleaseDigestConfig {
  const dryRun = overrides.dryRun ?? false;
  const values: Record<string, string | undefined> = {
    SLACK_TOKEN: read(env, 'SLACK_TOKEN'),
    ATLASSIAN_EMAIL: read(env, 'ATLASSIAN_EMAIL'),
    ATLASSIAN_API_TOKEN: read(env, 'ATLASSIAN_API_TOKEN'),
    ATLASSIAN_CLOUD_ID: read(env, 'ATLASSIAN_CLOUD_ID'),
    CONFLUENCE_PAGE_ID: overrides.pageId ?? read(env, 'CONFLUENCE_PAGE_ID'),
  };

  const required: readonly string[] = dryRun ? SLACK_VARIABLES : [...SLACK_VARIABLES, ...CONFLUENCE_VARIABLES];
  const missing = required.filter((name) => values[name] === undefined);
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing required settings: ${missing.join(', ')}`,
      'MISSING_SETTINGS',
      missing,
    );
  }

  const email = values['ATLASSIAN_EMAIL'];
  const apiToken = values['ATLASSIAN_API_TOKEN'];
  const cloudId = values['ATLASSIAN_CLOUD_ID'];
  const pageId = values['CONFLUENCE_PAGE_ID'];
  const confluence: ConfluenceSettings | null = email && apiToken && cloudId && pageId
    ? { email, apiToken, cloudId, pageId }
    : null;

  const logLevel = read(env, 'LOG_LEVEL');
  const candidate = {
    slack: {
      token: values['SLACK_TOKEN'] ?? '',
      channelId: overrides.channelId ?? read(env, 'SLACK_CHANNEL_ID') ?? DEFAULT_CHANNEL_ID,
    },
    confluence,
    windowDays: overrides.windowDays ?? readNumber(env, 'RELEASE_LOOKBACK_DAYS', DEFAULT_WINDOW_DAYS),
    rulesFile: overrides.rulesFile ?? read(env, 'RELEASE_RULES_FILE') ?? null,
    httpTimeoutMs: readNumber(env, 'HTTP_TIMEOUT_MS', DEFAULT_HTTP_TIMEOUT_MS),
    logLevel: isLogLevel(logLevel) ? logLevel : null,
    dryRun,
  };

  const problems = validateConfig(candidate) ? [] : formatSchemaErrors(validateConfig.errors);
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    problems.push(`/logLevel must be one of debug, info, warn, error, silent (got "${logLevel}")`);
  }
  if (problems.length > 0) {
    throw new ConfigurationError(
      `Invalid configuration: ${problems.join('; ')}`,
      'INVALID_SETTINGS',
      problems,
    );
  }

  return candidate;
}
