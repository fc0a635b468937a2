/**
 * ConfigManager Types
 */

import type { LogLevel } from '../logger';

/**
 * Environment as read by the loader. `process.env` fits.
 */
export type ConfigEnv = Record<string, string | undefined>;

export type SlackSettings = {
  token: string;
  channelId: string;
};

export type ConfluenceSettings = {
  email: string;
  apiToken: string;
  cloudId: string;
  pageId: string;
};

/**
 * Settings for one run.
 * `confluence` is null only on dry runs whose Confluence settings are incomplete.
 */
export type ReleaseDigestConfig = {
  slack: SlackSettings;
  confluence: ConfluenceSettings | null;
  windowDays: number;
  rulesFile: string | null;
  httpTimeoutMs: number;
  logLevel: LogLevel | null;
  dryRun: boolean;
};

/**
 * Values given on the command line. They win over the environment.
 */
export type ConfigOverrides = {
  channelId?: string;
  windowDays?: number;
  pageId?: string;
  rulesFile?: string;
  dryRun?: boolean;
};

export type ConfigurationErrorCode = 'MISSING_SETTINGS' | 'INVALID_SETTINGS';

/**
 * Raised before any network call when settings are missing or malformed.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly code: ConfigurationErrorCode,
    /** Missing variable names, or one line per invalid value */
    public readonly details: string[] = [],
  ) {
    super(message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}
