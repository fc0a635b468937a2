export { DEFAULT_CHANNEL_ID, DEFAULT_WINDOW_DAYS, loadReleaseDigestConfig } from './config_manager';
export { ConfigurationError } from './config_manager.types';
export type {
  ConfigEnv,
  ConfigOverrides,
  ConfigurationErrorCode,
  ConfluenceSettings,
  ReleaseDigestConfig,
  SlackSettings,
} from './config_manager.types';
