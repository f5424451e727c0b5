export { ConfigManager, createConfigManager } from './config_manager';
export { ConfigError } from './config_manager.errors';
export { mirrorConfigSchema } from './config_manager.schema';
export {
  DEFAULT_API_URL,
  DEFAULT_CONFIG_PATH,
  DEFAULT_QUEUE_SIZE,
  DEFAULT_RATE_LIMIT_PER_SECOND,
  DEFAULT_WORKER_COUNT,
} from './config_manager.types';
export type { MirrorConfig, MirrorConfigFile, RepositoryAffiliation } from './config_manager.types';
