/**
 * Configuration module.
 */

export {
  DEFAULT_HOST,
  DEFAULT_PORT,
  DEFAULT_SERVER_CONFIG,
  loadServerConfig,
  parseBind,
  readEnvOverrides,
} from './server-config.js';
export type { RestartLimit, ServerConfig, ServerConfigOverrides, WorkerModel } from './types.js';
