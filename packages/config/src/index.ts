export {
  ConfigError,
  configSchema,
  parseConfig,
  validateConfig,
  loadConfig,
  resolveConfigPath,
  initConfig,
  setConfig,
  getConfig,
  resetConfig,
  parseListenAddress,
  CONFIG_FILE_NAME,
  DEFAULT_ADDRESS,
  DEFAULT_SEARCH_PATHS,
  DEFAULT_TIMEOUT_SECONDS,
} from "./config.js";
export type {
  ConfigErrorCode,
  ConfigErrorDetail,
  ListenAddress,
  LoadConfigOptions,
  RawConfig,
} from "./config.js";
