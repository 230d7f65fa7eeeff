export type { ConfigData, LogLevelName } from "./defaults";
export {
  CONFIG_KEYS,
  DEFAULTS,
  ENV_MAP,
  LOG_LEVELS,
  isLogLevel,
  validateConfigValue,
} from "./defaults";
export {
  readConfigFile,
  writeConfigFile,
  updateConfigFile,
  getConfigDir,
  getConfigPath,
} from "./configFile";
export { resolveConfig, setCliOverride, clearCliOverrides } from "./resolve";
export { initConfig, getConfig } from "./runtime";
