export { CONFIG_DIR, CONFIG_KEYS, DEFAULTS, ENV_MAP } from "./defaults.js";
export type { ConfigData, RawConfig } from "./defaults.js";
export {
  readConfigFile,
  writeConfigFile,
  updateConfigFile,
  getConfigPath,
} from "./configFile.js";
export { resolveConfig, setCliOverride, parseConfigValue, getSource } from "./resolve.js";
export type { ResolveOptions } from "./resolve.js";
