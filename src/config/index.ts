export {
  resolveConfig, readConfigFile, parseDomainList, projectConfigPath, globalConfigPath,
  ConfigFileSchema, ENV_TRUSTED_DOMAINS,
} from './config.js';
export type { ConfigFile, ConfigFlags, ResolvedConfig } from './config.js';
