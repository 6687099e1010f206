export { ConfigSchema, ConfigFileSchema, BranchesSchema, RefNameSchema, isValidRefName } from './schema.js';
export type { Config, BranchesConfig } from './schema.js';
export { loadConfig, getDefaultConfig, DEFAULT_CONFIG_PATH } from './loader.js';
export { resolveSettings } from './settings.js';
export type { PromoteSettings, SettingsSources } from './settings.js';
