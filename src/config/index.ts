export { loadConfig, parseConfig, expandEnv, defaultConfigPath } from './loader.js'
export { resolveRunSettings, parseCount, parseAmount } from './settings.js'
export type { BriefCommandOptions } from './settings.js'
export { initConfig, generateConfig, AVAILABLE_PROVIDERS } from './init.js'
export { DEFAULT_SETTINGS } from './types.js'
export type { BriefConfig, RunSettings, DefaultsConfig, PricingConfig, ProviderConfig } from './types.js'
