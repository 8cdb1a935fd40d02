// Configuration: YAML file loading, environment overrides, and the
// conversions from file sections to what the engine takes.

export { loadConfig, parseConfig, type ParseConfigOptions } from './load'
export { readEnv, type FairnessCheckEnv } from './env'
export { toEndpointSettings, toThresholds, toColumnNames, resolveRunSettings } from './settings'
