export { parseJsonc, stripJsonComments } from './jsonc';
export { type LoadConfigOptions, loadConfig } from './load';
export {
  type ResolveSettingsInput,
  type RunSettings,
  resolveRunSettings,
  type SettingsOverrides
} from './resolve';
export {
  type ConfigFormat,
  type LoadedConfig,
  type ScriptunitConfig,
  ScriptunitConfigSchema
} from './schema';
