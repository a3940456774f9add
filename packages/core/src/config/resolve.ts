import type { ParsedFlags } from '../flags';
import { resolveColor } from '../reporting/color';
import { DEFAULT_VERBOSITY, VERBOSITY_BY_NAME, type Verbosity } from '../types';
import type { ScriptunitConfig } from './schema';

export interface RunSettings {
  verbosity: Verbosity;
  color: boolean;
  timeoutMs?: number;
  failOnError: boolean;
}

export type SettingsOverrides = Partial<Pick<ParsedFlags, 'verbosity' | 'color' | 'timeoutMs'>> & {
  failOnError?: boolean;
};

export interface ResolveSettingsInput {
  config: ScriptunitConfig;
  overrides?: SettingsOverrides;
  stream?: { isTTY?: boolean };
  env?: NodeJS.ProcessEnv;
}

/**
 * Layer defaults < config file < command-line overrides.
 */
export function resolveRunSettings(input: ResolveSettingsInput): RunSettings {
  const { config, overrides = {} } = input;

  const verbosity =
    overrides.verbosity ??
    (config.verbosity !== undefined ? VERBOSITY_BY_NAME[config.verbosity] : DEFAULT_VERBOSITY);

  const color =
    overrides.color ?? resolveColor(config.color ?? 'auto', input.stream, input.env);

  const settings: RunSettings = {
    verbosity,
    color,
    failOnError: overrides.failOnError ?? config.failOnError ?? false
  };

  const timeoutMs = overrides.timeoutMs ?? config.timeoutMs;
  if (timeoutMs !== undefined) settings.timeoutMs = timeoutMs;

  return settings;
}
