import { access, readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { ConfigError } from '../errors';
import { parseJsonc } from './jsonc';
import { type ConfigFormat, type LoadedConfig, ScriptunitConfigSchema } from './schema';

export type LoadConfigOptions = { path: string } | { startDir: string; stopDir?: string };

// Discovery order, preferred first
const CONFIG_FILES: Array<{ filename: string; format: ConfigFormat }> = [
  { filename: 'scriptunit.jsonc', format: 'jsonc' },
  { filename: 'scriptunit.json', format: 'json' }
];

async function fileExists(p: string): Promise<boolean> {
  try {
    await access(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * Walk up from startDir and return the first config file found.
 */
async function findUp(
  startDir: string,
  stopDir?: string
): Promise<{ path: string; format: ConfigFormat } | undefined> {
  let dir = path.resolve(startDir);
  const stop = stopDir ? path.resolve(stopDir) : undefined;

  while (true) {
    for (const { filename, format } of CONFIG_FILES) {
      const candidate = path.join(dir, filename);
      if (await fileExists(candidate)) {
        return { path: candidate, format };
      }
    }

    if (stop && dir === stop) return undefined;

    const parent = path.dirname(dir);
    if (parent === dir) return undefined;
    dir = parent;
  }
}

function formatFromPath(configPath: string): ConfigFormat {
  return configPath.endsWith('.jsonc') ? 'jsonc' : 'json';
}

async function readConfigFile(configPath: string, format: ConfigFormat): Promise<LoadedConfig> {
  const content = await readFile(configPath, 'utf-8');

  let raw: unknown;
  try {
    raw = format === 'jsonc' ? parseJsonc(content) : JSON.parse(content);
  } catch (err) {
    throw new ConfigError(configPath, err instanceof Error ? err.message : String(err));
  }

  const parsed = ScriptunitConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new ConfigError(configPath, `${field}: ${issue?.message ?? 'invalid value'}`);
  }

  return { path: configPath, format, config: parsed.data };
}

/**
 * Load config from an explicit path or by searching upwards.
 *
 * When the search finds nothing the result is an empty config.
 *
 * @throws {ConfigError} when an explicit path is missing, or a file cannot be
 * parsed or validated
 */
export async function loadConfig(options: LoadConfigOptions): Promise<LoadedConfig> {
  if ('path' in options) {
    const configPath = path.resolve(options.path);
    if (!(await fileExists(configPath))) {
      throw new ConfigError(configPath, 'file not found');
    }
    return await readConfigFile(configPath, formatFromPath(configPath));
  }

  const found = await findUp(options.startDir, options.stopDir);
  if (!found) {
    return { config: {} };
  }
  return await readConfigFile(found.path, found.format);
}
