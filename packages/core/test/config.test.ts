import { describe, expect, test } from 'vitest';
import {
  loadConfig,
  parseJsonc,
  resolveRunSettings,
  stripJsonComments
} from '../src/config';
import { ConfigError, Verbosity } from '../src';
import { withTempDir } from './utils/tmpdir';

// ============================================================================
// JSONC
// ============================================================================

describe('stripJsonComments', () => {
  test('removes line comments and the blanks before them', () => {
    const input = `{
  "verbosity": "quiet" // be quiet
}`;
    expect(stripJsonComments(input)).toBe(`{
  "verbosity": "quiet"
}`);
  });

  test('preserves // inside strings', () => {
    expect(stripJsonComments('{"a": "x//y"} // tail')).toBe('{"a": "x//y"}');
  });

  test('an escaped quote does not end the string', () => {
    expect(stripJsonComments('{"a": "say \\"//hi\\""} /* c */')).toBe('{"a": "say \\"//hi\\""} ');
  });

  test('removes a trailing comment without a newline', () => {
    expect(stripJsonComments('{"a": 1}\t// end')).toBe('{"a": 1}');
  });

  test('keeps line breaks of block comments', () => {
    expect(stripJsonComments('{/* one\ntwo */"a": 1}')).toBe('{\n"a": 1}');
  });
});

describe('parseJsonc', () => {
  test('parses commented JSON', () => {
    expect(parseJsonc('{\n  // c\n  "failOnError": true\n}')).toEqual({ failOnError: true });
  });

  test('wraps syntax errors', () => {
    expect(() => parseJsonc('{ nope }')).toThrow(/^Invalid JSONC: /);
  });
});

// ============================================================================
// Loading
// ============================================================================

describe('loadConfig', () => {
  test('returns an empty config when no file exists', async () => {
    await withTempDir(async (tmp) => {
      const loaded = await loadConfig({ startDir: tmp.path, stopDir: tmp.path });
      expect(loaded).toEqual({ config: {} });
    });
  });

  test('finds scriptunit.jsonc by searching upwards', async () => {
    await withTempDir(async (tmp) => {
      await tmp.writeFile(
        'scriptunit.jsonc',
        '{\n  // run quietly\n  "verbosity": "summary",\n  "timeoutMs": 1500\n}\n'
      );
      await tmp.mkdir('a/b');
      const loaded = await loadConfig({ startDir: tmp.join('a', 'b'), stopDir: tmp.path });
      expect(loaded.path).toBe(tmp.join('scriptunit.jsonc'));
      expect(loaded.format).toBe('jsonc');
      expect(loaded.config).toEqual({ verbosity: 'summary', timeoutMs: 1500 });
    });
  });

  test('prefers scriptunit.jsonc over scriptunit.json', async () => {
    await withTempDir(async (tmp) => {
      await tmp.writeFile('scriptunit.json', '{"verbosity": "quiet"}');
      await tmp.writeFile('scriptunit.jsonc', '{"verbosity": "verbose"}');
      const loaded = await loadConfig({ startDir: tmp.path, stopDir: tmp.path });
      expect(loaded.config.verbosity).toBe('verbose');
    });
  });

  test('loads an explicit path', async () => {
    await withTempDir(async (tmp) => {
      await tmp.writeFile('custom.json', '{"color": "never"}');
      const loaded = await loadConfig({ path: tmp.join('custom.json') });
      expect(loaded.format).toBe('json');
      expect(loaded.config).toEqual({ color: 'never' });
    });
  });

  test('rejects an explicit path that does not exist', async () => {
    await withTempDir(async (tmp) => {
      const missing = tmp.join('typo.jsonc');
      await expect(loadConfig({ path: missing })).rejects.toThrow(
        `Invalid config at ${missing}: file not found`
      );
    });
  });

  test('rejects an unknown verbosity with the field name', async () => {
    await withTempDir(async (tmp) => {
      await tmp.writeFile('scriptunit.json', '{"verbosity": "loud"}');
      const load = loadConfig({ startDir: tmp.path, stopDir: tmp.path });
      await expect(load).rejects.toThrow(ConfigError);
      await expect(load).rejects.toThrow(/verbosity: /);
    });
  });

  test('rejects unknown keys', async () => {
    await withTempDir(async (tmp) => {
      await tmp.writeFile('scriptunit.json', '{"verbose": true}');
      await expect(loadConfig({ startDir: tmp.path, stopDir: tmp.path })).rejects.toThrow(
        ConfigError
      );
    });
  });

  test('rejects malformed JSON', async () => {
    await withTempDir(async (tmp) => {
      await tmp.writeFile('scriptunit.jsonc', '{ "verbosity": ');
      await expect(loadConfig({ startDir: tmp.path, stopDir: tmp.path })).rejects.toThrow(
        /^Invalid config at .*scriptunit\.jsonc: Invalid JSONC: /
      );
    });
  });
});

// ============================================================================
// Layering
// ============================================================================

describe('resolveRunSettings', () => {
  const tty = { isTTY: true };

  test('defaults to normal verbosity with detected color', () => {
    expect(resolveRunSettings({ config: {}, stream: tty, env: {} })).toEqual({
      verbosity: Verbosity.Normal,
      color: true,
      failOnError: false
    });
  });

  test('config values apply over defaults', () => {
    const settings = resolveRunSettings({
      config: { verbosity: 'quiet', color: 'never', timeoutMs: 100, failOnError: true },
      stream: tty,
      env: {}
    });
    expect(settings).toEqual({
      verbosity: Verbosity.Quiet,
      color: false,
      timeoutMs: 100,
      failOnError: true
    });
  });

  test('overrides win over config', () => {
    const settings = resolveRunSettings({
      config: { verbosity: 'quiet', color: 'never', timeoutMs: 100 },
      overrides: { verbosity: Verbosity.Verbose, color: true, timeoutMs: 5 },
      stream: { isTTY: false },
      env: {}
    });
    expect(settings).toEqual({
      verbosity: Verbosity.Verbose,
      color: true,
      timeoutMs: 5,
      failOnError: false
    });
  });
});
