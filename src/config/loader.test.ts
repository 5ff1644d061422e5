import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ConfigValidationError, loadConfig, resolveConfig, substituteEnvVarsRecursive } from './loader.js';
import { DEFAULT_CONFIG } from './types.js';

describe('config loader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'echo-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns the defaults when the file does not exist', async () => {
    const config = await loadConfig({ configPath: join(dir, 'missing.yaml'), env: {} });
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('finds the file through ECHO_XML_CONFIG', async () => {
    const path = join(dir, 'echo.yaml');
    await writeFile(path, 'logging:\n  level: debug\n');
    const config = await loadConfig({ env: { ECHO_XML_CONFIG: path } });
    expect(config.logging.level).toBe('debug');
    expect(config.xml).toEqual(DEFAULT_CONFIG.xml);
  });

  it('substitutes environment variables with defaults', async () => {
    const path = join(dir, 'echo.yaml');
    await writeFile(
      path,
      [
        'xml:',
        '  declaration: ${ECHO_DECL:-false}',
        '  indent: ${ECHO_INDENT:-4}',
        'survey:',
        '  expectedFormatVersion: 1',
        '  pathTemplate: ${OUT_DIR}/{plate_type}.xml',
        '',
      ].join('\n')
    );
    const config = await loadConfig({ configPath: path, env: { OUT_DIR: '/data', ECHO_INDENT: '0' } });
    expect(config.xml).toEqual({ declaration: false, indent: 0 });
    expect(config.survey.pathTemplate).toBe('/data/{plate_type}.xml');
  });

  it('substitutes nested values and leaves non-strings alone', () => {
    expect(substituteEnvVarsRecursive({ a: ['${X}', 3], b: { c: '${Y:-y}' } }, { X: 'x' })).toEqual({
      a: ['x', 3],
      b: { c: 'y' },
    });
  });

  it('rejects unknown log levels', () => {
    expect(() => resolveConfig({ logging: { level: 'verbose' } })).toThrow(ConfigValidationError);
    expect(() => resolveConfig({ logging: { level: 'verbose' } })).toThrow(
      "Config validation error at 'logging.level'"
    );
  });

  it('rejects an out-of-range indent', () => {
    expect(() => resolveConfig({ xml: { indent: 12 } })).toThrow("Config validation error at 'xml.indent'");
  });

  it('rejects a section that is not a mapping', () => {
    expect(() => resolveConfig({ survey: 'yes' })).toThrow("Config validation error at 'survey'");
  });

  it('fails on malformed YAML', async () => {
    const path = join(dir, 'broken.yaml');
    await writeFile(path, 'logging: [unclosed\n');
    await expect(loadConfig({ configPath: path, env: {} })).rejects.toThrow('Failed to parse config file');
  });
});
