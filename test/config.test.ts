import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { defaultConfig, loadConfig, validateConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'roffdoc-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('falls back to defaults without a file', async () => {
    expect(await loadConfig(dir)).toEqual(defaultConfig());
  });

  it('reads a JSON file', async () => {
    writeFileSync(join(dir, '.roffdocrc.json'), JSON.stringify({ section: '7', project: { name: 'kit', version: 2 } }));
    const config = await loadConfig(dir);
    expect(config.section).toBe('7');
    expect(config.project).toEqual({ name: 'kit', brief: undefined, version: '2' });
    expect(config.path).toBe(join(dir, '.roffdocrc.json'));
  });

  it('reads a YAML file and decoration files beside it', async () => {
    writeFileSync(join(dir, 'pre.roff'), '.\\" generated\n');
    writeFileSync(
      join(dir, '.roffdocrc.yml'),
      ['includePath: full', 'decorations:', '  a.h:', '    preamble:', '      file: pre.roff', '    epilogue: ".\\\\\\" end"'].join('\n'),
    );
    const config = await loadConfig(dir);
    expect(config.includePath).toBe('full');
    expect(config.decorations).toEqual({ 'a.h': { preamble: '.\\" generated\n', epilogue: '.\\" end' } });
  });

  it('reads a TOML file', async () => {
    writeFileSync(join(dir, '.roffdocrc.toml'), 'autofill = true\npreserveStyles = false\n\n[project]\nname = "kit"\n');
    const config = await loadConfig(dir);
    expect(config.autofill).toBe(true);
    expect(config.preserveStyles).toBe(false);
    expect(config.project.name).toBe('kit');
  });

  it('rejects a file that does not parse', async () => {
    writeFileSync(join(dir, '.roffdocrc.json'), '{');
    await expect(loadConfig(dir)).rejects.toThrow(`Could not parse ${join(dir, '.roffdocrc.json')}`);
  });

  it('rejects a missing explicit path', async () => {
    await expect(loadConfig(dir, 'nope.yml')).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('validateConfig', () => {
  it('rejects an invalid section', async () => {
    await expect(validateConfig({ section: 'x' }, '.')).rejects.toThrow('"section" must be a manual section 1-9, got x');
  });

  it('rejects values of the wrong type', async () => {
    await expect(validateConfig({ autofill: 'yes' }, '.')).rejects.toThrow('"autofill" must be true or false');
    await expect(validateConfig({ includePath: 'long' }, '.')).rejects.toThrow('"includePath" must be "short" or "full"');
    await expect(validateConfig([], '.')).rejects.toBeInstanceOf(ConfigError);
  });

  it('carries the error code', async () => {
    await expect(validateConfig({ decorations: 3 }, '.')).rejects.toMatchObject({ code: 'CONFIG_ERROR' });
  });
});
