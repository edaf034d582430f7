import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import yaml from 'js-yaml';
import * as TOML from 'smol-toml';
import { ConfigError } from './errors.js';
import type { Decoration, ProjectInfo } from './render/page.js';

export interface RoffdocConfig {
  project: ProjectInfo;
  section: string;
  topic?: string;
  includePath: 'short' | 'full';
  footerMiddle?: string;
  footerInside?: string;
  headerMiddle?: string;
  autofill: boolean;
  preamble?: string;
  epilogue?: string;
  /** Decorations keyed by source file id or group name. */
  decorations: Record<string, Decoration>;
  /** Directory `\example` files are read from. */
  examples?: string;
  output: string;
  includeUndocumented: boolean;
  preserveStyles: boolean;
  /** File the configuration was read from, if any. */
  path?: string;
}

export const CONFIG_FILES = ['.roffdocrc.json', '.roffdocrc.yml', '.roffdocrc.yaml', '.roffdocrc.toml'];

export function defaultConfig(): RoffdocConfig {
  return {
    project: {},
    section: '3',
    includePath: 'short',
    autofill: false,
    decorations: {},
    output: 'man',
    includeUndocumented: false,
    preserveStyles: true,
  };
}

type Raw = Record<string, unknown>;

function isRecord(value: unknown): value is Raw {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(raw: Raw, key: string): string | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value === 'number') return String(value);
  if (typeof value !== 'string') throw new ConfigError(`"${key}" must be a string`);
  return value;
}

function optionalBoolean(raw: Raw, key: string, fallback: boolean): boolean {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') throw new ConfigError(`"${key}" must be true or false`);
  return value;
}

function parseConfigText(text: string, path: string): unknown {
  try {
    if (path.endsWith('.json')) return JSON.parse(text);
    if (path.endsWith('.toml')) return TOML.parse(text);
    return yaml.load(text);
  } catch (err) {
    throw new ConfigError(`Could not parse ${path}`, err);
  }
}

/** A decoration value is either literal roff or `{ file }` naming a file beside the config. */
async function resolveDecorationText(value: unknown, key: string, baseDir: string): Promise<string | undefined> {
  if (value === undefined) return undefined;
  if (typeof value === 'string') return value;
  if (isRecord(value) && typeof value.file === 'string') {
    const path = resolve(baseDir, value.file);
    try {
      return await readFile(path, 'utf-8');
    } catch (err) {
      throw new ConfigError(`Could not read ${key} file ${path}`, err);
    }
  }
  throw new ConfigError(`"${key}" must be a string or { file: string }`);
}

async function resolveDecoration(raw: unknown, key: string, baseDir: string): Promise<Decoration> {
  if (!isRecord(raw)) throw new ConfigError(`Decoration "${key}" must be a table`);
  const decoration: Decoration = {};
  const preamble = await resolveDecorationText(raw.preamble, `${key}.preamble`, baseDir);
  const epilogue = await resolveDecorationText(raw.epilogue, `${key}.epilogue`, baseDir);
  if (preamble !== undefined) decoration.preamble = preamble;
  if (epilogue !== undefined) decoration.epilogue = epilogue;
  return decoration;
}

/** Narrow parsed configuration data into a RoffdocConfig. */
export async function validateConfig(data: unknown, baseDir: string): Promise<RoffdocConfig> {
  const config = defaultConfig();
  if (data === undefined || data === null) return config;
  if (!isRecord(data)) throw new ConfigError('Configuration must be a table of options');

  if (data.project !== undefined) {
    if (!isRecord(data.project)) throw new ConfigError('"project" must be a table');
    config.project = {
      name: optionalString(data.project, 'name'),
      brief: optionalString(data.project, 'brief'),
      version: optionalString(data.project, 'version'),
    };
  }

  const section = optionalString(data, 'section');
  if (section !== undefined) {
    if (!/^[1-9][a-z]*$/.test(section)) throw new ConfigError(`"section" must be a manual section 1-9, got ${section}`);
    config.section = section;
  }

  const includePath = optionalString(data, 'includePath');
  if (includePath !== undefined) {
    if (includePath !== 'short' && includePath !== 'full') throw new ConfigError('"includePath" must be "short" or "full"');
    config.includePath = includePath;
  }

  config.topic = optionalString(data, 'topic');
  config.footerMiddle = optionalString(data, 'footerMiddle');
  config.footerInside = optionalString(data, 'footerInside');
  config.headerMiddle = optionalString(data, 'headerMiddle');
  config.examples = optionalString(data, 'examples');
  config.output = optionalString(data, 'output') ?? config.output;
  config.autofill = optionalBoolean(data, 'autofill', config.autofill);
  config.includeUndocumented = optionalBoolean(data, 'includeUndocumented', config.includeUndocumented);
  config.preserveStyles = optionalBoolean(data, 'preserveStyles', config.preserveStyles);
  config.preamble = await resolveDecorationText(data.preamble, 'preamble', baseDir);
  config.epilogue = await resolveDecorationText(data.epilogue, 'epilogue', baseDir);

  if (data.decorations !== undefined) {
    if (!isRecord(data.decorations)) throw new ConfigError('"decorations" must be a table');
    for (const [key, value] of Object.entries(data.decorations)) {
      config.decorations[key] = await resolveDecoration(value, key, baseDir);
    }
  }
  return config;
}

/**
 * Load `.roffdocrc.{json,yml,yaml,toml}` from `dir`, or the file named by `explicitPath`.
 * Defaults apply when no file exists.
 */
export async function loadConfig(dir: string, explicitPath?: string): Promise<RoffdocConfig> {
  let path: string | undefined;
  if (explicitPath) {
    path = resolve(dir, explicitPath);
    if (!existsSync(path)) throw new ConfigError(`Configuration file ${path} does not exist`);
  } else {
    path = CONFIG_FILES.map(name => resolve(dir, name)).find(candidate => existsSync(candidate));
  }
  if (!path) return defaultConfig();

  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Could not read ${path}`, err);
  }
  const config = await validateConfig(parseConfigText(text, path), dirname(path));
  config.path = path;
  return config;
}
