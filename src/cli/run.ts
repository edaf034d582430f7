import { existsSync } from 'node:fs';
import { readdir, readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { loadConfig } from '../config.js';
import type { RoffdocConfig } from '../config.js';
import { SourceReadError } from '../errors.js';
import type { SourceInput } from '../parser/source-file.js';
import type { PipelineOptions } from '../pipeline.js';
import { logger } from '../utils/logger.js';

export interface RunFlags {
  cwd?: string;
  format?: 'terminal' | 'json';
  config?: string;
  section?: string;
  output?: string;
  includeUndocumented?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

export function applyLogFlags(flags: RunFlags): void {
  if (flags.verbose) logger.setLevel('debug');
  else if (flags.quiet) logger.setLevel('error');
}

/** Read sources in the order given; ids stay as the caller wrote them. */
export async function readSources(files: readonly string[], cwd: string): Promise<SourceInput[]> {
  return Promise.all(
    files.map(async file => {
      try {
        return { id: file, text: await readFile(resolve(cwd, file), 'utf-8') };
      } catch (err) {
        throw new SourceReadError(file, err);
      }
    }),
  );
}

async function readExamples(dir: string): Promise<Record<string, string>> {
  if (!existsSync(dir)) {
    logger.warn(`Examples directory ${dir} does not exist`);
    return {};
  }
  const entries = await readdir(dir, { withFileTypes: true });
  const examples: Record<string, string> = {};
  for (const entry of entries) {
    if (!entry.isFile()) continue;
    examples[entry.name] = await readFile(join(dir, entry.name), 'utf-8');
  }
  return examples;
}

export async function resolveConfig(flags: RunFlags): Promise<RoffdocConfig> {
  const cwd = flags.cwd ?? process.cwd();
  const config = await loadConfig(cwd, flags.config);
  if (config.path) logger.debug(`Using configuration ${config.path}`);
  if (flags.section) config.section = flags.section;
  if (flags.output) config.output = flags.output;
  if (flags.includeUndocumented) config.includeUndocumented = true;
  return config;
}

export async function pipelineOptions(config: RoffdocConfig, cwd: string): Promise<PipelineOptions> {
  const defaultDecoration = { preamble: config.preamble, epilogue: config.epilogue };
  return {
    section: config.section,
    topic: config.topic,
    project: config.project,
    footerMiddle: config.footerMiddle,
    footerInside: config.footerInside,
    headerMiddle: config.headerMiddle,
    autofill: config.autofill,
    includePath: config.includePath,
    decorations: config.decorations,
    defaultDecoration,
    examples: config.examples ? await readExamples(resolve(cwd, config.examples)) : {},
    includeUndocumented: config.includeUndocumented,
    preserveStyles: config.preserveStyles,
  };
}
