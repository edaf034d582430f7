import { mkdir, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import chalk from 'chalk';
import { hasErrors } from '../../model/diagnostic.js';
import { runPipeline } from '../../pipeline.js';
import { RoffdocError } from '../../errors.js';
import { formatJson, formatJsonError } from '../formatters/json.js';
import { formatTerminal } from '../formatters/terminal.js';
import { applyLogFlags, pipelineOptions, readSources, resolveConfig } from '../run.js';
import type { RunFlags } from '../run.js';
import { logger } from '../../utils/logger.js';

export async function generateCommand(files: string[], opts: RunFlags = {}): Promise<void> {
  applyLogFlags(opts);
  const cwd = opts.cwd ?? process.cwd();

  try {
    const config = await resolveConfig(opts);
    const sources = await readSources(files, cwd);
    const result = await runPipeline(sources, await pipelineOptions(config, cwd));

    const outputDir = resolve(cwd, config.output);
    await mkdir(outputDir, { recursive: true });
    await Promise.all(result.pages.map(page => writeFile(join(outputDir, page.target), page.body, 'utf-8')));
    logger.info(`Wrote ${result.pages.length} pages`, { output: outputDir });

    if (opts.format === 'json') {
      console.log(formatJson({ diagnostics: result.diagnostics, pages: result.pages }));
    } else {
      console.log(formatTerminal({ diagnostics: result.diagnostics, pages: result.pages, output: config.output }));
    }
    if (hasErrors(result.diagnostics)) process.exitCode = 1;
  } catch (err) {
    if (err instanceof RoffdocError) {
      if (opts.format === 'json') console.log(formatJsonError(err));
      else console.error(chalk.red(`Error: ${err.message}`));
      process.exit(1);
    }
    throw err;
  }
}
