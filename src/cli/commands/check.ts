import chalk from 'chalk';
import { RoffdocError } from '../../errors.js';
import { hasErrors } from '../../model/diagnostic.js';
import { runPipeline } from '../../pipeline.js';
import { formatJson, formatJsonError } from '../formatters/json.js';
import { formatTerminal } from '../formatters/terminal.js';
import { applyLogFlags, pipelineOptions, readSources, resolveConfig } from '../run.js';
import type { RunFlags } from '../run.js';

/** Parse and resolve without writing pages; exits non-zero when any error was reported. */
export async function checkCommand(files: string[], opts: RunFlags = {}): Promise<void> {
  applyLogFlags(opts);
  const cwd = opts.cwd ?? process.cwd();

  try {
    const config = await resolveConfig(opts);
    const sources = await readSources(files, cwd);
    const result = await runPipeline(sources, await pipelineOptions(config, cwd));

    if (opts.format === 'json') {
      console.log(formatJson({ diagnostics: result.diagnostics }));
    } else {
      console.log(formatTerminal({ diagnostics: result.diagnostics }));
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
