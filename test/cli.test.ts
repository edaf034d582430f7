import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { formatJson, formatJsonError } from '../src/cli/formatters/json.js';
import { pipelineOptions, readSources, resolveConfig } from '../src/cli/run.js';
import { ConfigError, NoInputError, SourceReadError } from '../src/errors.js';
import { diagnostic } from '../src/model/diagnostic.js';
import { Logger } from '../src/utils/logger.js';

describe('run helpers', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'roffdoc-cli-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads sources under the ids given', async () => {
    writeFileSync(join(dir, 'a.h'), 'int a;');
    expect(await readSources(['a.h'], dir)).toEqual([{ id: 'a.h', text: 'int a;' }]);
  });

  it('wraps unreadable sources', async () => {
    await expect(readSources(['missing.h'], dir)).rejects.toBeInstanceOf(SourceReadError);
    await expect(readSources(['missing.h'], dir)).rejects.toThrow('Could not read missing.h');
  });

  it('lets flags override the configuration file', async () => {
    writeFileSync(join(dir, '.roffdocrc.json'), JSON.stringify({ section: '7', output: 'pages' }));
    const config = await resolveConfig({ cwd: dir, section: '3', includeUndocumented: true });
    expect(config.section).toBe('3');
    expect(config.output).toBe('pages');
    expect(config.includeUndocumented).toBe(true);
  });

  it('loads example files for the renderer', async () => {
    writeFileSync(join(dir, '.roffdocrc.json'), JSON.stringify({ examples: 'examples', preamble: '.\\" top\n' }));
    mkdirSync(join(dir, 'examples'));
    writeFileSync(join(dir, 'examples', 'demo.c'), 'int main(void) { return 0; }\n');
    const options = await pipelineOptions(await resolveConfig({ cwd: dir }), dir);
    expect(options.examples).toEqual({ 'demo.c': 'int main(void) { return 0; }\n' });
    expect(options.defaultDecoration).toEqual({ preamble: '.\\" top\n', epilogue: undefined });
  });
});

describe('formatJson', () => {
  it('summarises diagnostics by severity', () => {
    const report = JSON.parse(
      formatJson({
        diagnostics: [
          diagnostic('error', 'unterminated-comment', 'Unterminated documentation comment', { file: 'a.h', line: 1 }),
          diagnostic('info', 'unresolved-symbol', '#x does not name a documented symbol', { file: 'a.h', line: 2 }),
        ],
      }),
    );
    expect(report.summary).toEqual({ errors: 1, warnings: 0, info: 1, pages: 0 });
    expect(report.diagnostics[0]).toEqual({
      severity: 'error',
      code: 'unterminated-comment',
      message: 'Unterminated documentation comment',
      file: 'a.h',
      line: 1,
    });
    expect(report.pages).toEqual([]);
  });
});

describe('formatJsonError', () => {
  it('reports the error code and the message of its cause', () => {
    expect(JSON.parse(formatJsonError(new ConfigError('bad', new Error('inner'))))).toEqual({
      error: { name: 'ConfigError', code: 'CONFIG_ERROR', message: 'bad', cause: 'inner' },
    });
  });

  it('leaves out a missing cause', () => {
    expect(JSON.parse(formatJsonError(new NoInputError()))).toEqual({
      error: { name: 'NoInputError', code: 'NO_INPUT', message: 'No source files were supplied' },
    });
  });
});

describe('Logger', () => {
  it('writes only messages at or above its level', () => {
    const lines: string[] = [];
    const log = new Logger(line => lines.push(line));
    log.setLevel('info');
    log.debug('hidden');
    log.info('shown');
    log.error('also shown');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toContain('shown');
    expect(lines[1]).toContain('also shown');
  });

  it('can be silenced', () => {
    const lines: string[] = [];
    const log = new Logger(line => lines.push(line));
    log.setLevel('silent');
    log.error('nothing');
    expect(lines).toEqual([]);
  });
});
