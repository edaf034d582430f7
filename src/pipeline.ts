import { performance } from 'node:perf_hooks';
import { NoInputError } from './errors.js';
import { diagnostic } from './model/diagnostic.js';
import type { Diagnostic } from './model/diagnostic.js';
import { parseSourceFile } from './parser/source-file.js';
import type { ParsedFile, SourceInput } from './parser/source-file.js';
import { renderPages } from './render/page.js';
import type { RenderOptions, RenderedPage } from './render/page.js';
import { buildSymbolIndex } from './resolve/symbol-index.js';
import type { IndexOptions, SymbolIndex } from './resolve/symbol-index.js';
import { logger } from './utils/logger.js';

export interface PipelineOptions extends RenderOptions, IndexOptions {
  signal?: AbortSignal;
}

export interface PipelineResult {
  pages: RenderedPage[];
  index: SymbolIndex;
  diagnostics: Diagnostic[];
}

function parseIsolated(source: SourceInput): ParsedFile {
  try {
    return parseSourceFile(source);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return {
      file: source.id,
      declarations: [],
      groupEvents: [],
      diagnostics: [diagnostic('error', 'internal-error', `Failed to parse: ${message}`, { file: source.id })],
    };
  }
}

/**
 * Parse every source, build the run's index and render its pages. Per-file failures
 * become diagnostics; only missing input and abort reject.
 */
export async function runPipeline(sources: readonly SourceInput[], options: PipelineOptions = {}): Promise<PipelineResult> {
  if (sources.length === 0) throw new NoInputError();
  const { signal } = options;
  signal?.throwIfAborted();

  let start = performance.now();
  const files = await Promise.all(
    sources.map(async source => {
      signal?.throwIfAborted();
      return parseIsolated(source);
    }),
  );
  logger.debug('Parsed sources', { files: files.length, ms: Math.round(performance.now() - start) });
  signal?.throwIfAborted();

  start = performance.now();
  const index = buildSymbolIndex(files, { includeUndocumented: options.includeUndocumented });
  logger.debug('Built symbol index', { declarations: index.declarations().length, ms: Math.round(performance.now() - start) });
  signal?.throwIfAborted();

  start = performance.now();
  const rendered = renderPages(index, options);
  logger.debug('Rendered pages', { pages: rendered.pages.length, ms: Math.round(performance.now() - start) });
  signal?.throwIfAborted();

  return {
    pages: rendered.pages,
    index,
    diagnostics: [...files.flatMap(file => file.diagnostics), ...index.diagnostics, ...rendered.diagnostics],
  };
}
