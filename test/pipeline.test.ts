import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { NoInputError } from '../src/errors.js';
import { hasErrors } from '../src/model/diagnostic.js';
import { runPipeline } from '../src/pipeline.js';

const widgetHeader = readFileSync(fileURLToPath(new URL('./fixtures/widget.h', import.meta.url)), 'utf-8');

describe('runPipeline', () => {
  it('renders every page of a run', async () => {
    const result = await runPipeline([{ id: 'include/widget.h', text: widgetHeader }]);
    expect(result.pages.map(page => page.target)).toEqual([
      'widget.3',
      'widget-struct.3',
      'widget_new.3',
      'widget_free.3',
      'widget_size.3',
      'widget_count.3',
      'widgets.3',
    ]);
    expect(result.diagnostics.map(d => d.code)).toEqual(['unresolved-symbol', 'page-collision']);
    expect(hasErrors(result.diagnostics)).toBe(false);
  });

  it('uses the configured section', async () => {
    const result = await runPipeline([{ id: 'a.h', text: '/** A. */\nint a;' }], { section: '3x' });
    expect(result.pages.map(page => [page.target, page.section])).toEqual([['a.3x', '3x']]);
    expect(result.pages[0].body.startsWith('.TH "A" "3x"\n')).toBe(true);
  });

  it('keeps going past a file with errors', async () => {
    const result = await runPipeline([
      { id: 'bad.h', text: '/** never closed\nint x;' },
      { id: 'good.h', text: '/** Good. */\nint good;' },
    ]);
    expect(result.pages.map(page => page.name)).toEqual(['good']);
    expect(result.diagnostics).toEqual([
      { severity: 'error', code: 'unterminated-comment', message: 'Unterminated documentation comment', file: 'bad.h', line: 1 },
    ]);
    expect(hasErrors(result.diagnostics)).toBe(true);
  });

  it('rejects an empty run', async () => {
    await expect(runPipeline([])).rejects.toBeInstanceOf(NoInputError);
  });

  it('stops when aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(runPipeline([{ id: 'a.h', text: 'int a;' }], { signal: controller.signal })).rejects.toMatchObject({
      name: 'AbortError',
    });
  });
});
