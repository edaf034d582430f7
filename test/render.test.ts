import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { parseSourceFile } from '../src/parser/source-file.js';
import { buildSymbolIndex } from '../src/resolve/symbol-index.js';
import { briefify, formatDate, headingLine, lowerify, renderPages } from '../src/render/page.js';
import type { RenderOptions, RenderResult, RenderedPage } from '../src/render/page.js';
import { readLiteralLines } from '../src/render/roff.js';

const fixture = (name: string) => readFileSync(fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url)), 'utf-8');

function render(sources: Record<string, string>, options: RenderOptions = {}): RenderResult {
  const files = Object.entries(sources).map(([id, text]) => parseSourceFile({ id, text }));
  return renderPages(buildSymbolIndex(files), options);
}

function pageOf(result: RenderResult, title: string): RenderedPage {
  const page = result.pages.find(candidate => candidate.title === title);
  if (!page) throw new Error(`no page ${title}`);
  return page;
}

const lines = (...rows: string[]) => `${rows.join('\n')}\n`;

describe('renderPages', () => {
  const result = render({ 'include/widget.h': fixture('widget.h') });

  it('plans one page per documented declaration, file and group', () => {
    expect(result.pages.map(page => [page.target, page.kind])).toEqual([
      ['widget.3', 'file'],
      ['widget-struct.3', 'struct'],
      ['widget_new.3', 'function'],
      ['widget_free.3', 'function'],
      ['widget_size.3', 'enum'],
      ['widget_count.3', 'variable'],
      ['widgets.3', 'group'],
    ]);
  });

  it('renames a colliding page and reports it', () => {
    expect(result.diagnostics).toEqual([
      {
        severity: 'warning',
        code: 'page-collision',
        message: 'Page widget.3 already exists; writing widget-struct.3',
        file: 'include/widget.h',
        line: 13,
      },
    ]);
  });

  it('renders a function page', () => {
    expect(pageOf(result, 'widget_new').body).toBe(
      lines(
        '.TH "WIDGET_NEW" "3"',
        '.SH NAME',
        'widget_new \\- create a widget',
        '.SH SYNOPSIS',
        '.nf',
        '.B #include <widget.h>',
        '.PP',
        '.BI "struct widget *widget_new(int " width ");"',
        '.fi',
        '.SH DESCRIPTION',
        'The result is freed with \\f[B]widget_free\\f[R](3).',
        '.SH PARAMETERS',
        '.TP',
        '\\f[I]width\\f[R]',
        'Initial width.',
        '.SH RETURN VALUE',
        'A new widget.',
        '.SH "SEE ALSO"',
        '.BR widget_free (3),',
        '.BR widget-struct (3)',
      ),
    );
  });

  it('renders a struct page with its fields', () => {
    expect(pageOf(result, 'widget-struct').body).toBe(
      lines(
        '.TH "WIDGET-STRUCT" "3"',
        '.SH NAME',
        'widget',
        '.SH SYNOPSIS',
        '.nf',
        '.B #include <widget.h>',
        '.PP',
        '.B "struct widget {"',
        '.RS',
        '.B "int width;"',
        '.B "int height;"',
        '.RE',
        '.B "};"',
        '.fi',
        '.SH DESCRIPTION',
        'A widget.',
        '.SH FIELDS',
        '.TP',
        '.BR width',
        'Width in pixels.',
        '.TP',
        '.BR height',
        'Height in pixels.',
        '.SH "SEE ALSO"',
        '.BR widget_new (3),',
        '.BR widget_free (3)',
      ),
    );
  });

  it('lists enum constants', () => {
    expect(pageOf(result, 'widget_size').body).toContain(
      ['.SH CONSTANTS', '.TP', '.BR WIDGET_SMALL', 'Small.', '.TP', '.BR WIDGET_LARGE', 'Large.'].join('\n'),
    );
  });

  it('renders a group page listing its members', () => {
    expect(pageOf(result, 'widgets').body).toBe(
      lines(
        '.TH "WIDGETS" "3"',
        '.SH NAME',
        'widgets \\- creating and sizing widgets',
        '.SH SYNOPSIS',
        '.nf',
        '.B #include <widget.h>',
        '.fi',
        '.SH DESCRIPTION',
        'Creating and sizing widgets.',
        '.SH MEMBERS',
        '.TP',
        '.BR widget-struct (3)',
        '.TP',
        '.BR widget_new (3)',
        'Create a widget.',
        '.TP',
        '.BR widget_free (3)',
      ),
    );
  });

  it('renders a file page with member tables per group', () => {
    expect(pageOf(result, 'widget').body).toBe(
      lines(
        '.TH "WIDGET" "3"',
        '.SH NAME',
        'widget.h \\- widget toolkit',
        '.SH SYNOPSIS',
        '.nf',
        '.B #include <widget.h>',
        '.fi',
        '.SH DESCRIPTION',
        'Widget toolkit.',
        '.SH MEMBERS',
        '.TS',
        'tab(;);',
        'l l.',
        '\\f[B]Enumerations\\f[R];\\f[B]Description\\f[R]',
        '_',
        '\\f[B]widget_size\\f[R](3);T{',
        '\\&',
        'T}',
        '.T&',
        'l l.',
        '\\f[B]Variables\\f[R];\\f[B]Description\\f[R]',
        '_',
        '\\f[B]widget_count\\f[R](3);T{',
        '\\&',
        'T}',
        '.TE',
        '.SS Widgets',
        'Creating and sizing widgets.',
        '.PP',
        '.TS',
        'tab(;);',
        'l l.',
        '\\f[B]Functions\\f[R];\\f[B]Description\\f[R]',
        '_',
        '\\f[B]widget_new\\f[R](3);T{',
        'Create a widget.',
        'T}',
        '\\f[B]widget_free\\f[R](3);T{',
        '\\&',
        'T}',
        '.T&',
        'l l.',
        '\\f[B]Structures\\f[R];\\f[B]Description\\f[R]',
        '_',
        '\\f[B]widget-struct\\f[R](3);T{',
        '\\&',
        'T}',
        '.TE',
      ),
    );
  });

  it('renders unresolved references in italic', () => {
    expect(pageOf(result, 'widget_count').body).toContain(
      '.SH DESCRIPTION\nCount of live widgets, see \\f[I]nothing_here\\f[R].\n',
    );
  });
});

describe('page content', () => {
  it('ends an empty enum page at its CONSTANTS heading', () => {
    const page = pageOf(render({ 'e.h': '/** Nothing. */\nenum empty {};' }), 'empty');
    expect(page.body.endsWith('.B "enum empty {"\n.RS\n.RE\n.B "};"\n.fi\n.SH DESCRIPTION\nNothing.\n.SH CONSTANTS\n')).toBe(true);
  });

  it('escapes table cells', () => {
    const page = pageOf(render({ 'specials.h': fixture('specials.h') }), 'specials');
    expect(page.body).toContain(
      [
        '.SH DESCRIPTION',
        'Special characters.',
        '.PP',
        '.TS',
        'allbox tab(|);',
        'l l l.',
        '\\f[B]A\\f[R]|\\f[B]B\\f[R]|\\f[B]C\\f[R]',
        'T{',
        '!@#$%^&*()',
        'T}|T{',
        '\\[ba]',
        'T}|T{',
        '{}[]"\'',
        'T}',
        '.TE',
      ].join('\n'),
    );
  });

  it('guards lines that start with a control character', () => {
    const page = pageOf(render({ 'q.h': '/** “Quoted” start. */\nint q;' }), 'q');
    expect(page.body).toContain('.SH DESCRIPTION\n\\&"Quoted" start.\n');
  });

  it('links known symbols and leaves itself out of SEE ALSO', () => {
    const result = render({
      'a.h': '/** Calls #known and #unknown. */\nvoid caller(void);\n/** Self #me. */\nvoid me(void);\n/** Known. */\nvoid known(void);',
    });
    expect(pageOf(result, 'caller').body).toContain(
      '.SH DESCRIPTION\nCalls \\f[B]known\\f[R](3) and \\f[I]unknown\\f[R].\n.SH "SEE ALSO"\n.BR known (3)\n',
    );
    const me = pageOf(result, 'me').body;
    expect(me).toContain('Self \\f[B]me\\f[R](3).');
    expect(me).not.toContain('SEE ALSO');
  });

  it('italicises parameter names in descriptions and the synopsis', () => {
    const page = pageOf(
      render({ 'c.h': '/** Copy \\p src into \\p dst. \\param src Source. \\param dst Destination. */\nvoid copy(char *dst, const char *src);' }),
      'copy',
    );
    expect(page.body).toContain('.BI "void copy(char *" dst ", const char *" src ");"');
    expect(page.body).toContain('.SH DESCRIPTION\nCopy \\f[I]src\\f[R] into \\f[I]dst\\f[R].\n');
    expect(page.body).toContain('.SH PARAMETERS\n.TP\n\\f[I]src\\f[R]\nSource.\n.TP\n\\f[I]dst\\f[R]\nDestination.\n');
  });

  it('moves punctuation after links onto the .UE line', () => {
    const page = pageOf(render({ 'u.h': '/** See https://example.com/a, or [docs](https://example.com/b)! */\nint u;' }), 'u');
    expect(page.body).toContain(
      '.SH DESCRIPTION\nSee\n.UR https://example.com/a\n.UE ,\nor\n.UR https://example.com/b\ndocs\n.UE !\n',
    );
  });

  it('keeps code blocks verbatim', () => {
    const source = [
      '/**',
      ' * Prints.',
      ' *',
      ' * \\code',
      ' * printf("%d\\n", x);',
      ' * .TH fake',
      " * 'quote",
      ' *',
      ' *   indented',
      ' * \\endcode',
      ' */',
      'void print(int x);',
    ].join('\n');
    const page = pageOf(render({ 'p.h': source }), 'print');
    expect(readLiteralLines(page.body)).toEqual([['printf("%d\\n", x);', '.TH fake', "'quote", '', '  indented']]);
    expect(page.body).toContain('.SH DESCRIPTION\nPrints.\n.PP\n.in +4n\n.EX\nprintf("%d\\en", x);\n\\&.TH fake\n');
  });

  it('plain-renders styles when asked', () => {
    const page = pageOf(render({ 'w.h': '/** A **bold** and `code` word. */\nint w;' }, { preserveStyles: false }), 'w');
    expect(page.body).toContain('.SH DESCRIPTION\nA bold and \\f[C]code\\f[R] word.\n');
  });

  it('appends example sources and reports missing ones', () => {
    const source = { 'a.h': '/** Run.\n \\example demo.c Basic use. */\nvoid run(void);' };
    const supplied = render(source, { examples: { 'demo.c': 'run();\n' } });
    expect(pageOf(supplied, 'run').body).toContain('.SH DESCRIPTION\nRun.\n.SH EXAMPLES\nBasic use.\n.PP\n.in +4n\n.EX\nrun();\n.EE\n.in\n');
    expect(supplied.diagnostics).toEqual([]);

    const missing = render(source);
    expect(missing.diagnostics).toEqual([
      { severity: 'warning', code: 'missing-example', message: 'Example demo.c was not supplied', file: 'a.h', line: 3 },
    ]);
  });

  it('wraps pages in decorations', () => {
    const page = pageOf(
      render({ 'a.h': '/** A. */\nint a;' }, { decorations: { 'a.h': { preamble: '.\\" pre\n', epilogue: '.\\" post\n' } } }),
      'a',
    );
    expect(page.body.startsWith('.\\" pre\n.TH "A" "3"\n')).toBe(true);
    expect(page.body.endsWith('\nA.\n.\\" post\n')).toBe(true);
  });

  it('starts .TH on its own line after a preamble without a newline', () => {
    const page = pageOf(render({ 'a.h': '/** A. */\nint a;' }, { decorations: { 'a.h': { preamble: '.\\" top' } } }), 'a');
    expect(page.body.startsWith('.\\" top\n.TH "A" "3"\n')).toBe(true);
  });

  it('guards table cells and listing briefs that start with a period', () => {
    const table = pageOf(render({ 't.h': '/**\n * Cells.\n *\n * | A |\n * |---|\n * | .hidden |\n */\nint cells;' }), 'cells');
    expect(table.body).toContain('T{\n\\&.hidden\nT}\n.TE\n');

    const file = pageOf(render({ 'net.h': '/** \\file net.h\n Networking. */\n/** \\brief .NET bridge. */\nint bridge;' }), 'net');
    expect(file.body).toContain('\\f[B]bridge\\f[R](3);T{\n\\&.NET bridge.\nT}\n');
  });

  it('keeps the lines of an unrecognised declaration in the synopsis', () => {
    const page = pageOf(render({ 'o.h': '/** Odd. */\nDECLARE(x,\n.y);' }), 'DECLARE');
    expect(page.body).toContain('.SH SYNOPSIS\n.nf\n.B #include <o.h>\n.PP\nDECLARE(x,\n\\&.y)\n.fi\n');
  });

  it('escapes apostrophes in struck-through text', () => {
    const page = pageOf(render({ 's.h': "/** Was ~~it's~~ gone. */\nint s;" }), 's');
    expect(page.body).toContain(`.SH DESCRIPTION\nWas \\o'i\\(em'\\o't\\(em'\\o'\\(aq\\(em'\\o's\\(em' gone.\n`);
  });
});

describe('heading', () => {
  it('fills the footer from the project when autofill is on', () => {
    const options: RenderOptions = { project: { name: 'kit', version: '1.0' }, autofill: true, date: new Date(2026, 9, 19) };
    expect(headingLine(options, 'ignored')).toBe('.TH "KIT" "3" "Oct 19th 2026" "kit 1.0"');
  });

  it('keeps inner empty fields and drops trailing ones', () => {
    expect(headingLine({ headerMiddle: 'Library Functions' }, 'foo')).toBe('.TH "FOO" "3"   "Library Functions"');
    expect(headingLine({ topic: 'T', section: '7' }, 'foo')).toBe('.TH "T" "7"');
  });

  it('formats dates with ordinals', () => {
    expect(formatDate(new Date(2026, 0, 1))).toBe('Jan 1st 2026');
    expect(formatDate(new Date(2026, 1, 12))).toBe('Feb 12th 2026');
    expect(formatDate(new Date(2026, 2, 22))).toBe('Mar 22nd 2026');
    expect(formatDate(new Date(2026, 3, 23))).toBe('Apr 23rd 2026');
  });
});

describe('brief helpers', () => {
  it('lowers the first letter unless it starts an acronym', () => {
    expect(lowerify('Create a widget')).toBe('create a widget');
    expect(lowerify('HTTP client')).toBe('HTTP client');
  });

  it('drops trailing periods', () => {
    expect(briefify(' Frees it... ')).toBe('frees it');
  });
});
