import { describe, it, expect } from 'vitest';
import { parseComment, parseSeeAlso, splitRow } from '../src/markup/blocks.js';
import { listTags } from '../src/markup/commands.js';
import { inlineContext, parseInline } from '../src/markup/inline.js';
import { sectionsOf } from '../src/markup/sections.js';
import { textRun } from '../src/model/document.js';

describe('parseInline', () => {
  it('applies styling commands to the next word', () => {
    expect(parseInline('Use \\b bold, \\e italic and \\c code.')).toEqual([
      textRun('Use '),
      textRun('bold', ['bold']),
      textRun(', '),
      textRun('italic', ['italic']),
      textRun(' and '),
      textRun('code', ['code']),
      textRun('.'),
    ]);
  });

  it('parses markdown emphasis and code spans', () => {
    expect(parseInline('A **strong** and *light* `x < y` ~~gone~~')).toEqual([
      textRun('A '),
      textRun('strong', ['bold']),
      textRun(' and '),
      textRun('light', ['italic']),
      textRun(' '),
      textRun('x < y', ['code']),
      textRun(' '),
      textRun('gone', ['strike']),
    ]);
  });

  it('leaves snake_case words alone', () => {
    expect(parseInline('call foo_bar_baz now')).toEqual([textRun('call foo_bar_baz now')]);
  });

  it('turns #name and \\ref into links', () => {
    const nodes = parseInline('See #widget_new and \\ref widget::size "the size".');
    expect(nodes).toEqual([
      textRun('See '),
      { type: 'link', target: { kind: 'symbol', name: 'widget_new' }, text: 'widget_new', custom: false, origin: 'hash', styles: [] },
      textRun(' and '),
      {
        type: 'link',
        target: { kind: 'member', parent: 'widget', name: 'size' },
        text: 'the size',
        custom: true,
        origin: 'ref',
        styles: [],
      },
      textRun('.'),
    ]);
  });

  it('recognises markdown links and bare URLs', () => {
    const nodes = parseInline('Read [the guide](https://example.com/guide) or https://example.com/faq.');
    expect(nodes).toEqual([
      textRun('Read '),
      {
        type: 'link',
        target: { kind: 'url', url: 'https://example.com/guide' },
        text: 'the guide',
        custom: true,
        origin: 'markdown',
        styles: [],
      },
      textRun(' or '),
      {
        type: 'link',
        target: { kind: 'url', url: 'https://example.com/faq' },
        text: 'https://example.com/faq',
        custom: false,
        origin: 'auto',
        styles: [],
      },
      textRun('.'),
    ]);
  });

  it('normalises smart quotes and keeps escaped characters', () => {
    expect(parseInline('“quoted” it’s \\#1 \\@home')).toEqual([textRun('"quoted" it\'s #1 @home')]);
  });

  it('keeps unknown commands as text and reports them once', () => {
    const context = inlineContext(3);
    const nodes = parseInline('\\foo and \\foo', context);
    expect(nodes).toEqual([textRun('\\foo and \\foo')]);
    expect(context.diagnostics).toEqual([
      { severity: 'info', code: 'unknown-command', message: 'Unsupported command \\foo kept as text', line: 3 },
    ]);
  });

  it('links #symbols followed by punctuation', () => {
    const link = (name: string) => ({
      type: 'link',
      target: { kind: 'symbol', name },
      text: name,
      custom: false,
      origin: 'hash',
      styles: [],
    });
    expect(parseInline('See #one, #two. #three! #four? #five...')).toEqual([
      textRun('See '),
      link('one'),
      textRun(', '),
      link('two'),
      textRun('. '),
      link('three'),
      textRun('! '),
      link('four'),
      textRun('? '),
      link('five'),
      textRun('...'),
    ]);
  });

  it('does not link #symbols inside code spans', () => {
    expect(parseInline('use `#Foo` or <tt>#Bar</tt> or <code>#Baz</code>')).toEqual([
      textRun('use '),
      textRun('#Foo', ['code']),
      textRun(' or '),
      textRun('#Bar', ['code']),
      textRun(' or '),
      textRun('#Baz', ['code']),
    ]);
  });

  it('still parses markup inside other HTML styles', () => {
    expect(parseInline('<b>see #Foo</b>')).toEqual([
      textRun('see ', ['bold']),
      { type: 'link', target: { kind: 'symbol', name: 'Foo' }, text: 'Foo', custom: false, origin: 'hash', styles: ['bold'] },
    ]);
  });

  it('folds line breaks into spaces', () => {
    expect(parseInline('one\ntwo   three')).toEqual([textRun('one two three')]);
  });
});

describe('parseComment', () => {
  it('splits brief, description and tags', () => {
    const { document, diagnostics } = parseComment(
      [
        ' @brief Frobnicate a widget.',
        '',
        ' Longer text',
        ' continues here.',
        '',
        ' @param[in] w The widget.',
        ' @param[out] n Count.',
        ' @return Zero on success.',
        ' @retval -1 On failure.',
      ].join('\n'),
    );
    expect(diagnostics).toEqual([]);
    expect(document).toEqual([
      { type: 'tag', tag: 'brief', children: [textRun('Frobnicate a widget.')] },
      { type: 'paragraph', children: [textRun('Longer text continues here.')] },
      { type: 'tag', tag: 'param', names: ['w'], direction: 'in', children: [textRun('The widget.')] },
      { type: 'tag', tag: 'param', names: ['n'], direction: 'out', children: [textRun('Count.')] },
      { type: 'tag', tag: 'return', children: [textRun('Zero on success.')] },
      { type: 'tag', tag: 'retval', value: '-1', children: [textRun('On failure.')] },
    ]);
  });

  it('takes only the next line for a bare brief', () => {
    const { document } = parseComment(' \\brief\n First line.\n Second line.');
    expect(document).toEqual([
      { type: 'tag', tag: 'brief', children: [textRun('First line.')] },
      { type: 'paragraph', children: [textRun('Second line.')] },
    ]);
  });

  it('leaves #symbols in code blocks as text', () => {
    const { document } = parseComment(' \\code\n #Name\n \\endcode');
    expect(document).toEqual([{ type: 'code', lines: ['#Name'] }]);
  });

  it('normalises smart quotes in titles and return values', () => {
    expect(parseComment(' \\par “Fast” path\n Body text.').document).toEqual([
      { type: 'tag', tag: 'par', title: '"Fast" path', children: [textRun('Body text.')] },
    ]);
    expect(parseComment(' \\defgroup core “Core” calls').document).toEqual([
      { type: 'tag', tag: 'group', mode: 'define', name: 'core', title: '"Core" calls' },
    ]);
    expect(parseComment(' \\retval ‘none’ Nothing.').document).toEqual([
      { type: 'tag', tag: 'retval', value: "'none'", children: [textRun('Nothing.')] },
    ]);
  });

  it('continues a tag body on following lines', () => {
    const { document } = parseComment(' \\param w The widget\n   to frobnicate.\n\n Trailing paragraph.');
    expect(document).toEqual([
      { type: 'tag', tag: 'param', names: ['w'], children: [textRun('The widget to frobnicate.')] },
      { type: 'paragraph', children: [textRun('Trailing paragraph.')] },
    ]);
  });

  it('splits a block command off the middle of a line', () => {
    const { document } = parseComment(' Does things. \\return nothing');
    expect(document).toEqual([
      { type: 'paragraph', children: [textRun('Does things.')] },
      { type: 'tag', tag: 'return', children: [textRun('nothing')] },
    ]);
  });

  it('reads code blocks verbatim and dedents them', () => {
    const { document } = parseComment(' Example:\n \\code{.c}\n   int x = 1;\n     x++;\n \\endcode');
    expect(document).toEqual([
      { type: 'paragraph', children: [textRun('Example:')] },
      { type: 'code', language: 'c', lines: ['int x = 1;', '  x++;'] },
    ]);
  });

  it('reads fenced code blocks', () => {
    const { document } = parseComment('```\n*not* emphasis\n```');
    expect(document).toEqual([{ type: 'code', lines: ['*not* emphasis'] }]);
  });

  it('warns about an unclosed code block', () => {
    const { document, diagnostics } = parseComment(' \\code\n x');
    expect(document).toEqual([{ type: 'code', lines: ['x'] }]);
    expect(diagnostics).toEqual([
      {
        severity: 'warning',
        code: 'unterminated-code',
        message: 'Code block is not closed before the end of the comment',
        line: 1,
      },
    ]);
  });

  it('reads markdown tables and pads short rows', () => {
    const { document, diagnostics } = parseComment('| Key | Value |\n|-----|-------|\n| a | `1` |\n| b |');
    expect(diagnostics).toEqual([]);
    expect(document).toEqual([
      {
        type: 'table',
        columns: 2,
        header: [[textRun('Key')], [textRun('Value')]],
        rows: [
          [[textRun('a')], [textRun('1', ['code'])]],
          [[textRun('b')], []],
        ],
      },
    ]);
  });

  it('flags table rows with too many cells', () => {
    const { diagnostics } = parseComment('| A |\n|---|\n| 1 | 2 |');
    expect(diagnostics).toEqual([
      { severity: 'warning', code: 'malformed-table', message: 'Table row has 2 cells, expected 1', line: 3 },
    ]);
  });

  it('reads bulleted and numbered lists', () => {
    expect(parseComment('- one\n- two\n  continued').document).toEqual([
      { type: 'list', ordered: false, items: [[textRun('one')], [textRun('two continued')]] },
    ]);
    expect(parseComment('1. first\n2. second').document).toEqual([
      { type: 'list', ordered: true, items: [[textRun('first')], [textRun('second')]] },
    ]);
  });

  it('reads admonitions, see-also and grouping tags', () => {
    const { document } = parseComment(
      [' \\note Mind the gap.', ' \\sa widget_free(), #widget_new, https://example.com/w.', ' \\ingroup core io'].join('\n'),
    );
    expect(document).toEqual([
      { type: 'admonition', kind: 'note', children: [textRun('Mind the gap.')] },
      {
        type: 'tag',
        tag: 'see',
        links: [
          { type: 'link', target: { kind: 'symbol', name: 'widget_free' }, text: 'widget_free', custom: false, origin: 'see', styles: [] },
          { type: 'link', target: { kind: 'symbol', name: 'widget_new' }, text: 'widget_new', custom: false, origin: 'see', styles: [] },
          {
            type: 'link',
            target: { kind: 'url', url: 'https://example.com/w' },
            text: 'https://example.com/w',
            custom: false,
            origin: 'see',
            styles: [],
          },
        ],
      },
      { type: 'tag', tag: 'ingroup', names: ['core', 'io'] },
    ]);
  });

  it('reads group definitions and scope markers', () => {
    const { document } = parseComment(' \\defgroup core Core functions\n @{');
    expect(document).toEqual([
      { type: 'tag', tag: 'group', mode: 'define', name: 'core', title: 'Core functions' },
      { type: 'tag', tag: 'open' },
    ]);
  });

  it('reads target commands', () => {
    expect(parseComment(' \\fn int widget_size(const widget *w)').document).toEqual([
      { type: 'tag', tag: 'target', command: 'fn', name: 'widget_size' },
    ]);
    expect(parseComment(' \\var widget::size').document).toEqual([
      { type: 'tag', tag: 'target', command: 'var', name: 'widget::size' },
    ]);
  });

  it('splits comma separated authors', () => {
    const { document } = parseComment(' \\author Ann Example, Bo Sample');
    expect(document).toEqual([
      { type: 'tag', tag: 'author', children: [textRun('Ann Example')] },
      { type: 'tag', tag: 'author', children: [textRun('Bo Sample')] },
    ]);
  });
});

describe('sectionsOf', () => {
  it('sorts a document into page sections', () => {
    const { document } = parseComment(' \\brief Short.\n\n Body.\n \\since 1.2\n \\deprecated Use other.');
    const sections = sectionsOf(document);
    expect(sections.brief).toEqual([textRun('Short.')]);
    expect(sections.description).toEqual([{ type: 'paragraph', children: [textRun('Body.')] }]);
    expect(sections.since).toEqual([[textRun('1.2')]]);
    expect(sections.deprecated).toEqual([[textRun('Use other.')]]);
  });
});

describe('helpers', () => {
  it('splits table rows with escaped bars', () => {
    expect(splitRow('| a \\| b | c |')).toEqual(['a \\| b', 'c']);
  });

  it('skips see-also tokens that are not symbols', () => {
    expect(parseSeeAlso('and, 42').map(link => link.text)).toEqual(['and']);
  });

  it('lists known tags outside code blocks', () => {
    expect(listTags('\\brief x\n\\code\n\\param y\n\\endcode\n\\return z', 10)).toEqual([
      { name: 'brief', line: 10 },
      { name: 'code', line: 11 },
      { name: 'return', line: 14 },
    ]);
  });
});
