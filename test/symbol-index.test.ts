import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { buildSymbolIndex } from '../src/resolve/symbol-index.js';
import type { SymbolIndex } from '../src/resolve/symbol-index.js';
import type { SeeAlsoEntry } from '../src/resolve/resolver.js';
import { parseSourceFile } from '../src/parser/source-file.js';

const widgetHeader = readFileSync(fileURLToPath(new URL('./fixtures/widget.h', import.meta.url)), 'utf-8');

function indexOf(sources: Record<string, string>, includeUndocumented = false): SymbolIndex {
  const files = Object.entries(sources).map(([id, text]) => parseSourceFile({ id, text }));
  return buildSymbolIndex(files, { includeUndocumented });
}

function describeEntry(entry: SeeAlsoEntry): string {
  switch (entry.kind) {
    case 'declaration':
      return entry.declaration.name;
    case 'member':
      return `${entry.parent.name}.${entry.member.name}`;
    case 'group':
      return `group ${entry.group.name}`;
    case 'url':
      return entry.url;
    case 'unresolved':
      return `? ${entry.name}`;
  }
}

describe('SymbolIndex', () => {
  const index = indexOf({ 'include/widget.h': widgetHeader });
  const find = (name: string) => {
    const found = index.declarations().find(d => d.name === name);
    if (!found) throw new Error(`no declaration ${name}`);
    return found;
  };

  it('looks names up across scopes', () => {
    expect(index.lookup('widget_new')).toMatchObject({ kind: 'declaration', declaration: { kind: 'function' } });
    expect(index.lookup('widget')).toMatchObject({ kind: 'declaration', declaration: { kind: 'struct' } });
    expect(index.lookup('WIDGET_LARGE')).toMatchObject({ kind: 'member', parent: { name: 'widget_size' }, member: { name: 'WIDGET_LARGE' } });
    expect(index.lookup('widget::height')).toMatchObject({ kind: 'member', member: { name: 'height' } });
    expect(index.lookup('widget.width')).toMatchObject({ kind: 'member', member: { name: 'width' } });
    expect(index.lookup('widgets')).toMatchObject({ kind: 'group', group: { name: 'widgets', title: 'Widgets' } });
    expect(index.lookup('nothing_here')).toBeNull();
  });

  it('reports unresolved #references as info', () => {
    expect(index.diagnostics).toEqual([
      {
        severity: 'info',
        code: 'unresolved-symbol',
        message: '#nothing_here does not name a documented symbol',
        file: 'include/widget.h',
        line: 39,
      },
    ]);
  });

  it('collects group members in order', () => {
    const group = index.group('widgets');
    expect(group?.members).toEqual([
      'include/widget.h::struct::widget',
      'include/widget.h::function::widget_new',
      'include/widget.h::function::widget_free',
    ]);
    expect(group?.files).toEqual(['include/widget.h']);
    expect(index.groupsOf(find('widget_new')).map(g => g.name)).toEqual(['widgets']);
    expect(index.groupsOf(find('widget_size'))).toEqual([]);
  });

  it('orders see-also as explicit, inline, then group members', () => {
    expect(index.seeAlso(find('widget_new')).map(describeEntry)).toEqual(['widget_free', 'widget']);
    expect(index.seeAlso(find('widget_free')).map(describeEntry)).toEqual(['widget_new', 'widget']);
    expect(index.seeAlso(find('widget')).map(describeEntry)).toEqual(['widget_new', 'widget_free']);
    expect(index.seeAlso(find('widget_count'))).toEqual([]);
  });

  it('tracks who references a declaration', () => {
    expect(index.referencesOf(find('widget_new')).map(describeEntry)).toEqual(['widget_free']);
    expect(index.referencedBy(find('widget_free')).map(d => d.name)).toEqual(['widget_new']);
    expect(index.referencedBy(find('widget_new')).map(d => d.name)).toEqual(['widget_free']);
  });

  it('leaves undocumented declarations out unless asked', () => {
    const source = { 'a.h': '/** Documented. */\nint a;\nint b;' };
    expect(indexOf(source).lookup('b')).toBeNull();
    expect(indexOf(source, true).lookup('b')).toMatchObject({ kind: 'declaration', declaration: { name: 'b' } });
  });

  it('prefers a definition over a forward declaration', () => {
    const forward = indexOf({ 'a.h': '/** Fwd. */\nstruct node;\n/** Node. */\nstruct node { int v; };' });
    expect(forward.diagnostics).toEqual([]);
    expect(forward.lookup('node')).toMatchObject({ declaration: { details: { hasBody: true } } });

    const reversed = indexOf({ 'a.h': '/** Node. */\nstruct node { int v; };\n/** Fwd. */\nstruct node;' });
    expect(reversed.diagnostics).toEqual([]);
    expect(reversed.lookup('node')).toMatchObject({ declaration: { details: { hasBody: true } } });
  });

  it('warns about duplicates and keeps the later declaration', () => {
    const dup = indexOf({ 'a.h': '/** One. */\nint f(void);', 'b.h': '/** Two. */\nint f(void);' });
    expect(dup.diagnostics).toEqual([
      {
        severity: 'warning',
        code: 'duplicate-symbol',
        message: 'f is declared more than once; the later declaration wins',
        file: 'b.h',
        line: 2,
      },
    ]);
    expect(dup.lookup('f')).toMatchObject({ declaration: { filePath: 'b.h' } });
  });

  it('refuses a group parent that would form a cycle', () => {
    const cyclic = indexOf({ 'a.h': '/** \\defgroup a A\n \\ingroup b */\n/** \\defgroup b B\n \\ingroup a */' });
    expect(cyclic.diagnostics).toEqual([
      {
        severity: 'warning',
        code: 'group-cycle',
        message: 'Making a the parent of b would create a cycle',
        file: 'a.h',
        line: 3,
      },
    ]);
    expect(cyclic.group('a')?.parent).toBe('b');
    expect(cyclic.group('b')?.parent).toBeUndefined();
    expect(cyclic.group('b')?.children).toEqual(['a']);
  });

  it('keeps unresolved and URL entries of \\sa', () => {
    const sa = indexOf({ 'a.h': '/** Thing.\n \\sa missing_fn, https://example.com/doc */\nint thing;' });
    const thing = sa.declarations().find(d => d.name === 'thing');
    expect(thing && sa.seeAlso(thing).map(describeEntry)).toEqual(['? missing_fn', 'https://example.com/doc']);
    expect(sa.diagnostics).toEqual([
      { severity: 'warning', code: 'unresolved-reference', message: 'Reference to unknown symbol missing_fn', file: 'a.h', line: 1 },
    ]);
  });

  it('lists documented parameter types after explicit see-also entries', () => {
    const typed = indexOf({
      'a.h': [
        '/** A w. */',
        'struct w { int v; };',
        '/** Frees. */',
        'void wfree(struct w *p);',
        '/** A handle. */',
        'typedef int handle_t;',
        '/** Uses. \\sa wfree */',
        'void use(handle_t h);',
        'struct hidden { int x; };',
        '/** Takes an undocumented type. */',
        'void g(struct hidden *h);',
      ].join('\n'),
    });
    const named = (name: string) => {
      const found = typed.declarations().find(d => d.name === name);
      if (!found) throw new Error(`no declaration ${name}`);
      return found;
    };
    expect(typed.seeAlso(named('wfree')).map(describeEntry)).toEqual(['w']);
    expect(typed.seeAlso(named('use')).map(describeEntry)).toEqual(['wfree', 'handle_t']);
    expect(typed.seeAlso(named('g'))).toEqual([]);
  });

  it('keeps mutual see-also references', () => {
    const mutual = indexOf({ 'a.h': '/** A. \\sa b */\nint a;\n/** B. \\sa a */\nint b;' });
    const seeAlsoOf = (name: string) => {
      const found = mutual.declarations().find(d => d.name === name);
      return found ? mutual.seeAlso(found).map(describeEntry) : [];
    };
    expect(seeAlsoOf('a')).toEqual(['b']);
    expect(seeAlsoOf('b')).toEqual(['a']);
  });

  it('merges every reopening of a group into one', () => {
    const reopened = indexOf({
      'a.h': [
        '/** \\defgroup g First */',
        '/** \\addtogroup g\n @{ */',
        '/** A. */',
        'int a;',
        '/** @} */',
        '/** \\addtogroup g Second\n @{ */',
        '/** B. */',
        'int b;',
        '/** @} */',
        '/** \\addtogroup g\n @{ */',
        '/** C. */',
        'int c;',
        '/** @} */',
      ].join('\n'),
      'b.h': '/** \\addtogroup g\n @{ */\n/** D. */\nint d;\n/** @} */',
    });
    expect(reopened.groups()).toHaveLength(1);
    const group = reopened.group('g');
    expect(group?.title).toBe('Second');
    expect(group?.members).toEqual(['a.h::variable::a', 'a.h::variable::b', 'a.h::variable::c', 'b.h::variable::d']);
    expect(group?.files).toEqual(['a.h', 'b.h']);
  });

  it('maps example files to the declarations that use them', () => {
    const ex = indexOf({ 'a.h': '/** Run.\n \\example demo.c Basic use. */\nvoid run(void);' });
    const run = ex.declarations().find(d => d.name === 'run');
    expect(run && ex.examplesOf(run)).toEqual(['demo.c']);
    expect(ex.usersOfExample('demo.c').map(d => d.name)).toEqual(['run']);
  });
});
