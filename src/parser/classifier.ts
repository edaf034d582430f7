import type { Arity, DeclarationDetails, DeclarationKind, Parameter, RecordKind } from '../model/declaration.js';
import { collapseWhitespace } from '../utils/text.js';
import { indexOfTopLevel, maskSource, matchingBracket, splitTopLevel, stripComments } from './mask.js';
import { scanSource } from './scanner.js';
import type { RawComment } from './scanner.js';

export type ClassifiedKind = Exclude<DeclarationKind, 'group' | 'group-close' | 'file'>;

export interface ClassifiedMember {
  kind: 'field' | 'constant';
  name: string;
  signature: string;
  value?: string;
  comment: RawComment | null;
  line: number;
  record?: { kind: RecordKind; tag?: string };
  members: ClassifiedMember[];
}

export interface Classification {
  kind: ClassifiedKind;
  name: string;
  signature: string;
  details: DeclarationDetails;
  members: ClassifiedMember[];
  /** False for declarations derived from another one in the same text, e.g. the typedef of an inline struct. */
  primary: boolean;
  enclosing?: string;
  /** Comment of a nested record, taken from the field it declares. */
  comment?: RawComment | null;
  line: number;
}

interface Context {
  text: string;
  masked: string;
  startLine: number;
}

const STORAGE = new Set([
  'extern',
  'static',
  'inline',
  '__inline',
  '__inline__',
  '_Noreturn',
  'register',
  '_Thread_local',
  'thread_local',
]);

const TYPE_WORDS = new Set([
  'void',
  'char',
  'short',
  'int',
  'long',
  'float',
  'double',
  'signed',
  'unsigned',
  '_Bool',
  'bool',
  '_Complex',
  'const',
  'volatile',
  'restrict',
  'struct',
  'union',
  'enum',
]);

const RECORD_HEAD = /^(\s*)((?:(?:static|extern|const|volatile|__extension__)\s+)*)(struct|union|enum)\b(?:\s+([A-Za-z_]\w*))?\s*/;

/**
 * Classify one declaration by its shape. The first entry receives the comment that
 * precedes the text; further entries are declarations the text also introduces
 * (typedef names of an inline record, named nested records, extra declarators).
 */
export function classifyDeclaration(text: string, startLine = 1): Classification[] {
  const masked = maskSource(text);
  if (/^\s*#/.test(masked)) return [classifyMacro(text, startLine)];

  const ctx: Context = { text, masked, startLine };
  const typedef = /^\s*typedef\b/.exec(masked);
  if (typedef) return classifyTypedef(ctx, typedef[0].length) ?? [unknown(text, startLine)];

  const records = classifyRecord(ctx);
  if (records) return records;

  const fn = classifyFunction(ctx);
  if (fn) return [fn];

  const variables = classifyVariables(stripComments(text), masked, startLine);
  if (variables.length > 0) return variables;

  return [unknown(text, startLine)];
}

function unknown(text: string, line: number): Classification {
  const words = stripComments(text).match(/[A-Za-z_]\w*/g) ?? [];
  // A record tag names a type, not the declaration.
  const name =
    words.find(
      (word, i) =>
        !TYPE_WORDS.has(word) && !STORAGE.has(word) && word !== 'typedef' && !/^(?:struct|union|enum)$/.test(words[i - 1] ?? ''),
    ) ?? '';
  return {
    kind: 'unknown',
    name,
    signature: text,
    details: { kind: 'none' },
    members: [],
    primary: true,
    line,
  };
}

function classifyMacro(text: string, line: number): Classification {
  const clean = stripComments(text).replace(/\\\r?\n/g, ' ');
  const match = /^\s*#\s*define\s+([A-Za-z_]\w*)(\(([^)]*)\))?([\s\S]*)$/.exec(clean);
  if (!match) return unknown(text, line);

  const [, name, paren, params = '', rest] = match;
  const body = collapseWhitespace(rest);
  if (paren !== undefined) {
    const parameters = params
      .split(',')
      .map(p => p.trim())
      .filter(p => p.length > 0);
    return {
      kind: 'macro',
      name,
      signature: `#define ${name}(${parameters.join(', ')})`,
      details: { kind: 'macro', parameters },
      members: [],
      primary: true,
      line,
    };
  }
  return {
    kind: 'macro',
    name,
    signature: body ? `#define ${name} ${body}` : `#define ${name}`,
    details: { kind: 'macro', initializer: body || undefined },
    members: [],
    primary: true,
    line,
  };
}

// ─── Declarators ────────────────────────────────────────────────────────────

export interface Declarator {
  type: string;
  name?: string;
  suffix: string;
}

/** Join a declarator back into text, without a space after `*` or `(`. */
export function formatDeclarator(d: Declarator): string {
  if (!d.name) return d.type + d.suffix;
  if (!d.type) return d.name + d.suffix;
  const glue = d.type.endsWith('*') || d.type.endsWith('(') ? '' : ' ';
  return `${d.type}${glue}${d.name}${d.suffix}`;
}

/**
 * Split one declarator (comments already removed) into type, name and trailing suffix.
 * Initializers are dropped. A name is only reported when the text carries one:
 * `const char *` and `handle_t` are unnamed.
 */
export function parseDeclarator(source: string): Declarator {
  const masked = maskSource(source);
  const eq = indexOfTopLevel(masked, '=');
  const end = eq === -1 ? masked.length : eq;
  const m = masked.slice(0, end);
  const s = source.slice(0, end);

  const grouped = /\(\s*[*^&]+\s*(?:const\s+|volatile\s+)*([A-Za-z_]\w*)?/.exec(m);
  if (grouped) {
    const open = grouped.index;
    const close = matchingBracket(m, open);
    if (close !== -1) {
      if (grouped[1] === undefined) {
        return { type: collapseWhitespace(s), suffix: '' };
      }
      const nameStart = open + grouped[0].length - grouped[1].length;
      const nameEnd = nameStart + grouped[1].length;
      return {
        type: collapseWhitespace(s.slice(0, nameStart)),
        name: grouped[1],
        suffix: collapseWhitespace(s.slice(nameEnd)),
      };
    }
  }

  let head = m;
  let suffix = '';
  const colon = indexOfTopLevel(head, ':');
  if (colon !== -1) {
    suffix = ' : ' + collapseWhitespace(s.slice(colon + 1));
    head = head.slice(0, colon);
  }
  const arrays = /(?:\s*\[[^\]]*\])+\s*$/.exec(head);
  if (arrays) {
    suffix = collapseWhitespace(s.slice(arrays.index, arrays.index + arrays[0].length)).replace(/\s+/g, '') + suffix;
    head = head.slice(0, arrays.index);
  }

  const last = /([A-Za-z_]\w*)\s*$/.exec(head);
  const typeOnly = { type: collapseWhitespace(s.slice(0, head.length)), suffix };
  if (!last) return typeOnly;

  const prefix = head.slice(0, last.index).trim();
  const candidate = last[1];
  if (!prefix || TYPE_WORDS.has(candidate) || /\b(?:struct|union|enum)$/.test(prefix)) return typeOnly;

  return { type: collapseWhitespace(s.slice(0, last.index)), name: candidate, suffix };
}

/** Split a list of declarators sharing one base type (`int a, *b[2]`). */
function splitDeclarators(source: string): Declarator[] {
  const masked = maskSource(source);
  const parts = splitTopLevel(masked, ',').map(([from, to]) => source.slice(from, to).trim());
  if (parts.length === 0 || parts[0].length === 0) return [];

  const first = parseDeclarator(parts[0]);
  const result = [first];
  const base = first.type.replace(/[\s*]+$/, '').replace(/\s*\($/, '');
  for (const part of parts.slice(1)) {
    if (!part) continue;
    result.push(parseDeclarator(`${base} ${part}`));
  }
  return result;
}

function splitStorage(type: string): { storage: string[]; type: string } {
  const words = type.split(' ');
  const storage: string[] = [];
  while (words.length > 0 && STORAGE.has(words[0])) {
    const word = words.shift();
    if (word) storage.push(word);
  }
  return { storage, type: words.join(' ') };
}

export function parseParameters(source: string): { parameters: Parameter[]; arity: Arity } {
  const masked = maskSource(source);
  const parts = splitTopLevel(masked, ',').map(([from, to]) => collapseWhitespace(source.slice(from, to)));
  if (parts.length === 1 && parts[0] === '') return { parameters: [], arity: 'empty' };
  if (parts.length === 1 && parts[0] === 'void') return { parameters: [], arity: 'void' };

  const parameters = parts.map(part => {
    if (part === '...') return { type: '...', suffix: '' };
    const d = parseDeclarator(part);
    const parameter: Parameter = { type: d.type, suffix: d.suffix };
    if (d.name) parameter.name = d.name;
    return parameter;
  });
  const arity: Arity = parts[parts.length - 1] === '...' ? 'variadic' : 'fixed';
  return { parameters, arity };
}

// ─── Functions and variables ────────────────────────────────────────────────

function classifyFunction(ctx: Context): Classification | null {
  const { masked, text } = ctx;
  const open = indexOfTopLevel(masked, '(');
  if (open === -1) return null;
  const eq = indexOfTopLevel(masked, '=');
  if (eq !== -1 && eq < open) return null;
  if (/^\(\s*[*^&]/.test(masked.slice(open))) return null;

  const before = masked.slice(0, open);
  const nameMatch = /([A-Za-z_]\w*)\s*$/.exec(before);
  if (!nameMatch) return null;
  const prefix = collapseWhitespace(stripComments(text.slice(0, nameMatch.index)));
  if (!prefix) return null;

  const close = matchingBracket(masked, open);
  if (close === -1) return null;
  const after = masked.slice(close + 1).trim();
  if (after.startsWith('(') || after.startsWith('[')) return null;

  const { storage, type: returnType } = splitStorage(prefix);
  if (!returnType) return null;
  const { parameters, arity } = parseParameters(stripComments(text.slice(open + 1, close)));

  return {
    kind: 'function',
    name: nameMatch[1],
    signature: collapseWhitespace(stripComments(text.slice(0, close + 1))),
    details: { kind: 'function', returnType, parameters, arity, storage },
    members: [],
    primary: true,
    line: ctx.startLine,
  };
}

function classifyVariables(source: string, masked: string, line: number): Classification[] {
  // Braces may only appear inside an initializer.
  const heads = splitTopLevel(masked, ',').map(([from, to]) => {
    const part = masked.slice(from, to);
    const eq = indexOfTopLevel(part, '=');
    return eq === -1 ? part : part.slice(0, eq);
  });
  if (heads.some(head => /[{}]/.test(head))) return [];
  const declarators = splitDeclarators(source);
  if (declarators.length === 0 || declarators.some(d => !d.name || !d.type)) return [];

  return declarators.map((d, index) => {
    const { storage, type } = splitStorage(d.type);
    const name = d.name ?? '';
    const declarator = { type, name, suffix: d.suffix };
    return {
      kind: 'variable' as const,
      name,
      signature: collapseWhitespace([...storage, formatDeclarator(declarator)].join(' ')),
      details: { kind: 'variable' as const, type, suffix: d.suffix, storage },
      members: [],
      primary: index === 0,
      line,
    };
  });
}

// ─── Records ────────────────────────────────────────────────────────────────

interface RecordShape {
  qualifiers: string;
  kind: RecordKind;
  tag?: string;
  /** Offsets of the braces in the text, when the record has a body. */
  body?: { open: number; close: number };
  /** Offset just past the record head or body. */
  end: number;
}

function recordShape(masked: string, offset: number): RecordShape | null {
  const head = RECORD_HEAD.exec(masked.slice(offset));
  if (!head) return null;
  const [whole, , qualifiers, kindWord, tag] = head;
  const kind = kindWord === 'struct' ? 'struct' : kindWord === 'union' ? 'union' : 'enum';
  const afterHead = offset + whole.length;

  if (masked[afterHead] === '{') {
    const close = matchingBracket(masked, afterHead);
    const end = close === -1 ? masked.length : close;
    return { qualifiers: collapseWhitespace(qualifiers), kind, tag, body: { open: afterHead, close: end }, end: end + 1 };
  }
  return { qualifiers: collapseWhitespace(qualifiers), kind, tag, end: afterHead };
}

function lineAt(text: string, offset: number, startLine: number): number {
  let line = startLine;
  for (let i = 0; i < offset && i < text.length; i++) {
    if (text[i] === '\n') line++;
  }
  return line;
}

function classifyRecord(ctx: Context): Classification[] | null {
  const shape = recordShape(ctx.masked, 0);
  if (!shape) return null;
  const rest = ctx.masked.slice(shape.end).trim();

  // `struct Foo *make_foo(void)` and `struct Foo *ptr` are not record declarations.
  if (!shape.body && rest.length > 0) return null;
  if (!shape.body) {
    if (!shape.tag) return null;
    return [
      {
        kind: shape.kind,
        name: shape.tag,
        signature: `${shape.kind} ${shape.tag}`,
        details: { kind: 'record', record: shape.kind, tag: shape.tag, aliases: [], hasBody: false },
        members: [],
        primary: true,
        line: ctx.startLine,
      },
    ];
  }

  const name = shape.tag ?? '';
  const { members, nested } = parseBody(ctx, shape, name);
  const record: Classification = {
    kind: shape.kind,
    name,
    signature: name ? `${shape.kind} ${name}` : shape.kind,
    details: { kind: 'record', record: shape.kind, tag: shape.tag, aliases: [], hasBody: true },
    members,
    primary: true,
    line: ctx.startLine,
  };

  const result = [record, ...nested];
  if (rest.length > 0) {
    const source = `${shape.qualifiers} ${shape.kind}${name ? ' ' + name : ''} ${stripComments(ctx.text.slice(shape.end))}`;
    result.push(...classifyVariables(source, maskSource(source), ctx.startLine).map(v => ({ ...v, primary: false })));
  }
  return result;
}

function classifyTypedef(ctx: Context, offset: number): Classification[] | null {
  const shape = recordShape(ctx.masked, offset);
  if (shape && shape.body) return classifyInlineTypedef(ctx, shape);

  const source = stripComments(ctx.text.slice(offset));
  const declarators = splitDeclarators(source);
  if (declarators.length === 0 || declarators.some(d => !d.name)) return null;

  return declarators.map((d, index) => {
    const target = /^(?:(?:const|volatile)\s+)*(struct|union|enum)\s+([A-Za-z_]\w*)[\s*]*$/.exec(d.type);
    const details: Extract<DeclarationDetails, { kind: 'typedef' }> = { kind: 'typedef', type: d.type, suffix: d.suffix };
    if (target) {
      details.target = { record: target[1] === 'struct' ? 'struct' : target[1] === 'union' ? 'union' : 'enum', tag: target[2] };
    }
    const params = functionPointerParameters(d.suffix);
    if (params) details.parameters = params;
    return {
      kind: 'typedef' as const,
      name: d.name ?? '',
      signature: `typedef ${formatDeclarator(d)}`,
      details,
      members: [],
      primary: index === 0,
      line: ctx.startLine,
    };
  });
}

function functionPointerParameters(suffix: string): Parameter[] | undefined {
  const masked = maskSource(suffix);
  const open = masked.indexOf('(');
  if (!suffix.startsWith(')') || open === -1) return undefined;
  const close = matchingBracket(masked, open);
  if (close === -1) return undefined;
  return parseParameters(suffix.slice(open + 1, close)).parameters;
}

function classifyInlineTypedef(ctx: Context, shape: RecordShape): Classification[] {
  const tail = stripComments(ctx.text.slice(shape.end));
  const parts = splitTopLevel(maskSource(tail), ',')
    .map(([from, to]) => collapseWhitespace(tail.slice(from, to)))
    .filter(part => part.length > 0);
  const plain = parts.filter(part => /^[A-Za-z_]\w*$/.test(part));
  const name = shape.tag ?? plain[0] ?? '';

  const aliases: string[] = [];
  const typedefs: Classification[] = [];
  for (const part of parts) {
    const isPlain = /^[A-Za-z_]\w*$/.test(part);
    if (isPlain && (part === shape.tag || (!shape.tag && part === name))) {
      aliases.push(part);
      continue;
    }
    const d = parseDeclarator(`${shape.kind} ${name} ${part}`);
    if (!d.name) continue;
    typedefs.push({
      kind: 'typedef',
      name: d.name,
      signature: `typedef ${formatDeclarator(d)}`,
      details: { kind: 'typedef', type: d.type, suffix: d.suffix, target: { record: shape.kind, tag: name } },
      members: [],
      primary: false,
      line: ctx.startLine,
    });
  }

  const { members, nested } = parseBody(ctx, shape, name);
  const record: Classification = {
    kind: shape.kind,
    name,
    signature: name ? `${shape.kind} ${name}` : shape.kind,
    details: { kind: 'record', record: shape.kind, tag: shape.tag, aliases, hasBody: true },
    members,
    primary: true,
    line: ctx.startLine,
  };
  return [record, ...typedefs, ...nested];
}

function parseBody(
  ctx: Context,
  shape: RecordShape,
  enclosing: string,
): { members: ClassifiedMember[]; nested: Classification[] } {
  if (!shape.body) return { members: [], nested: [] };
  const body = ctx.text.slice(shape.body.open + 1, shape.body.close);
  const lineOffset = lineAt(ctx.text, shape.body.open, ctx.startLine) - 1;
  return shape.kind === 'enum'
    ? { members: parseEnumBody(body, lineOffset), nested: [] }
    : parseRecordBody(body, lineOffset, enclosing);
}

function parseEnumBody(body: string, lineOffset: number): ClassifiedMember[] {
  const { blocks } = scanSource(body, { terminator: ',', lineOffset });
  const members: ClassifiedMember[] = [];
  for (const block of blocks) {
    if (!block.declaration) continue;
    const text = collapseWhitespace(stripComments(block.declaration.text));
    const match = /^([A-Za-z_]\w*)(?:\s*=\s*([\s\S]+))?$/.exec(text);
    if (!match) continue;
    const member: ClassifiedMember = {
      kind: 'constant',
      name: match[1],
      signature: text,
      comment: block.comment,
      line: block.declaration.startLine,
      members: [],
    };
    if (match[2] !== undefined) member.value = match[2];
    members.push(member);
  }
  return members;
}

function parseRecordBody(
  body: string,
  lineOffset: number,
  enclosing: string,
): { members: ClassifiedMember[]; nested: Classification[] } {
  const { blocks } = scanSource(body, { terminator: ';', lineOffset });
  const members: ClassifiedMember[] = [];
  const nested: Classification[] = [];

  for (const block of blocks) {
    if (!block.declaration) continue;
    const { text, startLine } = block.declaration;
    const ctx: Context = { text, masked: maskSource(text), startLine };
    const shape = recordShape(ctx.masked, 0);

    if (shape && shape.body) {
      const inner = parseBody(ctx, shape, shape.tag ?? enclosing);
      const tail = stripComments(text.slice(shape.end));
      const names = splitTopLevel(maskSource(tail), ',')
        .map(([from, to]) => collapseWhitespace(tail.slice(from, to)))
        .filter(part => part.length > 0);
      const head = collapseWhitespace(`${shape.qualifiers} ${shape.kind}${shape.tag ? ' ' + shape.tag : ''}`);
      const record = { kind: shape.kind, tag: shape.tag };

      for (const name of names.length > 0 ? names : ['']) {
        members.push({
          kind: 'field',
          name: name.replace(/^[*\s]+/, ''),
          signature: head,
          comment: block.comment,
          line: startLine,
          record,
          members: inner.members,
        });
      }
      if (shape.tag) {
        nested.push({
          kind: shape.kind,
          name: shape.tag,
          signature: `${shape.kind} ${shape.tag}`,
          details: { kind: 'record', record: shape.kind, tag: shape.tag, aliases: [], hasBody: true },
          members: inner.members,
          primary: false,
          enclosing,
          comment: block.comment,
          line: startLine,
        });
      }
      nested.push(...inner.nested);
      continue;
    }

    for (const d of splitDeclarators(stripComments(text))) {
      if (!d.name) continue;
      members.push({
        kind: 'field',
        name: d.name,
        signature: formatDeclarator(d),
        comment: block.comment,
        line: startLine,
        members: [],
      });
    }
  }
  return { members, nested };
}
