import { diagnostic } from '../model/diagnostic.js';
import type { Diagnostic } from '../model/diagnostic.js';
import type {
  BlockNode,
  BlockTag,
  CodeBlock,
  GroupMode,
  InlineNode,
  LinkNode,
  List,
  ParamDirection,
  Table,
} from '../model/document.js';
import { normalizeQuotes } from '../utils/text.js';
import { isTargetCommand, startsBlock } from './commands.js';
import { inlineContext, parseInline, symbolTarget } from './inline.js';
import type { InlineContext } from './inline.js';

export interface ParsedComment {
  document: BlockNode[];
  /** Lines are relative to the comment body, starting at 1. */
  diagnostics: Diagnostic[];
}

interface Line {
  text: string;
  /** 1-based line within the comment body. */
  number: number;
}

/** A block whose body keeps collecting lines until a blank line or the next block. */
interface Pending {
  lines: string[];
  line: number;
  build: (children: InlineNode[], raw: string) => BlockNode[];
}

const COMMAND_AT_START = /^[\\@]([A-Za-z]+|[{}])(?:\[([^\]]*)\])?(?=\s|$|[^A-Za-z])/;
const TABLE_SEPARATOR = /^\|?\s*:?-{3,}:?\s*(?:\|\s*:?-{3,}:?\s*)*\|?$/;
const LIST_ITEM = /^(?:([-*+])|(\d+)[.)])\s+(.*)$/;
const LIST_COMMAND = /^[\\@](?:arg|li)\s+(.*)$/;
const CODE_OPENER = /^[\\@](code|verbatim)(\{[^}]*\})?|^(```|~~~)\s*\{?\.?([\w+-]*)\}?\s*$/;

export function parseComment(raw: string): ParsedComment {
  return new BlockParser(raw).parse();
}

class BlockParser {
  private readonly lines: Line[];
  private readonly out: BlockNode[] = [];
  private readonly diagnostics: Diagnostic[] = [];
  private readonly reported = new Set<string>();
  private pending: Pending | null = null;
  private index = 0;

  constructor(raw: string) {
    this.lines = raw.split('\n').map((text, i) => ({ text: text.replace(/\r$/, ''), number: i + 1 }));
  }

  parse(): ParsedComment {
    while (this.index < this.lines.length) {
      const line = this.lines[this.index];
      const trimmed = line.text.trim();

      if (trimmed === '') {
        this.flush();
        this.index++;
        continue;
      }

      const code = CODE_OPENER.exec(trimmed);
      if (code) {
        this.flush();
        this.readCode(code, line);
        continue;
      }

      if (trimmed.startsWith('|') && this.isTableStart()) {
        this.flush();
        this.readTable();
        continue;
      }

      if (LIST_ITEM.test(trimmed) || LIST_COMMAND.test(trimmed)) {
        this.flush();
        this.readList();
        continue;
      }

      this.splitMidLine(line);
      const current = line.text.trim();
      const command = blockCommandAt(current);
      if (command) {
        this.flush();
        this.index++;
        this.handleCommand(command[1], command[2], current.slice(command[0].length).trim(), line.number);
        continue;
      }

      if (this.pending) {
        this.pending.lines.push(current);
      } else {
        this.pending = { lines: [current], line: line.number, build: children => paragraph(children) };
      }
      this.index++;
    }
    this.flush();
    return { document: this.out, diagnostics: this.diagnostics };
  }

  private context(line: number): InlineContext {
    const ctx = inlineContext(line);
    ctx.reported = this.reported;
    ctx.diagnostics = this.diagnostics;
    return ctx;
  }

  private inline(text: string, line: number): InlineNode[] {
    return parseInline(text, this.context(line));
  }

  private flush(): void {
    if (!this.pending) return;
    const { lines, line, build } = this.pending;
    this.pending = null;
    const raw = lines.join('\n');
    this.out.push(...build(this.inline(raw, line), raw));
  }

  /** Move a block command found after other text onto a line of its own. */
  private splitMidLine(line: Line): void {
    const text = line.text;
    const pattern = /(\s)([\\@])([A-Za-z]+|[{}])/g;
    for (const match of text.matchAll(pattern)) {
      const at = match.index ?? 0;
      const before = text.slice(0, at);
      if (before.trim() === '' || (before.split('`').length - 1) % 2 === 1) continue;
      const name = match[3];
      if (!startsBlock(name) || (match[2] === '\\' && (name === '{' || name === '}'))) continue;
      line.text = text.slice(0, at);
      this.lines.splice(this.index + 1, 0, { text: text.slice(at + 1), number: line.number });
      return;
    }
  }

  private handleCommand(name: string, option: string | undefined, rest: string, line: number): void {
    switch (name) {
      case 'brief':
      case 'short': {
        // Without same-line text the brief is the next line alone.
        const source = rest ? { text: rest, number: line } : this.takeTextLine();
        if (source) this.out.push({ type: 'tag', tag: 'brief', children: this.inline(source.text.trim(), source.number) });
        return;
      }
      case 'details':
        this.open(line, rest ? [rest] : [], children => paragraph(children));
        return;
      case 'param':
      case 'tparam': {
        const match = /^(\S+)\s*([\s\S]*)$/.exec(rest);
        const names = (match?.[1] ?? '').split(',').filter(n => n.length > 0);
        const direction = parseDirection(option);
        this.open(line, match?.[2] ? [match[2]] : [], children => {
          const tag: Extract<BlockTag, { tag: 'param' }> = { type: 'tag', tag: 'param', names, children };
          if (direction) tag.direction = direction;
          return [tag];
        });
        return;
      }
      case 'retval': {
        const match = /^(\S+)\s*([\s\S]*)$/.exec(rest);
        const value = normalizeQuotes(match?.[1] ?? '');
        this.open(line, match?.[2] ? [match[2]] : [], children => [{ type: 'tag', tag: 'retval', value, children }]);
        return;
      }
      case 'return':
      case 'returns':
      case 'result':
        this.open(line, rest ? [rest] : [], children => [{ type: 'tag', tag: 'return', children }]);
        return;
      case 'since':
      case 'bug':
      case 'deprecated': {
        const tag = name;
        this.open(line, rest ? [rest] : [], children => [{ type: 'tag', tag, children }]);
        return;
      }
      case 'author':
      case 'authors':
        if (rest.includes(',')) {
          for (const author of rest.split(',').map(a => a.trim()).filter(a => a.length > 0)) {
            this.out.push({ type: 'tag', tag: 'author', children: this.inline(author, line) });
          }
          return;
        }
        this.open(line, rest ? [rest] : [], children => [{ type: 'tag', tag: 'author', children }]);
        return;
      case 'note':
      case 'warning':
      case 'attention': {
        const kind = name;
        this.open(line, rest ? [rest] : [], children => [{ type: 'admonition', kind, children }]);
        return;
      }
      case 'sa':
      case 'see':
        this.open(line, rest ? [rest] : [], (_children, raw) => [{ type: 'tag', tag: 'see', links: parseSeeAlso(raw) }]);
        return;
      case 'example': {
        const match = /^(\S+)\s*([\s\S]*)$/.exec(rest);
        const file = match?.[1] ?? '';
        this.open(line, match?.[2] ? [match[2]] : [], children => [{ type: 'tag', tag: 'example', file, children }]);
        return;
      }
      case 'par': {
        const title = normalizeQuotes(rest);
        this.open(line, [], children => [{ type: 'tag', tag: 'par', title, children }]);
        return;
      }
      case 'file': {
        const fileName = rest.split(/\s+/)[0];
        this.out.push(fileName ? { type: 'tag', tag: 'file', name: fileName } : { type: 'tag', tag: 'file' });
        return;
      }
      case 'defgroup':
      case 'addtogroup':
      case 'weakgroup': {
        const mode: GroupMode = name === 'defgroup' ? 'define' : name === 'addtogroup' ? 'add' : 'weak';
        const match = /^(\S+)\s*(.*)$/.exec(rest);
        if (!match) {
          this.diagnostics.push(diagnostic('warning', 'unbalanced-group', `\\${name} without a group name`, { line }));
          return;
        }
        this.out.push({ type: 'tag', tag: 'group', mode, name: match[1], title: normalizeQuotes(match[2].trim()) });
        return;
      }
      case 'ingroup':
        this.out.push({ type: 'tag', tag: 'ingroup', names: rest.split(/[\s,]+/).filter(n => n.length > 0) });
        return;
      case 'name':
        this.out.push({ type: 'tag', tag: 'section', title: normalizeQuotes(rest) });
        return;
      case '{':
        this.out.push({ type: 'tag', tag: 'open' });
        this.requeue(rest, line);
        return;
      case '}':
        this.out.push({ type: 'tag', tag: 'close' });
        this.requeue(rest, line);
        return;
      default:
        if (isTargetCommand(name)) {
          this.out.push({ type: 'tag', tag: 'target', command: name, name: targetName(name, rest) });
        }
    }
  }

  private open(line: number, lines: string[], build: Pending['build']): void {
    this.pending = { lines, line, build };
  }

  /** Consume the next non-blank line unless it starts a block of its own. */
  private takeTextLine(): Line | null {
    let at = this.index;
    while (at < this.lines.length && this.lines[at].text.trim() === '') at++;
    const line = this.lines[at];
    if (!line) return null;
    const trimmed = line.text.trim();
    if (CODE_OPENER.test(trimmed) || LIST_ITEM.test(trimmed) || trimmed.startsWith('|') || blockCommandAt(trimmed)) {
      return null;
    }
    this.index = at;
    this.splitMidLine(line);
    this.index = at + 1;
    return line;
  }

  private requeue(rest: string, line: number): void {
    if (rest) this.lines.splice(this.index, 0, { text: rest, number: line });
  }

  private readCode(match: RegExpExecArray, start: Line): void {
    const fence = match[3];
    const language = fence ? match[4] : match[2]?.replace(/^\{\.?|\}$/g, '');
    const end = fence ?? (match[1] === 'code' ? 'endcode' : 'endverbatim');
    const isEnd = (text: string) => (fence ? text.trim().startsWith(fence) : new RegExp(`[\\\\@]${end}\\b`).test(text));

    const body: string[] = [];
    let closed = false;
    this.index++;
    while (this.index < this.lines.length) {
      const text = this.lines[this.index].text;
      this.index++;
      if (isEnd(text)) {
        if (!fence) {
          const before = text.slice(0, text.search(new RegExp(`[\\\\@]${end}\\b`)));
          if (before.trim()) body.push(before);
        }
        closed = true;
        break;
      }
      body.push(text);
    }
    if (!closed) {
      this.diagnostics.push(
        diagnostic('warning', 'unterminated-code', 'Code block is not closed before the end of the comment', {
          line: start.number,
        }),
      );
    }

    const block: CodeBlock = { type: 'code', lines: dedent(body) };
    if (language) block.language = language;
    this.out.push(block);
  }

  private isTableStart(): boolean {
    const next = this.lines[this.index + 1];
    return next !== undefined && TABLE_SEPARATOR.test(next.text.trim());
  }

  private readTable(): void {
    const headerLine = this.lines[this.index];
    const header = splitRow(headerLine.text.trim());
    const columns = splitRow(this.lines[this.index + 1].text.trim()).length;
    this.index += 2;

    const rows: string[][] = [];
    while (this.index < this.lines.length && this.lines[this.index].text.trim().startsWith('|')) {
      const line = this.lines[this.index];
      const cells = splitRow(line.text.trim());
      if (cells.length > columns) {
        this.diagnostics.push(
          diagnostic('warning', 'malformed-table', `Table row has ${cells.length} cells, expected ${columns}`, {
            line: line.number,
          }),
        );
      }
      rows.push(cells);
      this.index++;
    }

    const fit = (cells: string[], line: number) =>
      Array.from({ length: columns }, (_, i) => this.inline(cells[i] ?? '', line));
    const table: Table = {
      type: 'table',
      columns,
      header: fit(header, headerLine.number),
      rows: rows.map(cells => fit(cells, headerLine.number)),
    };
    this.out.push(table);
  }

  private readList(): void {
    const items: { text: string[]; line: number }[] = [];
    let ordered: boolean | undefined;

    while (this.index < this.lines.length) {
      const line = this.lines[this.index];
      const trimmed = line.text.trim();
      if (trimmed === '') break;

      const item = LIST_ITEM.exec(trimmed);
      const command = LIST_COMMAND.exec(trimmed);
      if (item || command) {
        if (ordered === undefined) ordered = item?.[2] !== undefined;
        items.push({ text: [item ? item[3] : command?.[1] ?? ''], line: line.number });
        this.index++;
        continue;
      }
      if (blockCommandAt(trimmed) || CODE_OPENER.test(trimmed) || trimmed.startsWith('|')) break;
      items[items.length - 1]?.text.push(trimmed);
      this.index++;
    }

    const list: List = {
      type: 'list',
      ordered: ordered ?? false,
      items: items.map(item => this.inline(item.text.join('\n'), item.line)),
    };
    this.out.push(list);
  }
}

/** A block command at the start of `text`; `\{` and `\}` are escapes, not scope markers. */
function blockCommandAt(text: string): RegExpExecArray | null {
  const command = COMMAND_AT_START.exec(text);
  if (!command || !startsBlock(command[1])) return null;
  if (text.startsWith('\\') && (command[1] === '{' || command[1] === '}')) return null;
  return command;
}

function paragraph(children: InlineNode[]): BlockNode[] {
  return children.length > 0 ? [{ type: 'paragraph', children }] : [];
}

function parseDirection(option: string | undefined): ParamDirection | undefined {
  if (!option) return undefined;
  const normalized = option.replace(/\s+/g, '').toLowerCase();
  if (normalized === 'in') return 'in';
  if (normalized === 'out') return 'out';
  if (normalized === 'in,out' || normalized === 'inout' || normalized === 'out,in') return 'inout';
  return undefined;
}

/** Split a `|`-delimited row, honouring `\|` escapes. Cells keep their escapes for the inline parser. */
export function splitRow(row: string): string[] {
  const cells: string[] = [];
  let current = '';
  for (let i = 0; i < row.length; i++) {
    const ch = row[i];
    if (ch === '\\' && i + 1 < row.length) {
      current += ch + row[i + 1];
      i++;
    } else if (ch === '|') {
      cells.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  cells.push(current);
  if (row.startsWith('|')) cells.shift();
  if (row.endsWith('|') && !row.endsWith('\\|')) cells.pop();
  return cells.map(cell => cell.trim());
}

export function dedent(lines: string[]): string[] {
  const indents = lines.filter(line => line.trim().length > 0).map(line => /^[ \t]*/.exec(line)?.[0].length ?? 0);
  const common = indents.length > 0 ? Math.min(...indents) : 0;
  return lines.map(line => (line.trim().length === 0 ? '' : line.slice(common).trimEnd()));
}

/** `\sa` arguments: symbol names, `#Symbol`, `name()`, `Parent::member` or URLs. */
export function parseSeeAlso(raw: string): LinkNode[] {
  const links: LinkNode[] = [];
  for (const token of raw.split(/[\s,]+/)) {
    const cleaned = token.replace(/[.;:]+$/, '');
    if (/^(?:https?|ftp):\/\//.test(cleaned)) {
      links.push({ type: 'link', target: { kind: 'url', url: cleaned }, text: cleaned, custom: false, origin: 'see', styles: [] });
      continue;
    }
    const symbol = /^#?([A-Za-z_]\w*(?:(?:::|\.)[A-Za-z_]\w*)?)(?:\(\))?$/.exec(cleaned);
    if (!symbol) continue;
    links.push({ type: 'link', target: symbolTarget(symbol[1]), text: symbol[1], custom: false, origin: 'see', styles: [] });
  }
  return links;
}

function targetName(command: string, rest: string): string {
  const text = rest.trim();
  if (command === 'fn') {
    const before = text.includes('(') ? text.slice(0, text.indexOf('(')) : text;
    return /([A-Za-z_]\w*(?:::[A-Za-z_]\w*)?)\s*$/.exec(before)?.[1] ?? text;
  }
  if (command === 'var' || command === 'typedef') {
    const cleaned = text.replace(/\[[^\]]*\]\s*$/, '').replace(/;$/, '');
    return /([A-Za-z_]\w*(?:::[A-Za-z_]\w*)?)\s*$/.exec(cleaned)?.[1] ?? text;
  }
  return text.split(/\s+/)[0] ?? '';
}
