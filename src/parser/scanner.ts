import { diagnostic } from '../model/diagnostic.js';
import type { Diagnostic } from '../model/diagnostic.js';

export interface RawComment {
  /** Body with delimiters and leading `*` decoration removed. */
  raw: string;
  startLine: number;
  endLine: number;
  style: 'block' | 'line';
  trailing: boolean;
}

export interface RawDeclaration {
  text: string;
  startLine: number;
  endLine: number;
}

export interface ScannedBlock {
  comment: RawComment | null;
  declaration: RawDeclaration | null;
}

export interface ScanOptions {
  /** Character ending a declaration at depth 0: `;` for files and records, `,` for enum bodies. */
  terminator?: ';' | ',';
  /** Added to every reported line number; used when scanning a fragment of a larger file. */
  lineOffset?: number;
  file?: string;
}

export interface ScanResult {
  blocks: ScannedBlock[];
  diagnostics: Diagnostic[];
}

type DocOpener = { kind: 'block' | 'line'; trailing: boolean; length: number };

/**
 * Split source text into documentation comments and the declarations they precede.
 * Ordinary comments, preprocessor lines other than `#define`, and `extern "C"` wrappers
 * are skipped. An unterminated comment is reported and scanning resumes at the next
 * documentation comment.
 */
export function scanSource(text: string, options: ScanOptions = {}): ScanResult {
  return new Scanner(text, options).run();
}

class Scanner {
  private readonly lineStarts: number[] = [0];
  private readonly terminator: ';' | ',';
  private readonly lineOffset: number;
  private readonly blocks: ScannedBlock[] = [];
  private readonly diagnostics: Diagnostic[] = [];
  private pending: RawComment | null = null;
  private externDepth = 0;
  private pos = 0;

  constructor(private readonly text: string, private readonly options: ScanOptions) {
    for (let i = 0; i < text.length; i++) {
      if (text[i] === '\n') this.lineStarts.push(i + 1);
    }
    this.terminator = options.terminator ?? ';';
    this.lineOffset = options.lineOffset ?? 0;
  }

  run(): ScanResult {
    const { text } = this;
    while (this.pos < text.length) {
      this.skipWhitespace();
      if (this.pos >= text.length) break;

      const opener = this.docOpenerAt(this.pos);
      if (opener) {
        this.readDocComment(opener);
        continue;
      }
      if (text.startsWith('/*', this.pos)) {
        this.skipBlockComment();
        continue;
      }
      if (text.startsWith('//', this.pos)) {
        this.pos = this.lineEnd(this.pos);
        continue;
      }
      if (text[this.pos] === '#' && this.atLineStart(this.pos)) {
        this.readDirective();
        continue;
      }
      if (this.skipExternBlock()) continue;
      if (text[this.pos] === '}' && this.externDepth > 0) {
        this.externDepth--;
        this.pos++;
        continue;
      }
      this.readDeclaration();
    }
    this.flushPending();
    return { blocks: this.blocks, diagnostics: this.diagnostics };
  }

  private line(offset: number): number {
    let lo = 0;
    let hi = this.lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.lineStarts[mid] <= offset) lo = mid;
      else hi = mid - 1;
    }
    return lo + 1 + this.lineOffset;
  }

  private lineEnd(offset: number): number {
    const nl = this.text.indexOf('\n', offset);
    return nl === -1 ? this.text.length : nl;
  }

  private atLineStart(offset: number): boolean {
    for (let i = offset - 1; i >= 0; i--) {
      const ch = this.text[i];
      if (ch === '\n') return true;
      if (ch !== ' ' && ch !== '\t') return false;
    }
    return true;
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length && /\s/.test(this.text[this.pos])) this.pos++;
  }

  private docOpenerAt(offset: number): DocOpener | null {
    const { text } = this;
    if (text.startsWith('/**', offset) || text.startsWith('/*!', offset)) {
      const next = text[offset + 3];
      if (text.startsWith('/**/', offset)) return null;
      if (next === '<') return { kind: 'block', trailing: true, length: 4 };
      // Banner comments (`/*****`) are not documentation.
      if (text[offset + 2] === '*' && next === '*') return null;
      return { kind: 'block', trailing: false, length: 3 };
    }
    if (text.startsWith('///', offset) || text.startsWith('//!', offset)) {
      if (text.startsWith('////', offset)) return null;
      return { kind: 'line', trailing: text[offset + 3] === '<', length: text[offset + 3] === '<' ? 4 : 3 };
    }
    return null;
  }

  private nextDocOpener(from: number): number {
    const candidates = ['/**', '/*!', '///', '//!']
      .map(marker => this.text.indexOf(marker, from))
      .filter(index => index !== -1);
    return candidates.length > 0 ? Math.min(...candidates) : this.text.length;
  }

  private readDocComment(opener: DocOpener): void {
    const start = this.pos;
    let comment: RawComment;

    if (opener.kind === 'block') {
      const close = this.text.indexOf('*/', start + opener.length);
      if (close === -1) {
        this.diagnostics.push(
          diagnostic('error', 'unterminated-comment', 'Unterminated documentation comment', {
            file: this.options.file,
            line: this.line(start),
          }),
        );
        this.pos = this.nextDocOpener(start + opener.length);
        return;
      }
      comment = {
        raw: stripBlockDecoration(this.text.slice(start + opener.length, close)),
        startLine: this.line(start),
        endLine: this.line(close),
        style: 'block',
        trailing: opener.trailing,
      };
      this.pos = close + 2;
    } else {
      const prefix = this.text.slice(start, start + 3);
      const lines: string[] = [];
      let cursor = start;
      let last = start;
      for (;;) {
        const end = this.lineEnd(cursor);
        const skip = this.text[cursor + 3] === '<' ? 4 : 3;
        lines.push(this.text.slice(cursor + skip, end));
        last = cursor;
        let next = end + 1;
        while (next < this.text.length && (this.text[next] === ' ' || this.text[next] === '\t')) next++;
        if (opener.trailing || !this.text.startsWith(prefix, next) || this.text.startsWith(prefix + '/', next)) {
          this.pos = end;
          break;
        }
        cursor = next;
      }
      comment = {
        raw: lines.join('\n'),
        startLine: this.line(start),
        endLine: this.line(last),
        style: 'line',
        trailing: opener.trailing,
      };
    }

    if (comment.trailing) {
      this.attachTrailing(comment);
      return;
    }
    this.flushPending();
    this.pending = comment;
  }

  private attachTrailing(comment: RawComment): void {
    const previous = this.blocks[this.blocks.length - 1];
    if (previous && previous.declaration && !previous.comment) {
      previous.comment = comment;
    }
  }

  private skipBlockComment(): void {
    const close = this.text.indexOf('*/', this.pos + 2);
    if (close === -1) {
      this.diagnostics.push(
        diagnostic('error', 'unterminated-comment', 'Unterminated comment', {
          file: this.options.file,
          line: this.line(this.pos),
        }),
      );
      this.pos = this.nextDocOpener(this.pos + 2);
      return;
    }
    this.pos = close + 2;
  }

  private readDirective(): void {
    const start = this.pos;
    let end = this.lineEnd(start);
    while (end < this.text.length && this.text[end - 1] === '\\') {
      end = this.lineEnd(end + 1);
    }
    if (end > start && this.text[end - 1] === '\\') end = this.text.length;
    this.pos = end;

    const directive = this.text.slice(start, end);
    if (/^#\s*define\b/.test(directive)) {
      this.emit({
        text: directive.replace(/\\\r?\n/g, ' ').trimEnd(),
        startLine: this.line(start),
        endLine: this.line(Math.max(start, end - 1)),
      });
    } else {
      this.flushPending();
    }
  }

  private skipExternBlock(): boolean {
    const match = /^extern\s+"C(?:\+\+)?"\s*\{/.exec(this.text.slice(this.pos, this.pos + 64));
    if (!match) return false;
    this.pos += match[0].length;
    this.externDepth++;
    return true;
  }

  /**
   * Read up to the terminator at nesting depth 0. A brace block that directly follows a
   * closing parenthesis is a function body: it ends the declaration and is skipped.
   */
  private readDeclaration(): void {
    const { text } = this;
    const start = this.pos;
    let depth = 0;
    let i = start;
    let end = -1;
    let resume = -1;

    while (i < text.length) {
      const ch = text[i];
      if (ch === '"' || ch === "'") {
        i = skipLiteral(text, i);
        continue;
      }
      if (text.startsWith('/*', i)) {
        if (depth === 0 && (text.startsWith('/**<', i) || text.startsWith('/*!<', i))) {
          end = i;
          resume = i;
          break;
        }
        const close = text.indexOf('*/', i + 2);
        i = close === -1 ? text.length : close + 2;
        continue;
      }
      if (text.startsWith('//', i)) {
        if (depth === 0 && (text.startsWith('///<', i) || text.startsWith('//!<', i))) {
          end = i;
          resume = i;
          break;
        }
        i = this.lineEnd(i);
        continue;
      }
      if (ch === '#' && depth === 0 && this.atLineStart(i) && i > start) {
        // A directive interrupting a declaration (e.g. missing semicolon) ends it.
        end = i;
        resume = i;
        break;
      }
      if (ch === '{' || ch === '(' || ch === '[') {
        if (ch === '{' && depth === 0 && this.terminator === ';' && endsWithCloseParen(text.slice(start, i))) {
          end = i;
          resume = skipBalanced(text, i);
          if (text[resume] === ';') resume++;
          break;
        }
        depth++;
      } else if (ch === '}' || ch === ')' || ch === ']') {
        if (depth === 0) {
          // Unbalanced closer: belongs to an enclosing construct.
          end = i;
          resume = i + 1;
          break;
        }
        depth--;
      } else if (ch === this.terminator && depth === 0) {
        end = i;
        resume = i + 1;
        break;
      }
      i++;
    }
    if (end === -1) {
      end = text.length;
      resume = text.length;
    }

    const declText = text.slice(start, end).trim();
    this.pos = resume;
    if (declText.length === 0) {
      if (resume === start) this.pos = start + 1;
      return;
    }
    this.emit({ text: declText, startLine: this.line(start), endLine: this.line(Math.max(start, end - 1)) });
  }

  private emit(declaration: RawDeclaration): void {
    this.blocks.push({ comment: this.pending, declaration });
    this.pending = null;
  }

  private flushPending(): void {
    if (this.pending) {
      this.blocks.push({ comment: this.pending, declaration: null });
      this.pending = null;
    }
  }
}

export function stripBlockDecoration(body: string): string {
  const lines = body.split('\n').map(line => line.replace(/\r$/, ''));
  return lines
    .map((line, index) => {
      if (index === 0) return line;
      const match = /^\s*\*(?!\/)/.exec(line);
      return match ? line.slice(match[0].length) : line;
    })
    .join('\n');
}

function skipLiteral(text: string, start: number): number {
  const quote = text[start];
  let i = start + 1;
  while (i < text.length && text[i] !== quote && text[i] !== '\n') {
    if (text[i] === '\\') i++;
    i++;
  }
  return Math.min(i + 1, text.length);
}

/** Index just past the bracket matching the one at `start`. */
export function skipBalanced(text: string, start: number): number {
  const open = text[start];
  const close = open === '{' ? '}' : open === '(' ? ')' : ']';
  let depth = 0;
  let i = start;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '"' || ch === "'") {
      i = skipLiteral(text, i);
      continue;
    }
    if (text.startsWith('/*', i)) {
      const end = text.indexOf('*/', i + 2);
      i = end === -1 ? text.length : end + 2;
      continue;
    }
    if (text.startsWith('//', i)) {
      const nl = text.indexOf('\n', i);
      i = nl === -1 ? text.length : nl;
      continue;
    }
    if (ch === open) depth++;
    else if (ch === close) {
      depth--;
      if (depth === 0) return i + 1;
    }
    i++;
  }
  return text.length;
}

function endsWithCloseParen(text: string): boolean {
  const stripped = text
    .replace(/\/\*[\s\S]*?\*\//g, ' ')
    .replace(/\/\/[^\n]*/g, ' ')
    .trimEnd();
  return stripped.endsWith(')');
}
