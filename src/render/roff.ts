import { segment } from './sentence.js';

/**
 * - `text`: escaped inline roff. Neighbouring text entries are joined and written one
 *   sentence per line.
 * - `literal`: one verbatim line of a code block, escaped on output.
 * - `raw`: a line written exactly as given (tbl format lines, table rows).
 */
export type RoffEntry =
  | { type: 'text'; content: string }
  | { type: 'literal'; content: string }
  | { type: 'raw'; content: string }
  | { type: 'macro'; name: string; argument?: string };

// Paragraph macros that already start a new paragraph, making a following .PP redundant.
const PARAGRAPH_STARTS = new Set(['SH', 'SS', 'TP', 'PP', 'IP']);
const URL_PUNCTUATION = /^[.,!?;:]+/;

export function escapeText(text: string): string {
  return text.replace(/\\/g, '\\e');
}

/** Keep a line from being read as a control line or losing its first character. */
export function guardLine(line: string): string {
  return /^[.'"]/.test(line) || line.startsWith('\\e') ? `\\&${line}` : line;
}

export function escapeLiteral(line: string): string {
  return guardLine(escapeText(line));
}

export function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\[ba]');
}

/** Quote a macro argument that contains spaces. */
export function quoteArgument(text: string): string {
  const escaped = escapeText(text).replace(/"/g, '\\(dq');
  return /\s/.test(escaped) || escaped === '' ? `"${escaped}"` : escaped;
}

/** Recover the source lines of every `.EX`/`.EE` block of a rendered page. */
export function readLiteralLines(page: string): string[][] {
  const blocks: string[][] = [];
  let current: string[] | null = null;
  for (const line of page.split('\n')) {
    if (line === '.EX') {
      current = [];
    } else if (line === '.EE') {
      if (current) blocks.push(current);
      current = null;
    } else if (current) {
      const unguarded = line.startsWith('\\&') ? line.slice(2) : line;
      current.push(unguarded.replace(/\\e/g, '\\'));
    }
  }
  return blocks;
}

export class Roff {
  private entries: RoffEntry[] = [];

  get length(): number {
    return this.entries.length;
  }

  isEmpty(): boolean {
    return this.entries.every(entry => entry.type === 'text' && entry.content.trim() === '');
  }

  text(content: string): this {
    this.entries.push({ type: 'text', content });
    return this;
  }

  literal(content: string): this {
    this.entries.push({ type: 'literal', content });
    return this;
  }

  raw(content: string): this {
    this.entries.push({ type: 'raw', content });
    return this;
  }

  macro(name: string, argument?: string): this {
    this.entries.push(argument === undefined ? { type: 'macro', name } : { type: 'macro', name, argument });
    return this;
  }

  append(other: Roff): this {
    this.entries.push(...other.entries.map(entry => ({ ...entry })));
    return this;
  }

  /** Copy with every `.from` macro renamed to `.to`; used to indent paragraphs under `.TP`. */
  renameMacro(from: string, to: string): Roff {
    const copy = new Roff();
    copy.entries = this.entries.map(entry =>
      entry.type === 'macro' && entry.name === from ? { ...entry, name: to } : { ...entry },
    );
    return copy;
  }

  private simplify(): RoffEntry[] {
    const kept: RoffEntry[] = [];
    for (const entry of this.entries) {
      if (entry.type === 'text' && entry.content.trim() === '') continue;
      const prev = kept[kept.length - 1];
      if (entry.type === 'macro' && entry.name === 'PP') {
        if (prev === undefined) continue;
        if (prev.type === 'macro' && PARAGRAPH_STARTS.has(prev.name)) continue;
      }
      kept.push({ ...entry });
    }

    for (let i = 1; i < kept.length; i++) {
      const prev = kept[i - 1];
      const entry = kept[i];
      if (prev.type !== 'macro' || prev.name !== 'UE' || entry.type !== 'text') continue;
      const punctuation = URL_PUNCTUATION.exec(entry.content)?.[0];
      if (!punctuation) continue;
      prev.argument = (prev.argument ?? '') + punctuation;
      entry.content = entry.content.slice(punctuation.length);
    }

    while (kept.length > 0) {
      const last = kept[kept.length - 1];
      if (last.type !== 'macro' || last.name !== 'PP') break;
      kept.pop();
    }
    return kept.filter(entry => entry.type !== 'text' || entry.content.trim() !== '');
  }

  toString(): string {
    const lines: string[] = [];
    let blob = '';
    const flush = (): void => {
      if (blob.trim() === '') {
        blob = '';
        return;
      }
      for (const sentence of segment(blob.replace(/\s*\n\s*/g, ' '))) lines.push(guardLine(sentence));
      blob = '';
    };

    for (const entry of this.simplify()) {
      switch (entry.type) {
        case 'text':
          blob += entry.content;
          break;
        case 'literal':
          flush();
          lines.push(escapeLiteral(entry.content));
          break;
        case 'raw':
          flush();
          lines.push(entry.content);
          break;
        case 'macro':
          flush();
          lines.push(entry.argument === undefined ? `.${entry.name}` : `.${entry.name} ${entry.argument}`);
          break;
      }
    }
    flush();
    return lines.join('\n');
  }
}
