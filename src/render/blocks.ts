import type { Admonition, AdmonitionKind, BlockNode, CodeBlock, List, Table } from '../model/document.js';
import { inlineText, renderInline } from './inline.js';
import type { InlineContext } from './inline.js';
import { Roff, escapeCell, escapeText, guardLine } from './roff.js';

const ADMONITION_LABELS: Record<AdmonitionKind, string> = {
  note: 'Note',
  warning: 'Warning',
  attention: 'Attention',
};

export function renderCode(block: CodeBlock): Roff {
  const roff = new Roff().macro('PP').macro('in', '+4n').macro('EX');
  for (const line of block.lines) roff.literal(line);
  return roff.macro('EE').macro('in');
}

/** A row of T{ T} text blocks; each `T}` but the last is followed by the column separator. */
function tableRow(cells: readonly string[]): string[] {
  const lines: string[] = [];
  cells.forEach((content, index) => {
    if (index === 0) lines.push('T{');
    else lines[lines.length - 1] += '|T{';
    lines.push(content === '' ? '\\&' : guardLine(content), 'T}');
  });
  return lines;
}

export function renderTable(table: Table, ctx: InlineContext): Roff {
  const roff = new Roff().macro('TS');
  roff.raw('allbox tab(|);');
  roff.raw(`${Array.from({ length: table.columns }, () => 'l').join(' ')}.`);
  roff.raw(table.header.map(nodes => `\\f[B]${escapeCell(inlineText(nodes, ctx))}\\f[R]`).join('|'));
  for (const row of table.rows) {
    for (const line of tableRow(row.map(nodes => escapeCell(inlineText(nodes, ctx))))) roff.raw(line);
  }
  return roff.macro('TE');
}

export function renderList(list: List, ctx: InlineContext): Roff {
  const roff = new Roff().macro('RS');
  list.items.forEach((item, index) => {
    if (list.ordered) {
      const number = index + 1;
      roff.macro('IP', `${number}. ${String(number).length + 2}`);
    } else {
      roff.macro('IP', '\\[bu] 2');
    }
    roff.append(renderInline(item, ctx));
  });
  return roff.macro('RE');
}

export function renderAdmonition(admonition: Admonition, ctx: InlineContext): Roff {
  return new Roff()
    .text(`\\f[B]${ADMONITION_LABELS[admonition.kind]}:\\f[R] `)
    .append(renderInline(admonition.children, ctx));
}

/** Description blocks separated by paragraph breaks. Tags other than `\par` are skipped. */
export function renderBlocks(blocks: readonly BlockNode[], ctx: InlineContext): Roff {
  const roff = new Roff();
  let first = true;
  const paragraph = (): Roff => {
    if (!first) roff.macro('PP');
    first = false;
    return roff;
  };

  for (const block of blocks) {
    switch (block.type) {
      case 'paragraph':
        paragraph().append(renderInline(block.children, ctx));
        break;
      case 'code':
        first = false;
        roff.append(renderCode(block));
        break;
      case 'table':
        paragraph().append(renderTable(block, ctx));
        break;
      case 'list':
        paragraph().append(renderList(block, ctx));
        break;
      case 'admonition':
        paragraph().append(renderAdmonition(block, ctx));
        break;
      case 'tag':
        if (block.tag === 'par') {
          paragraph();
          if (block.title) roff.text(`\\f[B]${escapeText(block.title)}\\f[R]`).macro('br');
          roff.append(renderInline(block.children, ctx));
        }
        break;
    }
  }
  return roff;
}
