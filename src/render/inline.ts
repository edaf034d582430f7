import type { InlineNode, InlineStyle, LinkNode, LinkTarget, TextRun } from '../model/document.js';
import type { Resolution } from '../resolve/resolver.js';
import { Roff, escapeText } from './roff.js';

export interface InlineContext {
  resolve(target: LinkTarget): Resolution | null;
  /** Page topic of a declaration or group; null when it has no page. */
  pageName(resolution: Resolution): string | null;
  section: string;
  /** Parameter names of the page's function or macro; code runs naming one render italic. */
  parameters: ReadonlySet<string>;
  /** When false only code spans keep a font; bold, italic and strike render plain. */
  preserveStyles: boolean;
}

function fontOf(styles: readonly InlineStyle[]): string | null {
  const bold = styles.includes('bold');
  const italic = styles.includes('italic');
  if (styles.includes('code')) {
    if (bold) return 'CB';
    if (italic) return 'CI';
    return 'C';
  }
  if (bold && italic) return 'BI';
  if (bold) return 'B';
  if (italic) return 'I';
  return null;
}

/** `'` delimits the `\\o` escape, so an apostrophe goes in as `\\(aq`. */
function overstrike(text: string): string {
  return [...text].map(ch => (ch === ' ' ? ch : `\\o'${ch === "'" ? '\\(aq' : escapeText(ch)}\\(em'`)).join('');
}

function renderRun(run: TextRun, ctx: InlineContext): string {
  let styles = ctx.preserveStyles ? run.styles : run.styles.filter(style => style === 'code');
  if (styles.includes('code') && ctx.parameters.has(run.text)) {
    styles = [...styles.filter(style => style !== 'code'), 'italic'];
  }
  const body = styles.includes('strike') ? overstrike(run.text) : escapeText(run.text);
  const font = fontOf(styles);
  return font ? `\\f[${font}]${body}\\f[R]` : body;
}

/** One symbol or member link as inline roff. URL links are handled by the caller. */
function renderSymbolLink(link: LinkNode, ctx: InlineContext): string {
  const resolution = ctx.resolve(link.target);
  const text = escapeText(link.text);
  if (!resolution) return `\\f[I]${text}\\f[R]`;

  if (resolution.kind === 'member') {
    const name = escapeText(link.custom ? link.text : resolution.member.name);
    return resolution.member.kind === 'constant' ? `\\f[B]${name}\\f[R]` : `\\f[I]${name}\\f[R]`;
  }

  const page = ctx.pageName(resolution);
  if (page === null) return `\\f[B]${text}\\f[R]`;
  const reference = `\\f[B]${escapeText(page)}\\f[R](${ctx.section})`;
  return link.custom && link.text !== page ? `${text} (${reference})` : reference;
}

/** Inline content as a single line of roff; URLs become `text <url>`. */
export function inlineText(nodes: readonly InlineNode[], ctx: InlineContext): string {
  return nodes
    .map(node => {
      if (node.type === 'text') return renderRun(node, ctx);
      if (node.target.kind === 'url') {
        const url = escapeText(node.target.url);
        return node.custom ? `${escapeText(node.text)} <${url}>` : url;
      }
      return renderSymbolLink(node, ctx);
    })
    .join('');
}

/** Inline content as roff; URL links get `.UR`/`.UE` of their own. */
export function renderInline(nodes: readonly InlineNode[], ctx: InlineContext): Roff {
  const roff = new Roff();
  for (const node of nodes) {
    if (node.type === 'link' && node.target.kind === 'url') {
      roff.macro('UR', escapeText(node.target.url));
      if (node.custom) roff.text(escapeText(node.text));
      roff.macro('UE');
    } else {
      roff.text(inlineText([node], ctx));
    }
  }
  return roff;
}
