import { diagnostic } from '../model/diagnostic.js';
import type { Diagnostic } from '../model/diagnostic.js';
import { textRun } from '../model/document.js';
import type { InlineNode, InlineStyle, LinkNode, LinkOrigin, LinkTarget } from '../model/document.js';
import { normalizeQuotes } from '../utils/text.js';
import { ESCAPABLE, STYLE_COMMANDS, commandRole } from './commands.js';

export interface InlineContext {
  diagnostics: Diagnostic[];
  /** Comment line the text starts on, for diagnostics. */
  line?: number;
  /** Unknown commands already reported for this comment. */
  reported: Set<string>;
}

export function inlineContext(line?: number): InlineContext {
  return { diagnostics: [], line, reported: new Set() };
}

const HTML_STYLES: Record<string, InlineStyle> = {
  b: 'bold',
  strong: 'bold',
  i: 'italic',
  em: 'italic',
  tt: 'code',
  code: 'code',
  s: 'strike',
  strike: 'strike',
  del: 'strike',
};

const TRAILING_PUNCTUATION = /[.,;:!?…]+$/;
const SYMBOL = /^([A-Za-z_]\w*)(?:(::|\.)([A-Za-z_]\w*))?(\(\))?/;

function isWordChar(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z0-9_]/.test(ch);
}

function isSpace(ch: string | undefined): boolean {
  return ch === undefined || /\s/.test(ch);
}

/**
 * Parse inline markup: styling commands, markdown and HTML emphasis, code spans,
 * symbol references and links. Line breaks inside the text fold into spaces.
 */
export function parseInline(text: string, context: InlineContext = inlineContext()): InlineNode[] {
  const nodes = parseSegment(text, [], context);
  return trimEdges(mergeRuns(nodes));
}

function parseSegment(text: string, styles: InlineStyle[], ctx: InlineContext): InlineNode[] {
  const nodes: InlineNode[] = [];
  let buffer = '';
  let i = 0;

  const flush = () => {
    if (buffer.length > 0) {
      nodes.push(textRun(normalizeQuotes(buffer.replace(/\s+/g, ' ')), styles));
      buffer = '';
    }
  };
  const pushLink = (target: LinkTarget, display: string, custom: boolean, origin: LinkOrigin) => {
    flush();
    const link: LinkNode = { type: 'link', target, text: display, custom, origin, styles };
    nodes.push(link);
  };
  const withStyle = (style: InlineStyle): InlineStyle[] => (styles.includes(style) ? styles : [...styles, style]);

  while (i < text.length) {
    const ch = text[i];
    const prev = i > 0 ? text[i - 1] : undefined;
    const rest = text.slice(i);

    if (ch === '`') {
      const run = /^`+/.exec(rest)?.[0] ?? '`';
      const close = findBacktickClose(text, i + run.length, run.length);
      if (close === -1) {
        buffer += run;
        i += run.length;
        continue;
      }
      flush();
      let code = text.slice(i + run.length, close).replace(/\n/g, ' ');
      if (code.startsWith(' ') && code.endsWith(' ') && code.trim().length > 0) code = code.slice(1, -1);
      nodes.push(textRun(code, withStyle('code')));
      i = close + run.length;
      continue;
    }

    if (ch === '\\' || ch === '@') {
      const next = text[i + 1];
      if (ch === '\\' && next !== undefined && ESCAPABLE.has(next)) {
        buffer += next;
        i += 2;
        continue;
      }
      const command = /^[\\@]([A-Za-z]+)/.exec(rest);
      if (!command || (ch === '@' && isWordChar(prev))) {
        buffer += ch;
        i++;
        continue;
      }
      const name = command[1];
      const afterCommand = i + command[0].length;
      const style = STYLE_COMMANDS[name];

      if (style) {
        const arg = /^[ \t]*(\S*)/.exec(text.slice(afterCommand));
        const whole = arg?.[0] ?? '';
        const word = arg?.[1] ?? '';
        const punctuation = TRAILING_PUNCTUATION.exec(word)?.[0] ?? '';
        const core = word.slice(0, word.length - punctuation.length);
        flush();
        if (core) nodes.push(textRun(style === 'code' ? core : normalizeQuotes(core), withStyle(style)));
        buffer += punctuation;
        i = afterCommand + whole.length;
        continue;
      }

      if (name === 'ref') {
        const ref = /^\s+([A-Za-z_]\w*(?:(?:::|\.)[A-Za-z_]\w*)?)(?:\(\))?(?:\s+"([^"]*)")?/.exec(text.slice(afterCommand));
        if (ref) {
          const target = symbolTarget(ref[1]);
          pushLink(target, ref[2] ?? ref[1], ref[2] !== undefined, 'ref');
          i = afterCommand + ref[0].length;
          continue;
        }
      }

      if (ch === '\\' && commandRole(name) === undefined && !ctx.reported.has(name)) {
        ctx.reported.add(name);
        ctx.diagnostics.push(
          diagnostic('info', 'unknown-command', `Unsupported command \\${name} kept as text`, { line: ctx.line }),
        );
      }
      buffer += command[0];
      i = afterCommand;
      continue;
    }

    if (ch === '<') {
      const auto = /^<((?:https?|ftp|mailto):[^>\s]+)>/.exec(rest);
      if (auto) {
        pushLink({ kind: 'url', url: auto[1] }, auto[1], false, 'auto');
        i += auto[0].length;
        continue;
      }
      if (/^<br\s*\/?>/i.test(rest)) {
        buffer += ' ';
        i += (/^<br\s*\/?>/i.exec(rest)?.[0] ?? '<br>').length;
        continue;
      }
      const tag = /^<([A-Za-z]+)>/.exec(rest);
      const htmlStyle = tag ? HTML_STYLES[tag[1].toLowerCase()] : undefined;
      if (tag && htmlStyle) {
        const closing = `</${tag[1].toLowerCase()}>`;
        const close = text.toLowerCase().indexOf(closing, i + tag[0].length);
        if (close !== -1) {
          flush();
          const inner = text.slice(i + tag[0].length, close);
          // Monospace content is literal, like a backtick span.
          if (htmlStyle === 'code') nodes.push(textRun(inner.replace(/\n/g, ' '), withStyle('code')));
          else nodes.push(...parseSegment(inner, withStyle(htmlStyle), ctx));
          i = close + closing.length;
          continue;
        }
      }
      buffer += ch;
      i++;
      continue;
    }

    if (ch === '*' || ch === '_' || ch === '~') {
      const emphasis = matchEmphasis(text, i);
      if (emphasis) {
        flush();
        nodes.push(...parseSegment(text.slice(emphasis.innerStart, emphasis.innerEnd), withStyle(emphasis.style), ctx));
        i = emphasis.end;
        continue;
      }
      buffer += ch;
      i++;
      continue;
    }

    if (ch === '#' && !isWordChar(prev) && prev !== '&') {
      const symbol = SYMBOL.exec(text.slice(i + 1));
      if (symbol) {
        const written = symbol[0].replace(/\(\)$/, '');
        pushLink(symbolTarget(written), written, false, 'hash');
        i += 1 + symbol[0].length;
        continue;
      }
    }

    if (ch === '[') {
      const link = /^\[([^\]\n]*)\]\(([^)\s]+)\)/.exec(rest);
      if (link) {
        const [whole, label, href] = link;
        const display = normalizeQuotes(label.replace(/\s+/g, ' ').trim()) || href;
        const target: LinkTarget = href.startsWith('#') ? symbolTarget(href.slice(1)) : { kind: 'url', url: href };
        pushLink(target, display, label.trim().length > 0, 'markdown');
        i += whole.length;
        continue;
      }
    }

    if ((ch === 'h' || ch === 'f') && !isWordChar(prev)) {
      const url = /^(?:https?|ftp):\/\/[^\s<>]+/.exec(rest);
      if (url) {
        const trailing = /[.,;:!?)'"]+$/.exec(url[0])?.[0] ?? '';
        const href = url[0].slice(0, url[0].length - trailing.length);
        pushLink({ kind: 'url', url: href }, href, false, 'auto');
        i += href.length;
        continue;
      }
    }

    buffer += ch;
    i++;
  }
  flush();
  return nodes;
}

export function symbolTarget(written: string): LinkTarget {
  const member = /^([A-Za-z_]\w*)(?:::|\.)([A-Za-z_]\w*)$/.exec(written);
  if (member) return { kind: 'member', parent: member[1], name: member[2] };
  return { kind: 'symbol', name: written };
}

function findBacktickClose(text: string, from: number, length: number): number {
  let i = from;
  while (i < text.length) {
    const at = text.indexOf('`', i);
    if (at === -1) return -1;
    let end = at;
    while (text[end] === '`') end++;
    if (end - at === length) return at;
    i = end;
  }
  return -1;
}

interface Emphasis {
  style: InlineStyle;
  innerStart: number;
  innerEnd: number;
  end: number;
}

function matchEmphasis(text: string, start: number): Emphasis | null {
  const ch = text[start];
  const prev = start > 0 ? text[start - 1] : undefined;
  if (isWordChar(prev)) return null;

  let length = 1;
  while (text[start + length] === ch) length++;
  if (ch === '~') {
    if (length !== 2) return null;
  } else {
    length = Math.min(length, 2);
  }
  const delimiter = ch.repeat(length);
  const innerStart = start + length;
  if (isSpace(text[innerStart])) return null;

  let search = innerStart + 1;
  while (search <= text.length - length) {
    const close = text.indexOf(delimiter, search);
    if (close === -1) return null;
    const before = text[close - 1];
    const after = text[close + length];
    if (!isSpace(before) && !isWordChar(after) && (length === 2 || after !== ch)) {
      const style: InlineStyle = ch === '~' ? 'strike' : length === 2 ? 'bold' : 'italic';
      return { style, innerStart, innerEnd: close, end: close + length };
    }
    search = close + 1;
  }
  return null;
}

function sameStyles(a: InlineStyle[], b: InlineStyle[]): boolean {
  return a.length === b.length && a.every(style => b.includes(style));
}

export function mergeRuns(nodes: InlineNode[]): InlineNode[] {
  const merged: InlineNode[] = [];
  for (const node of nodes) {
    const last = merged[merged.length - 1];
    if (node.type === 'text' && last && last.type === 'text' && sameStyles(last.styles, node.styles)) {
      merged[merged.length - 1] = textRun(last.text + node.text, last.styles);
    } else if (node.type !== 'text' || node.text.length > 0) {
      merged.push(node);
    }
  }
  return merged;
}

function trimEdges(nodes: InlineNode[]): InlineNode[] {
  const result = [...nodes];
  const first = result[0];
  if (first && first.type === 'text' && !first.styles.includes('code')) {
    result[0] = textRun(first.text.replace(/^\s+/, ''), first.styles);
  }
  const lastIndex = result.length - 1;
  const last = result[lastIndex];
  if (last && last.type === 'text' && !last.styles.includes('code')) {
    result[lastIndex] = textRun(last.text.replace(/\s+$/, ''), last.styles);
  }
  return result.filter(node => node.type !== 'text' || node.text.length > 0);
}
