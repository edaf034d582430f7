import type { CommentTag } from '../model/declaration.js';
import type { InlineStyle, TargetCommand } from '../model/document.js';

export type CommandRole =
  /** Starts a paragraph-like block tag. */
  | 'block'
  /** Carries grouping or file information and no body. */
  | 'structural'
  /** Attaches the comment to a named declaration elsewhere. */
  | 'target'
  | 'code'
  | 'list'
  | 'style'
  | 'ref';

export const COMMANDS: ReadonlyMap<string, CommandRole> = new Map<string, CommandRole>([
  ['brief', 'block'],
  ['short', 'block'],
  ['details', 'block'],
  ['param', 'block'],
  ['tparam', 'block'],
  ['retval', 'block'],
  ['return', 'block'],
  ['returns', 'block'],
  ['result', 'block'],
  ['since', 'block'],
  ['note', 'block'],
  ['warning', 'block'],
  ['attention', 'block'],
  ['author', 'block'],
  ['authors', 'block'],
  ['bug', 'block'],
  ['sa', 'block'],
  ['see', 'block'],
  ['example', 'block'],
  ['deprecated', 'block'],
  ['par', 'block'],
  ['file', 'structural'],
  ['defgroup', 'structural'],
  ['addtogroup', 'structural'],
  ['weakgroup', 'structural'],
  ['ingroup', 'structural'],
  ['name', 'structural'],
  ['{', 'structural'],
  ['}', 'structural'],
  ['var', 'target'],
  ['fn', 'target'],
  ['struct', 'target'],
  ['union', 'target'],
  ['enum', 'target'],
  ['typedef', 'target'],
  ['def', 'target'],
  ['code', 'code'],
  ['verbatim', 'code'],
  ['arg', 'list'],
  ['li', 'list'],
  ['b', 'style'],
  ['e', 'style'],
  ['em', 'style'],
  ['a', 'style'],
  ['c', 'style'],
  ['p', 'style'],
  ['ref', 'ref'],
]);

export const STYLE_COMMANDS: Readonly<Record<string, InlineStyle>> = {
  b: 'bold',
  e: 'italic',
  em: 'italic',
  a: 'italic',
  c: 'code',
  p: 'code',
};

export const TARGET_COMMANDS: ReadonlySet<string> = new Set<TargetCommand>([
  'var',
  'fn',
  'struct',
  'union',
  'enum',
  'typedef',
  'def',
]);

export function isTargetCommand(name: string): name is TargetCommand {
  return TARGET_COMMANDS.has(name);
}

/** Characters a backslash turns into themselves. */
export const ESCAPABLE = new Set(['\\', '@', '&', '$', '#', '<', '>', '%', '"', '.', '|', '*', '_', '~', '`', '[', ']', '{', '}']);

export function commandRole(name: string): CommandRole | undefined {
  return COMMANDS.get(name);
}

/** Commands that begin a new block and may be split off the middle of a line. */
export function startsBlock(name: string): boolean {
  const role = COMMANDS.get(name);
  return role === 'block' || role === 'structural' || role === 'target';
}

/** Known commands in a comment body, in source order, skipping code blocks. */
export function listTags(raw: string, firstLine = 1): CommentTag[] {
  const tags: CommentTag[] = [];
  let fence: string | null = null;
  raw.split('\n').forEach((line, index) => {
    const trimmed = line.trim();
    if (fence) {
      if (trimmed.includes(fence)) fence = null;
      return;
    }
    const opener = /^[\\@](code|verbatim)\b|^(```|~~~)/.exec(trimmed);
    if (opener) {
      fence = opener[1] === 'code' ? 'endcode' : opener[1] === 'verbatim' ? 'endverbatim' : opener[2];
      if (opener[1]) tags.push({ name: opener[1], line: firstLine + index });
      return;
    }
    for (const match of line.matchAll(/(?:^|[\s(])[\\@]([A-Za-z]+|[{}])/g)) {
      const name = match[1];
      if (COMMANDS.has(name)) tags.push({ name, line: firstLine + index });
    }
  });
  return tags;
}
