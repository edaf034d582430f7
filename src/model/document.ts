export type InlineStyle = 'bold' | 'italic' | 'code' | 'strike';

export interface TextRun {
  type: 'text';
  text: string;
  styles: InlineStyle[];
}

export type LinkTarget =
  | { kind: 'symbol'; name: string }
  | { kind: 'member'; parent: string; name: string }
  | { kind: 'url'; url: string };

/** Where a link came from; decides how loudly an unresolved one is reported. */
export type LinkOrigin = 'hash' | 'ref' | 'see' | 'markdown' | 'auto';

export interface LinkNode {
  type: 'link';
  target: LinkTarget;
  /** Display text; equals the referenced name unless the author supplied their own. */
  text: string;
  custom: boolean;
  origin: LinkOrigin;
  styles: InlineStyle[];
}

export type InlineNode = TextRun | LinkNode;

export interface Paragraph {
  type: 'paragraph';
  children: InlineNode[];
}

export interface CodeBlock {
  type: 'code';
  language?: string;
  lines: string[];
}

export interface Table {
  type: 'table';
  columns: number;
  header: InlineNode[][];
  rows: InlineNode[][][];
}

export interface List {
  type: 'list';
  ordered: boolean;
  items: InlineNode[][];
}

export type AdmonitionKind = 'note' | 'warning' | 'attention';

export interface Admonition {
  type: 'admonition';
  kind: AdmonitionKind;
  children: InlineNode[];
}

export type ParamDirection = 'in' | 'out' | 'inout';

export type GroupMode = 'define' | 'add' | 'weak';

export type TargetCommand = 'var' | 'fn' | 'struct' | 'union' | 'enum' | 'typedef' | 'def';

export type BlockTag =
  | { type: 'tag'; tag: 'brief'; children: InlineNode[] }
  | { type: 'tag'; tag: 'param'; names: string[]; direction?: ParamDirection; children: InlineNode[] }
  | { type: 'tag'; tag: 'retval'; value: string; children: InlineNode[] }
  | { type: 'tag'; tag: 'return' | 'since' | 'author' | 'bug' | 'deprecated'; children: InlineNode[] }
  | { type: 'tag'; tag: 'see'; links: LinkNode[] }
  | { type: 'tag'; tag: 'example'; file: string; children: InlineNode[] }
  | { type: 'tag'; tag: 'par'; title: string; children: InlineNode[] }
  | { type: 'tag'; tag: 'file'; name?: string }
  | { type: 'tag'; tag: 'group'; mode: GroupMode; name: string; title: string }
  | { type: 'tag'; tag: 'ingroup'; names: string[] }
  | { type: 'tag'; tag: 'section'; title: string }
  | { type: 'tag'; tag: 'open' }
  | { type: 'tag'; tag: 'close' }
  | { type: 'tag'; tag: 'target'; command: TargetCommand; name: string };

export type BlockNode = Paragraph | CodeBlock | Table | List | Admonition | BlockTag;

export function textRun(text: string, styles: InlineStyle[] = []): TextRun {
  return { type: 'text', text, styles };
}

/** Display text of inline content with all styling and link targets dropped. */
export function plainText(nodes: readonly InlineNode[]): string {
  return nodes.map(n => n.text).join('');
}
