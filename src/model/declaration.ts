import type { BlockNode } from './document.js';

export type DeclarationKind =
  | 'function'
  | 'struct'
  | 'union'
  | 'enum'
  | 'typedef'
  | 'macro'
  | 'variable'
  | 'group'
  | 'group-close'
  | 'file'
  | 'unknown';

export type RecordKind = 'struct' | 'union' | 'enum';

export interface SourceSpan {
  startLine: number;
  endLine: number;
}

export interface CommentTag {
  name: string;
  line: number;
}

export interface CommentBlock {
  /** Comment body with the comment delimiters and leading `*` decoration removed. */
  raw: string;
  tags: CommentTag[];
  span?: SourceSpan;
  /** True for `/**<` style comments that document what precedes them. */
  trailing: boolean;
}

export interface Parameter {
  type: string;
  name?: string;
  /** Declarator text after the name: array bounds or a function-pointer tail. */
  suffix: string;
}

/** `()` is empty, `(void)` is the explicit no-argument marker. */
export type Arity = 'empty' | 'void' | 'fixed' | 'variadic';

export interface Member {
  kind: 'field' | 'constant';
  name: string;
  /** Field declaration (`const void *nop`) or constant (`BAZ = 100`) as written. */
  signature: string;
  value?: string;
  comment: CommentBlock;
  document: BlockNode[];
  line: number;
  /** Set when the field's type is a record defined in place. */
  record?: { kind: RecordKind; tag?: string };
  members: Member[];
}

export type DeclarationDetails =
  | { kind: 'function'; returnType: string; parameters: Parameter[]; arity: Arity; storage: string[] }
  | { kind: 'macro'; parameters?: string[]; initializer?: string }
  | { kind: 'record'; record: RecordKind; tag?: string; aliases: string[]; hasBody: boolean }
  | {
      kind: 'typedef';
      type: string;
      suffix: string;
      target?: { record: RecordKind; tag: string };
      /** Parameters of a function-pointer typedef. */
      parameters?: Parameter[];
    }
  | { kind: 'variable'; type: string; suffix: string; storage: string[] }
  | { kind: 'group'; group: string; opensScope: boolean }
  | { kind: 'file' }
  | { kind: 'none' };

export interface DeclarationUnit {
  id: string;
  kind: DeclarationKind;
  name: string;
  /** Single-line declaration text, whitespace normalized. Raw text for `unknown`. */
  signature: string;
  filePath: string;
  span: SourceSpan;
  comment: CommentBlock;
  document: BlockNode[];
  /** Innermost group whose scope was open at the declaration. */
  group?: string;
  groups: string[];
  members: Member[];
  details: DeclarationDetails;
  documented: boolean;
  /** Name of the record this one was defined inside of. */
  enclosing?: string;
}

export function buildDeclarationId(filePath: string, kind: DeclarationKind, name: string, ordinal = 0): string {
  const base = `${filePath}::${kind}::${name}`;
  return ordinal > 0 ? `${base}#${ordinal}` : base;
}

export function emptyComment(): CommentBlock {
  return { raw: '', tags: [], trailing: false };
}

/** Kinds that get a reference page of their own. */
export function isPageKind(kind: DeclarationKind): boolean {
  return kind !== 'group' && kind !== 'group-close';
}
