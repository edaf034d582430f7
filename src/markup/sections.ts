import type { Admonition, BlockNode, BlockTag, InlineNode, LinkNode } from '../model/document.js';

type TagOf<T extends BlockTag['tag']> = Extract<BlockTag, { tag: T }>;

export type ParamTag = TagOf<'param'>;
export type RetvalTag = TagOf<'retval'>;
export type ExampleTag = TagOf<'example'>;

export interface DocumentSections {
  brief: InlineNode[];
  /** Paragraphs, code blocks, tables, lists and titled paragraphs in source order. */
  description: BlockNode[];
  params: ParamTag[];
  retvals: RetvalTag[];
  returns: InlineNode[][];
  examples: ExampleTag[];
  notes: Admonition[];
  deprecated: InlineNode[][];
  authors: InlineNode[][];
  bugs: InlineNode[][];
  since: InlineNode[][];
  see: LinkNode[];
}

export function sectionsOf(document: readonly BlockNode[]): DocumentSections {
  const sections: DocumentSections = {
    brief: [],
    description: [],
    params: [],
    retvals: [],
    returns: [],
    examples: [],
    notes: [],
    deprecated: [],
    authors: [],
    bugs: [],
    since: [],
    see: [],
  };

  for (const node of document) {
    switch (node.type) {
      case 'paragraph':
      case 'code':
      case 'table':
      case 'list':
        sections.description.push(node);
        break;
      case 'admonition':
        sections.notes.push(node);
        break;
      case 'tag':
        switch (node.tag) {
          case 'brief':
            if (sections.brief.length === 0) sections.brief = node.children;
            break;
          case 'par':
            sections.description.push(node);
            break;
          case 'param':
            sections.params.push(node);
            break;
          case 'retval':
            sections.retvals.push(node);
            break;
          case 'return':
            sections.returns.push(node.children);
            break;
          case 'example':
            sections.examples.push(node);
            break;
          case 'deprecated':
            sections.deprecated.push(node.children);
            break;
          case 'author':
            sections.authors.push(node.children);
            break;
          case 'bug':
            sections.bugs.push(node.children);
            break;
          case 'since':
            sections.since.push(node.children);
            break;
          case 'see':
            sections.see.push(...node.links);
            break;
          default:
            break;
        }
        break;
    }
  }
  return sections;
}

/** Every inline node of a document, including those nested in tags, tables and lists. */
export function* inlineNodes(document: readonly BlockNode[]): Generator<InlineNode> {
  for (const node of document) {
    switch (node.type) {
      case 'paragraph':
      case 'admonition':
        yield* node.children;
        break;
      case 'table':
        for (const cell of node.header) yield* cell;
        for (const row of node.rows) for (const cell of row) yield* cell;
        break;
      case 'list':
        for (const item of node.items) yield* item;
        break;
      case 'code':
        break;
      case 'tag':
        if ('children' in node) yield* node.children;
        if (node.tag === 'see') yield* node.links;
        break;
    }
  }
}

export function hasContent(document: readonly BlockNode[]): boolean {
  return document.some(node => node.type !== 'tag' || 'children' in node || node.tag === 'see');
}
