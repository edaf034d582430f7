import type { BlockNode, InlineNode } from './document.js';

export interface Group {
  name: string;
  title: string;
  brief: InlineNode[];
  description: BlockNode[];
  parent?: string;
  /** Declaration ids in first-seen order, without duplicates. */
  members: string[];
  children: string[];
  files: string[];
  /** Position in first-seen order across the run. */
  order: number;
}
