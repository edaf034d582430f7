import { diagnostic } from '../model/diagnostic.js';
import type { Diagnostic } from '../model/diagnostic.js';
import type { BlockNode, InlineNode } from '../model/document.js';
import type { Group } from '../model/group.js';
import { OrderedSet } from '../utils/ordered-set.js';

export interface GroupDefinition {
  name: string;
  title: string;
  parent?: string;
  brief: InlineNode[];
  description: BlockNode[];
  file: string;
  line?: number;
}

interface GroupState {
  group: Group;
  members: OrderedSet<string>;
  children: OrderedSet<string>;
  files: OrderedSet<string>;
}

/**
 * Merges every occurrence of a group name into one Group. Members keep first-seen order
 * and never repeat; a later non-empty title replaces the current one.
 */
export class GroupRegistry {
  private readonly states = new Map<string, GroupState>();
  readonly diagnostics: Diagnostic[] = [];

  private ensure(name: string): GroupState {
    let state = this.states.get(name);
    if (!state) {
      state = {
        group: {
          name,
          title: '',
          brief: [],
          description: [],
          members: [],
          children: [],
          files: [],
          order: this.states.size,
        },
        members: new OrderedSet(),
        children: new OrderedSet(),
        files: new OrderedSet(),
      };
      this.states.set(name, state);
    }
    return state;
  }

  define(definition: GroupDefinition): void {
    const state = this.ensure(definition.name);
    const { group } = state;
    if (definition.title) group.title = definition.title;
    if (group.brief.length === 0 && definition.brief.length > 0) group.brief = definition.brief;
    group.description = [...group.description, ...definition.description];
    state.files.add(definition.file);

    if (definition.parent) this.setParent(definition.name, definition.parent, definition);
  }

  addMember(groupName: string, declarationId: string, file?: string): void {
    const state = this.ensure(groupName);
    state.members.add(declarationId);
    if (file) state.files.add(file);
  }

  private setParent(name: string, parent: string, at: GroupDefinition): void {
    const state = this.ensure(name);
    if (state.group.parent === parent) return;
    if (state.group.parent !== undefined) return;

    for (let cursor: string | undefined = parent; cursor !== undefined; cursor = this.states.get(cursor)?.group.parent) {
      if (cursor === name) {
        this.diagnostics.push(
          diagnostic('warning', 'group-cycle', `Making ${parent} the parent of ${name} would create a cycle`, {
            file: at.file,
            line: at.line,
          }),
        );
        return;
      }
    }
    state.group.parent = parent;
    this.ensure(parent).children.add(name);
  }

  get(name: string): Group | undefined {
    const state = this.states.get(name);
    return state ? this.snapshot(state) : undefined;
  }

  /** Groups in first-seen order. */
  all(): Group[] {
    return [...this.states.values()].map(state => this.snapshot(state));
  }

  private snapshot(state: GroupState): Group {
    return {
      ...state.group,
      title: state.group.title || state.group.name,
      members: state.members.toArray(),
      children: state.children.toArray(),
      files: state.files.toArray(),
    };
  }
}
