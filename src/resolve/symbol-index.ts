import { isPageKind } from '../model/declaration.js';
import type { DeclarationUnit, Member } from '../model/declaration.js';
import { diagnostic } from '../model/diagnostic.js';
import type { Diagnostic } from '../model/diagnostic.js';
import type { LinkTarget } from '../model/document.js';
import type { Group } from '../model/group.js';
import { sectionsOf } from '../markup/sections.js';
import type { ParsedFile } from '../parser/source-file.js';
import { OrderedSet } from '../utils/ordered-set.js';
import { GroupRegistry } from './groups.js';
import { collectReferences, computeSeeAlso, entryKey, parameterTypes } from './resolver.js';
import type { ReferenceScan, Resolution, SeeAlsoEntry } from './resolver.js';

export interface IndexOptions {
  /** Index and render declarations without a doc comment. */
  includeUndocumented?: boolean;
}

type Entry = { kind: 'declaration'; id: string } | { kind: 'member'; parentId: string; member: Member };

type ScopeName = 'tag' | 'ordinary' | 'member';

/** Build the run's index once every file has been parsed. */
export function buildSymbolIndex(files: readonly ParsedFile[], options: IndexOptions = {}): SymbolIndex {
  return new SymbolIndex(files, options);
}

/**
 * Arena of every declaration in the run plus the derived cross-reference maps. Read-only
 * once constructed.
 */
export class SymbolIndex {
  readonly diagnostics: Diagnostic[] = [];
  private readonly arena: DeclarationUnit[] = [];
  private readonly byId = new Map<string, DeclarationUnit>();
  private readonly byFile = new Map<string, DeclarationUnit[]>();
  private readonly scopes: Record<ScopeName, Map<string, Entry>> = {
    tag: new Map(),
    ordinary: new Map(),
    member: new Map(),
  };
  /** Bare member names; last one wins without a warning since fields repeat across records. */
  private readonly memberNames = new Map<string, Entry>();
  private readonly groupMap = new Map<string, Group>();
  private readonly groupsByMember = new Map<string, string[]>();
  private readonly outgoing = new Map<string, Resolution[]>();
  private readonly incoming = new Map<string, OrderedSet<string>>();
  private readonly seeAlsoMap = new Map<string, SeeAlsoEntry[]>();
  private readonly exampleFiles = new Map<string, string[]>();
  private readonly exampleUsers = new Map<string, OrderedSet<string>>();

  constructor(
    files: readonly ParsedFile[],
    private readonly options: IndexOptions = {},
  ) {
    for (const file of files) {
      this.byFile.set(file.file, file.declarations);
      for (const declaration of file.declarations) {
        this.arena.push(declaration);
        this.byId.set(declaration.id, declaration);
      }
    }
    for (const declaration of this.arena) {
      if (this.isListed(declaration)) this.insert(declaration);
    }
    this.buildGroups(files);
    this.buildReferences();
  }

  /** Declarations that get a page and can be linked to. */
  isListed(declaration: DeclarationUnit): boolean {
    if (!isPageKind(declaration.kind)) return false;
    return declaration.documented || this.options.includeUndocumented === true;
  }

  get(id: string): DeclarationUnit | undefined {
    return this.byId.get(id);
  }

  declarations(): readonly DeclarationUnit[] {
    return this.arena;
  }

  declarationsIn(file: string): readonly DeclarationUnit[] {
    return this.byFile.get(file) ?? [];
  }

  files(): string[] {
    return [...this.byFile.keys()];
  }

  private insert(declaration: DeclarationUnit): void {
    const entry: Entry = { kind: 'declaration', id: declaration.id };
    const { details } = declaration;
    switch (declaration.kind) {
      case 'function':
      case 'variable':
      case 'macro':
      case 'typedef':
        if (declaration.name) this.put('ordinary', declaration.name, entry, declaration);
        break;
      case 'struct':
      case 'union':
      case 'enum':
        if (details.kind === 'record') {
          if (details.tag) this.put('tag', details.tag, entry, declaration);
          for (const alias of details.aliases) this.put('ordinary', alias, entry, declaration);
        }
        this.insertMembers(declaration);
        break;
      default:
        break;
    }
  }

  private insertMembers(parent: DeclarationUnit): void {
    const prefixes = new OrderedSet<string>();
    if (parent.name) prefixes.add(parent.name);
    if (parent.details.kind === 'record') {
      for (const alias of parent.details.aliases) prefixes.add(alias);
    }

    for (const member of parent.members) {
      const entry: Entry = { kind: 'member', parentId: parent.id, member };
      if (member.kind === 'constant') this.put('ordinary', member.name, entry, parent);
      for (const prefix of prefixes) this.put('member', `${prefix}::${member.name}`, entry, parent);
      this.memberNames.set(member.name, entry);
    }
  }

  private put(scope: ScopeName, key: string, entry: Entry, owner: DeclarationUnit): void {
    const map = this.scopes[scope];
    const existing = map.get(key);
    if (existing) {
      const current = this.entryOwner(existing);
      if (current && current.id !== owner.id) {
        if (isForward(owner) && !isForward(current)) return;
        if (!(isForward(current) && !isForward(owner))) {
          this.diagnostics.push(
            diagnostic('warning', 'duplicate-symbol', `${key} is declared more than once; the later declaration wins`, {
              file: owner.filePath,
              line: owner.span.startLine,
            }),
          );
        }
      }
    }
    map.set(key, entry);
  }

  private entryOwner(entry: Entry): DeclarationUnit | undefined {
    return this.byId.get(entry.kind === 'declaration' ? entry.id : entry.parentId);
  }

  private toResolution(entry: Entry | undefined): Resolution | null {
    if (!entry) return null;
    if (entry.kind === 'declaration') {
      const declaration = this.byId.get(entry.id);
      return declaration ? { kind: 'declaration', declaration } : null;
    }
    const parent = this.byId.get(entry.parentId);
    return parent ? { kind: 'member', parent, member: entry.member } : null;
  }

  /** Look up a bare name: ordinary, then tag, then member, then group. */
  lookup(name: string): Resolution | null {
    const qualified = splitQualified(name);
    if (qualified) return this.resolve({ kind: 'member', ...qualified });

    const found =
      this.toResolution(this.scopes.ordinary.get(name)) ??
      this.toResolution(this.scopes.tag.get(name)) ??
      this.toResolution(this.memberNames.get(name));
    if (found) return found;
    const group = this.groupMap.get(name);
    return group ? { kind: 'group', group } : null;
  }

  resolve(target: LinkTarget): Resolution | null {
    switch (target.kind) {
      case 'url':
        return null;
      case 'symbol':
        return this.lookup(target.name);
      case 'member': {
        const direct = this.toResolution(this.scopes.member.get(`${target.parent}::${target.name}`));
        if (direct) return direct;
        const parent = this.lookup(target.parent);
        if (parent?.kind !== 'declaration') return null;
        const member = findMember(parent.declaration.members, target.name);
        return member ? { kind: 'member', parent: parent.declaration, member } : null;
      }
    }
  }

  private buildGroups(files: readonly ParsedFile[]): void {
    const registry = new GroupRegistry();
    for (const file of files) {
      for (const event of file.groupEvents) {
        if (event.type === 'define') {
          registry.define({
            name: event.name,
            title: event.title,
            parent: event.parent,
            brief: event.brief,
            description: event.description,
            file: file.file,
            line: event.line,
          });
          continue;
        }
        const declaration = this.byId.get(event.declarationId);
        if (!declaration || !this.isListed(declaration)) continue;
        registry.addMember(event.group, event.declarationId, file.file);
        const names = this.groupsByMember.get(event.declarationId) ?? [];
        if (!names.includes(event.group)) names.push(event.group);
        this.groupsByMember.set(event.declarationId, names);
      }
    }
    for (const group of registry.all()) this.groupMap.set(group.name, group);
    this.diagnostics.push(...registry.diagnostics);
  }

  /** Groups in first-seen order. */
  groups(): Group[] {
    return [...this.groupMap.values()];
  }

  group(name: string): Group | undefined {
    return this.groupMap.get(name);
  }

  /** Groups a declaration belongs to, in group declaration order. */
  groupsOf(declaration: DeclarationUnit): Group[] {
    const names = this.groupsByMember.get(declaration.id) ?? [];
    return names
      .map(name => this.groupMap.get(name))
      .filter((group): group is Group => group !== undefined)
      .sort((a, b) => a.order - b.order);
  }

  membersOf(group: Group): DeclarationUnit[] {
    return group.members
      .map(id => this.byId.get(id))
      .filter((declaration): declaration is DeclarationUnit => declaration !== undefined);
  }

  private parameterPages(declaration: DeclarationUnit): DeclarationUnit[] {
    const pages: DeclarationUnit[] = [];
    for (const ref of parameterTypes(declaration)) {
      const found = this.toResolution(this.scopes[ref.scope].get(ref.name));
      if (found?.kind === 'declaration' && this.isListed(found.declaration)) pages.push(found.declaration);
    }
    return pages;
  }

  private buildReferences(): void {
    for (const declaration of this.arena) {
      if (!this.isListed(declaration)) continue;
      const scan = collectReferences(declaration.document, declaration.members, target => this.resolve(target), {
        file: declaration.filePath,
        line: declaration.comment.span?.startLine ?? declaration.span.startLine,
      });
      this.diagnostics.push(...scan.diagnostics);
      this.outgoing.set(declaration.id, scan.inline);
      this.recordIncoming(declaration, scan);

      const coMembers = this.groupsOf(declaration).flatMap(group => this.membersOf(group));
      this.seeAlsoMap.set(declaration.id, computeSeeAlso(declaration, scan, coMembers, this.parameterPages(declaration)));

      for (const example of sectionsOf(declaration.document).examples) {
        const list = this.exampleFiles.get(declaration.id) ?? [];
        if (!list.includes(example.file)) list.push(example.file);
        this.exampleFiles.set(declaration.id, list);
        const users = this.exampleUsers.get(example.file) ?? new OrderedSet<string>();
        users.add(declaration.id);
        this.exampleUsers.set(example.file, users);
      }
    }

    for (const group of this.groupMap.values()) {
      const document = [{ type: 'paragraph' as const, children: group.brief }, ...group.description];
      const scan = collectReferences(document, [], target => this.resolve(target), { file: group.files[0] });
      this.diagnostics.push(...scan.diagnostics);
    }
  }

  private recordIncoming(from: DeclarationUnit, scan: ReferenceScan): void {
    for (const entry of [...scan.explicit, ...scan.inline]) {
      const key = entryKey(entry);
      if (key === `declaration:${from.id}`) continue;
      const set = this.incoming.get(key) ?? new OrderedSet<string>();
      set.add(from.id);
      this.incoming.set(key, set);
    }
  }

  /** Resolved inline references of a declaration in document order. */
  referencesOf(declaration: DeclarationUnit): readonly Resolution[] {
    return this.outgoing.get(declaration.id) ?? [];
  }

  /** Declarations whose documentation mentions this declaration or one of its members. */
  referencedBy(declaration: DeclarationUnit): DeclarationUnit[] {
    const ids = this.incoming.get(`declaration:${declaration.id}`)?.toArray() ?? [];
    return ids.map(id => this.byId.get(id)).filter((d): d is DeclarationUnit => d !== undefined);
  }

  seeAlso(declaration: DeclarationUnit): readonly SeeAlsoEntry[] {
    return this.seeAlsoMap.get(declaration.id) ?? [];
  }

  examplesOf(declaration: DeclarationUnit): readonly string[] {
    return this.exampleFiles.get(declaration.id) ?? [];
  }

  usersOfExample(file: string): DeclarationUnit[] {
    const ids = this.exampleUsers.get(file)?.toArray() ?? [];
    return ids.map(id => this.byId.get(id)).filter((d): d is DeclarationUnit => d !== undefined);
  }
}

function isForward(declaration: DeclarationUnit): boolean {
  return declaration.details.kind === 'record' && !declaration.details.hasBody;
}

function splitQualified(name: string): { parent: string; name: string } | null {
  const match = /^(\w+)(?:::|\.)(\w+)$/.exec(name);
  return match ? { parent: match[1], name: match[2] } : null;
}

function findMember(members: readonly Member[], name: string): Member | undefined {
  for (const member of members) {
    if (member.name === name) return member;
    const nested = findMember(member.members, name);
    if (nested) return nested;
  }
  return undefined;
}
