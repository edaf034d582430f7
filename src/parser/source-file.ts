import { buildDeclarationId, emptyComment } from '../model/declaration.js';
import type { CommentBlock, DeclarationUnit, Member } from '../model/declaration.js';
import { diagnostic, relocate } from '../model/diagnostic.js';
import type { Diagnostic } from '../model/diagnostic.js';
import type { BlockNode, BlockTag, GroupMode, InlineNode } from '../model/document.js';
import { parseComment } from '../markup/blocks.js';
import type { ParsedComment } from '../markup/blocks.js';
import { listTags } from '../markup/commands.js';
import { hasContent, sectionsOf } from '../markup/sections.js';
import { includeName } from '../utils/path.js';
import { classifyDeclaration } from './classifier.js';
import type { ClassifiedMember, Classification } from './classifier.js';
import { scanSource } from './scanner.js';
import type { RawComment } from './scanner.js';

export interface SourceInput {
  /** Stable identifier, usually the path as given by the caller. */
  id: string;
  text: string;
}

export type GroupEvent =
  | {
      type: 'define';
      name: string;
      mode: GroupMode;
      title: string;
      parent?: string;
      brief: InlineNode[];
      description: BlockNode[];
      line?: number;
    }
  | { type: 'member'; group: string; declarationId: string };

export interface ParsedFile {
  file: string;
  declarations: DeclarationUnit[];
  groupEvents: GroupEvent[];
  diagnostics: Diagnostic[];
}

type Scope = { kind: 'group'; name: string } | { kind: 'section'; title: string } | { kind: 'anonymous' };

interface PendingTarget {
  tag: Extract<BlockTag, { tag: 'target' }>;
  comment: CommentBlock;
  document: BlockNode[];
}

const STRUCTURAL = new Set(['file', 'group', 'ingroup', 'section', 'open', 'close', 'target']);

function isStructural(node: BlockNode): boolean {
  return node.type === 'tag' && STRUCTURAL.has(node.tag);
}

/** Scan, classify and parse the comments of one file. */
export function parseSourceFile(source: SourceInput): ParsedFile {
  return new SourceFileParser(source).parse();
}

class SourceFileParser {
  private readonly declarations: DeclarationUnit[] = [];
  private readonly groupEvents: GroupEvent[] = [];
  private readonly diagnostics: Diagnostic[] = [];
  private readonly scopes: Scope[] = [];
  private readonly targets: PendingTarget[] = [];
  private readonly ordinals = new Map<string, number>();
  private readonly parsed = new Map<RawComment, ParsedComment>();
  private fileUnit: DeclarationUnit | null = null;
  private lastLine = 1;

  constructor(private readonly source: SourceInput) {}

  parse(): ParsedFile {
    const scan = scanSource(this.source.text, { file: this.source.id });
    this.diagnostics.push(...scan.diagnostics);
    this.lastLine = this.source.text.split('\n').length;

    for (const block of scan.blocks) {
      const comment = block.comment ? this.commentBlock(block.comment) : emptyComment();
      const document = block.comment ? this.parseCached(block.comment).document : [];
      const ownsDeclaration = this.processStructure(comment, document, block.comment?.startLine);

      if (block.declaration) {
        const { text, startLine, endLine } = block.declaration;
        const classifications = classifyDeclaration(text, startLine);
        const docFor = ownsDeclaration ? { comment, document } : { comment: emptyComment(), document: [] };
        this.addDeclarations(classifications, docFor, { startLine, endLine }, ownsDeclaration ? document : []);
      }

      for (const node of document) {
        if (node.type === 'tag' && node.tag === 'open') this.openScope(document);
      }
    }

    if (this.scopes.length > 0) {
      this.diagnostics.push(
        diagnostic('error', 'unbalanced-group', `${this.scopes.length} group scope(s) still open at end of file`, {
          file: this.source.id,
          line: this.lastLine,
        }),
      );
    }
    this.applyTargets();
    this.mergeTagAliases();

    return {
      file: this.source.id,
      declarations: this.declarations,
      groupEvents: this.groupEvents,
      diagnostics: this.diagnostics,
    };
  }

  private commentBlock(raw: RawComment): CommentBlock {
    return {
      raw: raw.raw,
      tags: listTags(raw.raw, raw.startLine),
      span: { startLine: raw.startLine, endLine: raw.endLine },
      trailing: raw.trailing,
    };
  }

  private parseCached(raw: RawComment): ParsedComment {
    const cached = this.parsed.get(raw);
    if (cached) return cached;
    const result = parseComment(raw.raw);
    this.diagnostics.push(...relocate(result.diagnostics, this.source.id, raw.startLine - 1));
    this.parsed.set(raw, result);
    return result;
  }

  private nextId(kind: DeclarationUnit['kind'], name: string): string {
    const key = `${kind}::${name}`;
    const ordinal = this.ordinals.get(key) ?? 0;
    this.ordinals.set(key, ordinal + 1);
    return buildDeclarationId(this.source.id, kind, name, ordinal);
  }

  private innermostGroup(): string | undefined {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const scope = this.scopes[i];
      if (scope.kind === 'group') return scope.name;
    }
    return undefined;
  }

  /**
   * Handle closes, file and group documentation, section and target tags of one block.
   * Returns whether what is left of the comment documents the following declaration.
   */
  private processStructure(comment: CommentBlock, document: BlockNode[], line: number | undefined): boolean {
    for (const node of document) {
      if (node.type !== 'tag' || node.tag !== 'close') continue;
      const scope = this.scopes.pop();
      if (!scope) {
        this.diagnostics.push(
          diagnostic('error', 'unbalanced-group', 'Group close without a matching open', { file: this.source.id, line }),
        );
        continue;
      }
      const name = scope.kind === 'group' ? scope.name : scope.kind === 'section' ? scope.title : '';
      this.declarations.push(
        this.markerUnit('group-close', name, comment, line, { kind: 'group', group: name, opensScope: false }),
      );
    }

    const content = document.filter(node => !isStructural(node));
    const fileTag = document.find(node => node.type === 'tag' && node.tag === 'file');
    const groupTags = document.filter(
      (node): node is Extract<BlockTag, { tag: 'group' }> => node.type === 'tag' && node.tag === 'group',
    );
    const targetTags = document.filter(
      (node): node is Extract<BlockTag, { tag: 'target' }> => node.type === 'tag' && node.tag === 'target',
    );
    const ingroups = document.flatMap(node => (node.type === 'tag' && node.tag === 'ingroup' ? node.names : []));
    const sectionTag = document.some(node => node.type === 'tag' && node.tag === 'section');

    const opensScope = document.some(node => node.type === 'tag' && node.tag === 'open');
    const sharedDocs = fileTag !== undefined || groupTags.length !== 1;
    groupTags.forEach((tag, index) => {
      const docs = sharedDocs ? [] : content;
      const sections = sectionsOf(docs);
      const parent = ingroups[0] ?? this.innermostGroup();
      const event: Extract<GroupEvent, { type: 'define' }> = {
        type: 'define',
        name: tag.name,
        mode: tag.mode,
        title: tag.title,
        brief: sections.brief,
        description: sections.description,
        line,
      };
      if (parent && parent !== tag.name) event.parent = parent;
      this.groupEvents.push(event);
      this.declarations.push(
        this.markerUnit('group', tag.name, sharedDocs ? emptyComment() : comment, line, {
          kind: 'group',
          group: tag.name,
          opensScope: opensScope && index === groupTags.length - 1,
        }),
      );
    });

    if (fileTag && fileTag.type === 'tag' && fileTag.tag === 'file') {
      this.documentFile(fileTag.name, comment, content, ingroups);
      return false;
    }
    if (groupTags.length > 0 || sectionTag) return false;
    if (targetTags.length > 0) {
      for (const tag of targetTags) this.targets.push({ tag, comment, document });
      return false;
    }
    return true;
  }

  private openScope(document: BlockNode[]): void {
    let scope: Scope = { kind: 'anonymous' };
    for (const node of document) {
      if (node.type !== 'tag') continue;
      if (node.tag === 'group') scope = { kind: 'group', name: node.name };
      else if (node.tag === 'section' && scope.kind !== 'group') scope = { kind: 'section', title: node.title };
    }
    this.scopes.push(scope);
  }

  private markerUnit(
    kind: 'group' | 'group-close',
    name: string,
    comment: CommentBlock,
    line: number | undefined,
    details: DeclarationUnit['details'],
  ): DeclarationUnit {
    const at = line ?? 1;
    return {
      id: this.nextId(kind, name),
      kind,
      name,
      signature: name,
      filePath: this.source.id,
      span: { startLine: at, endLine: comment.span?.endLine ?? at },
      comment,
      document: [],
      groups: [],
      members: [],
      details,
      documented: false,
    };
  }

  private documentFile(name: string | undefined, comment: CommentBlock, content: BlockNode[], ingroups: string[]): void {
    if (this.fileUnit) {
      this.fileUnit.document.push(...content);
      this.fileUnit.documented = this.fileUnit.documented || hasContent(content);
      return;
    }
    const fileName = name ?? includeName(this.source.id, 'short');
    const group = this.innermostGroup();
    const groups = [...(group ? [group] : []), ...ingroups];
    const unit: DeclarationUnit = {
      id: this.nextId('file', fileName),
      kind: 'file',
      name: fileName,
      signature: fileName,
      filePath: this.source.id,
      span: comment.span ?? { startLine: 1, endLine: 1 },
      comment,
      document: [...content],
      groups,
      members: [],
      details: { kind: 'file' },
      documented: true,
    };
    if (group) unit.group = group;
    this.fileUnit = unit;
    this.declarations.push(unit);
  }

  private addDeclarations(
    classifications: Classification[],
    docs: { comment: CommentBlock; document: BlockNode[] },
    span: { startLine: number; endLine: number },
    ownDocument: BlockNode[],
  ): void {
    const group = this.innermostGroup();
    const ingroups = ownDocument.flatMap(node => (node.type === 'tag' && node.tag === 'ingroup' ? node.names : []));
    const groups = [...new Set([...(group ? [group] : []), ...ingroups])];
    const primaryDocumented = hasContent(docs.document);

    for (const c of classifications) {
      let comment = docs.comment;
      let document = docs.document;
      let documented = primaryDocumented;
      if (c.comment !== undefined) {
        comment = c.comment ? this.commentBlock(c.comment) : emptyComment();
        document = c.comment ? this.parseCached(c.comment).document : [];
        documented = hasContent(document);
      } else if (!c.primary) {
        comment = emptyComment();
        document = [];
      }

      const unit: DeclarationUnit = {
        id: this.nextId(c.kind, c.name),
        kind: c.kind,
        name: c.name,
        signature: c.signature,
        filePath: this.source.id,
        span: { startLine: c.line, endLine: c.primary ? span.endLine : c.line },
        comment,
        document,
        groups,
        members: c.members.map(member => this.member(member)),
        details: c.details,
        documented,
      };
      if (group) unit.group = group;
      if (c.enclosing !== undefined) unit.enclosing = c.enclosing;
      this.declarations.push(unit);

      if (c.kind === 'unknown') {
        this.diagnostics.push(
          diagnostic('info', 'ambiguous-declaration', `Could not classify declaration: ${c.signature.split('\n')[0]}`, {
            file: this.source.id,
            line: c.line,
          }),
        );
      }
      for (const name of groups) {
        this.groupEvents.push({ type: 'member', group: name, declarationId: unit.id });
      }
    }
  }

  private member(member: ClassifiedMember): Member {
    const result: Member = {
      kind: member.kind,
      name: member.name,
      signature: member.signature,
      comment: member.comment ? this.commentBlock(member.comment) : emptyComment(),
      document: member.comment ? this.parseCached(member.comment).document : [],
      line: member.line,
      members: member.members.map(child => this.member(child)),
    };
    if (member.value !== undefined) result.value = member.value;
    if (member.record) result.record = member.record;
    return result;
  }

  /** Attach `\var`, `\fn`, ... blocks to the declaration or member they name. */
  private applyTargets(): void {
    for (const { tag, comment, document } of this.targets) {
      const [parentName, memberName] = tag.name.includes('::') ? tag.name.split('::') : [undefined, tag.name];
      const content = document.filter(node => !isStructural(node));

      const member = this.findMember(parentName, memberName);
      if (member && (tag.command === 'var' || parentName !== undefined)) {
        member.comment = comment;
        member.document = content;
        continue;
      }

      const unit = this.declarations.find(d => d.name === memberName && matchesCommand(d, tag.command));
      if (unit) {
        unit.comment = comment;
        unit.document = content;
        unit.documented = hasContent(content);
        continue;
      }
      this.diagnostics.push(
        diagnostic('warning', 'unmatched-target', `\\${tag.command} ${tag.name} does not name a declaration in this file`, {
          file: this.source.id,
          line: comment.span?.startLine,
        }),
      );
    }
  }

  private findMember(parentName: string | undefined, memberName: string): Member | undefined {
    for (const unit of this.declarations) {
      if (parentName !== undefined && unit.name !== parentName) continue;
      const found = findIn(unit.members, memberName);
      if (found) return found;
    }
    return undefined;
  }

  /** `typedef struct Zippy Zippy;` next to `struct Zippy {...}` documents one type, not two. */
  private mergeTagAliases(): void {
    for (const unit of [...this.declarations]) {
      if (unit.details.kind !== 'typedef' || !unit.details.target || unit.details.target.tag !== unit.name) continue;
      const { record } = unit.details.target;
      const target = this.declarations.find(
        d => d.kind === record && d.name === unit.name && d.details.kind === 'record' && d.details.hasBody,
      );
      if (!target || target.details.kind !== 'record') continue;
      if (!target.details.aliases.includes(unit.name)) target.details.aliases.push(unit.name);
      if (!target.documented && unit.documented) {
        target.comment = unit.comment;
        target.document = unit.document;
        target.documented = true;
      }
      this.declarations.splice(this.declarations.indexOf(unit), 1);
      for (let i = this.groupEvents.length - 1; i >= 0; i--) {
        const event = this.groupEvents[i];
        if (event.type === 'member' && event.declarationId === unit.id) this.groupEvents.splice(i, 1);
      }
    }
  }
}

function findIn(members: Member[], name: string): Member | undefined {
  for (const member of members) {
    if (member.name === name) return member;
    const nested = findIn(member.members, name);
    if (nested) return nested;
  }
  return undefined;
}

function matchesCommand(unit: DeclarationUnit, command: Extract<BlockTag, { tag: 'target' }>['command']): boolean {
  switch (command) {
    case 'fn':
      return unit.kind === 'function' || unit.kind === 'macro';
    case 'def':
      return unit.kind === 'macro';
    case 'var':
      return unit.kind === 'variable';
    case 'typedef':
      return unit.kind === 'typedef' || (unit.details.kind === 'record' && unit.details.aliases.includes(unit.name));
    case 'struct':
    case 'union':
    case 'enum':
      return unit.kind === command;
  }
}
