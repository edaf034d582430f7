import type { DeclarationUnit, Member } from '../model/declaration.js';
import { diagnostic } from '../model/diagnostic.js';
import type { Diagnostic, SourceLocation } from '../model/diagnostic.js';
import type { BlockNode, LinkNode, LinkTarget } from '../model/document.js';
import type { Group } from '../model/group.js';
import { inlineNodes } from '../markup/sections.js';

export type Resolution =
  | { kind: 'declaration'; declaration: DeclarationUnit }
  | { kind: 'member'; parent: DeclarationUnit; member: Member }
  | { kind: 'group'; group: Group };

export type SeeAlsoEntry =
  | Resolution
  | { kind: 'url'; url: string; text: string }
  | { kind: 'unresolved'; name: string };

export type Resolve = (target: LinkTarget) => Resolution | null;

export interface ReferenceScan {
  /** `\sa` entries in the order written; unresolved names are kept. */
  explicit: SeeAlsoEntry[];
  /** Resolved `#Symbol`, `\ref` and markdown symbol links in document order. */
  inline: Resolution[];
  diagnostics: Diagnostic[];
}

export function targetName(target: LinkTarget): string {
  switch (target.kind) {
    case 'symbol':
      return target.name;
    case 'member':
      return `${target.parent}::${target.name}`;
    case 'url':
      return target.url;
  }
}

function* documentLinks(document: readonly BlockNode[], members: readonly Member[]): Generator<LinkNode> {
  for (const node of inlineNodes(document)) {
    if (node.type === 'link') yield node;
  }
  for (const member of members) {
    yield* documentLinks(member.document, member.members);
  }
}

/**
 * Resolve every link of a document (and of its members' documents). `#Name` that
 * resolves to nothing is reported as info; `\ref` and `\sa` as a warning.
 */
export function collectReferences(
  document: readonly BlockNode[],
  members: readonly Member[],
  resolve: Resolve,
  location: SourceLocation,
): ReferenceScan {
  const scan: ReferenceScan = { explicit: [], inline: [], diagnostics: [] };
  const reported = new Set<string>();

  for (const link of documentLinks(document, members)) {
    if (link.target.kind === 'url') {
      if (link.origin === 'see') scan.explicit.push({ kind: 'url', url: link.target.url, text: link.text });
      continue;
    }
    const resolution = resolve(link.target);
    const name = targetName(link.target);
    if (link.origin === 'see') {
      scan.explicit.push(resolution ?? { kind: 'unresolved', name });
    } else if (resolution) {
      scan.inline.push(resolution);
    }

    if (resolution || reported.has(name)) continue;
    reported.add(name);
    scan.diagnostics.push(
      link.origin === 'hash'
        ? diagnostic('info', 'unresolved-symbol', `#${name} does not name a documented symbol`, location)
        : diagnostic('warning', 'unresolved-reference', `Reference to unknown symbol ${name}`, location),
    );
  }
  return scan;
}

export function entryKey(entry: SeeAlsoEntry): string {
  switch (entry.kind) {
    case 'declaration':
      return `declaration:${entry.declaration.id}`;
    case 'member':
      return `declaration:${entry.parent.id}`;
    case 'group':
      return `group:${entry.group.name}`;
    case 'url':
      return `url:${entry.url}`;
    case 'unresolved':
      return `name:${entry.name}`;
  }
}

export interface TypeReference {
  scope: 'tag' | 'ordinary';
  name: string;
}

const BUILTIN_WORDS = new Set([
  'void',
  'char',
  'short',
  'int',
  'long',
  'float',
  'double',
  'signed',
  'unsigned',
  '_Bool',
  'bool',
  '_Complex',
  'const',
  'volatile',
  'restrict',
  'register',
]);

/** Named types used by a function's parameters, in parameter order. */
export function parameterTypes(unit: DeclarationUnit): TypeReference[] {
  if (unit.details.kind !== 'function') return [];
  const refs: TypeReference[] = [];
  for (const parameter of unit.details.parameters) {
    const tagged = /\b(?:struct|union|enum)\s+([A-Za-z_]\w*)/.exec(parameter.type);
    if (tagged) {
      refs.push({ scope: 'tag', name: tagged[1] });
      continue;
    }
    const named = (parameter.type.match(/[A-Za-z_]\w*/g) ?? []).find(word => !BUILTIN_WORDS.has(word));
    if (named) refs.push({ scope: 'ordinary', name: named });
  }
  return refs;
}

/** A reference to a constant or field stands for its parent's page. */
function toPage(entry: SeeAlsoEntry): SeeAlsoEntry | null {
  if (entry.kind !== 'member') return entry;
  return entry.parent.name ? { kind: 'declaration', declaration: entry.parent } : null;
}

/**
 * See-also list: explicit entries first, then the types a function takes, then inline
 * references, then co-members of the declaration's groups. The declaration itself and
 * repeats are removed.
 */
export function computeSeeAlso(
  self: DeclarationUnit,
  scan: ReferenceScan,
  coMembers: readonly DeclarationUnit[],
  parameterPages: readonly DeclarationUnit[] = [],
): SeeAlsoEntry[] {
  const seen = new Set<string>([`declaration:${self.id}`]);
  const result: SeeAlsoEntry[] = [];
  const candidates: SeeAlsoEntry[] = [
    ...scan.explicit,
    ...parameterPages.map((declaration): SeeAlsoEntry => ({ kind: 'declaration', declaration })),
    ...scan.inline,
    ...coMembers.map((declaration): SeeAlsoEntry => ({ kind: 'declaration', declaration })),
  ];
  for (const candidate of candidates) {
    const entry = toPage(candidate);
    if (!entry) continue;
    const key = entryKey(entry);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(entry);
  }
  return result;
}
