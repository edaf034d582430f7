import type { DeclarationKind, DeclarationUnit, Member } from '../model/declaration.js';
import { diagnostic } from '../model/diagnostic.js';
import type { Diagnostic } from '../model/diagnostic.js';
import { plainText, textRun } from '../model/document.js';
import type { InlineNode } from '../model/document.js';
import type { Group } from '../model/group.js';
import { sectionsOf } from '../markup/sections.js';
import type { DocumentSections } from '../markup/sections.js';
import type { Resolution, SeeAlsoEntry } from '../resolve/resolver.js';
import type { SymbolIndex } from '../resolve/symbol-index.js';
import { includeName, stem } from '../utils/path.js';
import { renderAdmonition, renderBlocks, renderCode } from './blocks.js';
import { inlineText, renderInline } from './inline.js';
import type { InlineContext } from './inline.js';
import { Roff, escapeText, guardLine, quoteArgument } from './roff.js';
import { renderSynopsis } from './synopsis.js';

export interface Decoration {
  preamble?: string;
  epilogue?: string;
}

export interface ProjectInfo {
  name?: string;
  brief?: string;
  version?: string;
}

export interface RenderOptions {
  /** Manual section; `3` unless configured. */
  section?: string;
  topic?: string;
  project?: ProjectInfo;
  footerMiddle?: string;
  footerInside?: string;
  headerMiddle?: string;
  /** Fill an unset footer with today's date and the project version. */
  autofill?: boolean;
  /** Date used by `autofill`. */
  date?: Date;
  includePath?: 'short' | 'full';
  /** Decorations keyed by source file id or group name. */
  decorations?: Record<string, Decoration>;
  defaultDecoration?: Decoration;
  /** Example sources keyed by the file name given to `\example`. */
  examples?: Record<string, string>;
  /** Keep bold, italic and strikethrough fonts; on unless set to false. */
  preserveStyles?: boolean;
}

export type PageKind = DeclarationKind | 'group';

export interface RenderedPage {
  /** Page topic as it appears in `name(section)` references. */
  title: string;
  /** Output file name, e.g. `foo_open.3`. */
  target: string;
  body: string;
  kind: PageKind;
  name: string;
  section: string;
  /** Source file id, or the group name for group pages. */
  sourceId: string;
}

export type PageSubject = { kind: 'declaration'; declaration: DeclarationUnit } | { kind: 'group'; group: Group };

interface PlannedPage {
  subject: PageSubject;
  title: string;
  target: string;
}

export interface RenderResult {
  pages: RenderedPage[];
  diagnostics: Diagnostic[];
}

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

const FILE_CATEGORIES: [DeclarationKind, string][] = [
  ['function', 'Functions'],
  ['macro', 'Defines'],
  ['enum', 'Enumerations'],
  ['struct', 'Structures'],
  ['union', 'Unions'],
  ['typedef', 'Typedefs'],
  ['variable', 'Variables'],
];

type TextSection = 'deprecated' | 'authors' | 'bugs' | 'since';

const TEXT_SECTIONS: [TextSection, string][] = [
  ['deprecated', 'DEPRECATED'],
  ['authors', 'AUTHORS'],
  ['bugs', 'BUGS'],
  ['since', 'SINCE'],
];

/** Lowercase the first letter unless it starts an acronym. */
export function lowerify(text: string): string {
  if (text.length >= 2 && isUpper(text[0]) && !isUpper(text[1])) {
    return text[0].toLowerCase() + text.slice(1);
  }
  return text;
}

function isUpper(ch: string): boolean {
  return ch !== ch.toLowerCase() && ch === ch.toUpperCase();
}

/** Brief as used on the NAME line: first letter lowered, trailing periods dropped. */
export function briefify(brief: string): string {
  return lowerify(brief.trim()).replace(/\.+$/, '');
}

function ordinal(day: number): string {
  if (day % 100 >= 11 && day % 100 <= 13) return `${day}th`;
  return `${day}${['th', 'st', 'nd', 'rd', 'th'][Math.min(day % 10, 4)]}`;
}

export function formatDate(date: Date): string {
  return `${MONTHS[date.getMonth()]} ${ordinal(date.getDate())} ${date.getFullYear()}`;
}

/** The `.TH` line; trailing empty fields are left out. */
export function headingLine(options: RenderOptions, fallbackTopic: string): string {
  const quote = (text: string): string => `"${text.replace(/"/g, '\\(dq')}"`;
  const project = options.project ?? {};
  const fields = [quote(options.topic ?? project.name?.toUpperCase() ?? fallbackTopic.toUpperCase())];
  fields.push(quote(options.section ?? '3'));

  if (options.footerMiddle !== undefined) fields.push(quote(options.footerMiddle));
  else if (options.autofill) fields.push(quote(formatDate(options.date ?? new Date())));
  else fields.push('');

  if (options.footerInside !== undefined) fields.push(quote(options.footerInside));
  else if (options.autofill && project.name && project.version) fields.push(quote(`${project.name} ${project.version}`));
  else fields.push('');

  fields.push(options.headerMiddle !== undefined ? quote(options.headerMiddle) : '');

  while (fields.length > 0 && fields[fields.length - 1] === '') fields.pop();
  return `.TH ${fields.join(' ')}`;
}

function subjectKey(subject: PageSubject): string {
  return subject.kind === 'group' ? `group:${subject.group.name}` : `declaration:${subject.declaration.id}`;
}

function subjectKind(subject: PageSubject): PageKind {
  return subject.kind === 'group' ? 'group' : subject.declaration.kind;
}

/**
 * Renders every page of a run. Page names are assigned up front so links can point at
 * pages renamed by a collision.
 */
export class PageRenderer {
  readonly diagnostics: Diagnostic[] = [];
  private readonly planned: PlannedPage[] = [];
  private readonly titles = new Map<string, string>();
  private readonly section: string;

  constructor(
    private readonly index: SymbolIndex,
    private readonly options: RenderOptions = {},
  ) {
    this.section = options.section ?? '3';
    this.plan();
  }

  /** Page subjects in output order: per file its file page then declarations; groups last. */
  subjects(): PageSubject[] {
    return this.planned.map(page => page.subject);
  }

  private hasPage(declaration: DeclarationUnit): boolean {
    if (!this.index.isListed(declaration) || declaration.kind === 'file') return false;
    return declaration.name !== '';
  }

  private plan(): void {
    const subjects: PageSubject[] = [];
    for (const file of this.index.files()) {
      const declarations = this.index.declarationsIn(file);
      const fileUnit = declarations.find(declaration => declaration.kind === 'file');
      if (fileUnit) subjects.push({ kind: 'declaration', declaration: fileUnit });
      for (const declaration of declarations) {
        if (this.hasPage(declaration)) subjects.push({ kind: 'declaration', declaration });
      }
    }
    for (const group of this.index.groups()) subjects.push({ kind: 'group', group });

    const taken = new Set<string>();
    for (const subject of subjects) {
      let title = this.baseTitle(subject);
      let target = `${title.toLowerCase()}.${this.section}`;
      if (taken.has(target)) {
        const renamed = `${title}-${subjectKind(subject)}`;
        this.diagnostics.push(
          diagnostic('warning', 'page-collision', `Page ${target} already exists; writing ${renamed.toLowerCase()}.${this.section}`, {
            file: subject.kind === 'declaration' ? subject.declaration.filePath : subject.group.files[0],
            line: subject.kind === 'declaration' ? subject.declaration.span.startLine : undefined,
          }),
        );
        title = renamed;
        target = `${title.toLowerCase()}.${this.section}`;
      }
      taken.add(target);
      this.titles.set(subjectKey(subject), title);
      this.planned.push({ subject, title, target });
    }
  }

  private baseTitle(subject: PageSubject): string {
    if (subject.kind === 'group') return subject.group.name;
    const { declaration } = subject;
    return declaration.kind === 'file' ? stem(declaration.filePath) : declaration.name;
  }

  pageName(resolution: Resolution): string | null {
    switch (resolution.kind) {
      case 'declaration':
        return this.titles.get(`declaration:${resolution.declaration.id}`) ?? null;
      case 'group':
        return this.titles.get(`group:${resolution.group.name}`) ?? null;
      case 'member':
        return null;
    }
  }

  private context(parameters: ReadonlySet<string> = new Set()): InlineContext {
    return {
      resolve: target => this.index.resolve(target),
      pageName: resolution => this.pageName(resolution),
      section: this.section,
      parameters,
      preserveStyles: this.options.preserveStyles !== false,
    };
  }

  renderAll(): RenderedPage[] {
    return this.planned.map(page => this.renderPlanned(page));
  }

  render(subject: PageSubject): RenderedPage {
    const page = this.planned.find(candidate => subjectKey(candidate.subject) === subjectKey(subject));
    if (page) return this.renderPlanned(page);
    const title = this.baseTitle(subject);
    return this.renderPlanned({ subject, title, target: `${title.toLowerCase()}.${this.section}` });
  }

  private renderPlanned(page: PlannedPage): RenderedPage {
    const { subject } = page;
    const body =
      subject.kind === 'group'
        ? this.groupBody(subject.group)
        : subject.declaration.kind === 'file'
          ? this.fileBody(subject.declaration)
          : this.declarationBody(subject.declaration);
    const sourceId = subject.kind === 'group' ? subject.group.name : subject.declaration.filePath;
    const decoration = this.options.decorations?.[sourceId] ?? this.options.defaultDecoration ?? {};
    let preamble = decoration.preamble ?? '';
    // .TH starts a line of its own.
    if (preamble !== '' && !preamble.endsWith('\n')) preamble += '\n';

    return {
      title: page.title,
      target: page.target,
      body: `${preamble}${headingLine(this.options, page.title)}\n${body.toString()}\n${decoration.epilogue ?? ''}`,
      kind: subjectKind(subject),
      name: subject.kind === 'group' ? subject.group.name : subject.declaration.name,
      section: this.section,
      sourceId,
    };
  }

  // ─── Shared sections ───────────────────────────────────────────────────────

  private nameSection(roff: Roff, name: string, brief: readonly InlineNode[]): void {
    roff.macro('SH', 'NAME');
    const text = briefify(plainText(brief));
    roff.text(text ? `${escapeText(name)} \\- ${escapeText(text)}` : escapeText(name));

    const library = this.options.project?.brief?.trim();
    if (library) roff.macro('SH', 'LIBRARY').text(escapeText(library));
  }

  private descriptionSection(roff: Roff, sections: DocumentSections, ctx: InlineContext): void {
    if (sections.description.length > 0) {
      roff.macro('SH', 'DESCRIPTION').append(renderBlocks(sections.description, ctx));
    } else if (sections.brief.length > 0) {
      roff.macro('SH', 'DESCRIPTION').append(renderInline(sections.brief, ctx));
    }
  }

  /** Documentation of a member or parameter, indented under its `.TP` tag. */
  private memberDoc(sections: DocumentSections, ctx: InlineContext): Roff {
    if (sections.description.length > 0) return renderBlocks(sections.description, ctx).renameMacro('PP', 'IP');
    return renderInline(sections.brief, ctx);
  }

  private memberSection(roff: Roff, heading: string, members: readonly Member[], ctx: InlineContext, prefix = ''): void {
    if (prefix === '') roff.macro('SH', heading);
    for (const member of members) {
      const name = member.name ? `${prefix}${member.name}` : prefix.replace(/\.$/, '');
      if (member.name || member.document.length > 0) {
        roff.macro('TP').macro('BR', quoteArgument(name || member.signature));
        roff.append(this.memberDoc(sectionsOf(member.document), ctx));
      }
      if (member.members.length > 0) {
        this.memberSection(roff, heading, member.members, ctx, member.name ? `${prefix}${member.name}.` : prefix);
      }
    }
  }

  private parameterSections(roff: Roff, sections: DocumentSections, ctx: InlineContext): void {
    if (sections.params.length > 0) {
      roff.macro('SH', 'PARAMETERS');
      for (const param of sections.params) {
        const names = param.names.map(name => `\\f[I]${escapeText(name)}\\f[R]`).join(', ');
        roff.macro('TP').raw(param.direction ? `${names} [${param.direction}]` : names);
        roff.append(renderInline(param.children, ctx));
      }
    }

    if (sections.returns.length > 0 || sections.retvals.length > 0) {
      roff.macro('SH', 'RETURN VALUE');
      sections.returns.forEach((children, index) => {
        if (index > 0) roff.macro('PP');
        roff.append(renderInline(children, ctx));
      });
      for (const retval of sections.retvals) {
        roff.macro('TP').raw(guardLine(escapeText(retval.value)));
        roff.append(renderInline(retval.children, ctx));
      }
    }
  }

  private trailingSections(roff: Roff, subject: DeclarationUnit, sections: DocumentSections, ctx: InlineContext): void {
    const examples = this.index.examplesOf(subject);
    if (examples.length > 0) {
      roff.macro('SH', 'EXAMPLES');
      examples.forEach((file, index) => {
        if (index > 0) roff.macro('PP');
        const tag = sections.examples.find(example => example.file === file);
        if (tag && tag.children.length > 0) roff.append(renderInline(tag.children, ctx));
        else roff.text(`\\f[I]${escapeText(file)}\\f[R]`);
        const source = this.options.examples?.[file];
        if (source === undefined) {
          this.diagnostics.push(
            diagnostic('warning', 'missing-example', `Example ${file} was not supplied`, {
              file: subject.filePath,
              line: subject.span.startLine,
            }),
          );
          return;
        }
        roff.append(renderCode({ type: 'code', lines: source.replace(/\n$/, '').split('\n') }));
      });
    }

    if (sections.notes.length > 0) {
      roff.macro('SH', 'NOTES');
      sections.notes.forEach((note, index) => {
        if (index > 0) roff.macro('PP');
        roff.append(renderAdmonition(note, ctx));
      });
    }

    for (const [key, heading] of TEXT_SECTIONS) {
      const entries = sections[key];
      if (entries.length === 0) continue;
      roff.macro('SH', heading);
      entries.forEach((children, index) => {
        if (index > 0) roff.macro('PP');
        roff.append(renderInline(children, ctx));
      });
    }

    this.seeAlsoSection(roff, this.index.seeAlso(subject));
  }

  private seeAlsoSection(roff: Roff, entries: readonly SeeAlsoEntry[]): void {
    if (entries.length === 0) return;
    roff.macro('SH', '"SEE ALSO"');
    entries.forEach((entry, index) => {
      const comma = index < entries.length - 1 ? ',' : '';
      switch (entry.kind) {
        case 'declaration':
        case 'group': {
          const name = this.pageName(entry);
          if (name === null) {
            roff.macro('I', `${quoteArgument(entry.kind === 'group' ? entry.group.name : entry.declaration.name)}${comma}`);
          } else {
            roff.macro('BR', `${quoteArgument(name)} (${this.section})${comma}`);
          }
          break;
        }
        case 'member':
          roff.macro('B', `${quoteArgument(entry.member.name)}${comma}`);
          break;
        case 'url':
          roff.macro('UR', escapeText(entry.url));
          if (entry.text && entry.text !== entry.url) roff.text(escapeText(entry.text));
          roff.macro('UE', comma || undefined);
          break;
        case 'unresolved':
          roff.macro('I', `${quoteArgument(entry.name)}${comma}`);
          break;
      }
    });
  }

  // ─── Page kinds ────────────────────────────────────────────────────────────

  private parameterNames(declaration: DeclarationUnit, sections: DocumentSections): Set<string> {
    const names = new Set(sections.params.flatMap(param => param.names));
    const { details } = declaration;
    if (details.kind === 'function') {
      for (const parameter of details.parameters) if (parameter.name) names.add(parameter.name);
    }
    if (details.kind === 'macro') for (const parameter of details.parameters ?? []) names.add(parameter);
    return names;
  }

  private declarationBody(declaration: DeclarationUnit): Roff {
    const sections = sectionsOf(declaration.document);
    const documented = new Set(sections.params.flatMap(param => param.names));
    const ctx = this.context(this.parameterNames(declaration, sections));
    const roff = new Roff();

    this.nameSection(roff, declaration.name, sections.brief);
    roff.macro('SH', 'SYNOPSIS');
    roff.append(renderSynopsis(declaration, includeName(declaration.filePath, this.options.includePath ?? 'short'), documented));
    this.descriptionSection(roff, sections, ctx);

    if (declaration.kind === 'struct' || declaration.kind === 'union') {
      this.memberSection(roff, 'FIELDS', declaration.members, ctx);
    } else if (declaration.kind === 'enum') {
      this.memberSection(roff, 'CONSTANTS', declaration.members, ctx);
    }

    this.parameterSections(roff, sections, ctx);
    this.trailingSections(roff, declaration, sections, ctx);
    return roff;
  }

  private listing(declarations: readonly DeclarationUnit[]): Roff {
    const roff = new Roff();
    const categories = FILE_CATEGORIES.map(([kind, heading]) => ({
      heading,
      entries: declarations.filter(declaration => declaration.kind === kind),
    })).filter(category => category.entries.length > 0);
    if (categories.length === 0) return roff;

    roff.macro('TS').raw('tab(;);');
    categories.forEach((category, index) => {
      if (index > 0) roff.macro('T&');
      roff.raw('l l.');
      roff.raw(`\\f[B]${category.heading}\\f[R];\\f[B]Description\\f[R]`);
      roff.raw('_');
      for (const declaration of category.entries) {
        const name = this.titles.get(`declaration:${declaration.id}`) ?? declaration.name;
        const brief = inlineText(sectionsOf(declaration.document).brief, this.context());
        roff.raw(`\\f[B]${escapeText(name)}\\f[R](${this.section});T{`);
        roff.raw(brief === '' ? '\\&' : guardLine(brief));
        roff.raw('T}');
      }
    });
    return roff.macro('TE');
  }

  private fileBody(unit: DeclarationUnit): Roff {
    const sections = sectionsOf(unit.document);
    const ctx = this.context();
    const roff = new Roff();
    const include = includeName(unit.filePath, this.options.includePath ?? 'short');

    this.nameSection(roff, includeName(unit.filePath, 'short'), sections.brief);
    roff.macro('SH', 'SYNOPSIS').append(renderSynopsis(unit, include));
    this.descriptionSection(roff, sections, ctx);

    const paged = this.index.declarationsIn(unit.filePath).filter(declaration => this.hasPage(declaration));
    const ungrouped: DeclarationUnit[] = [];
    const grouped = new Map<string, { group: Group; members: DeclarationUnit[] }>();
    for (const declaration of paged) {
      const group = this.index.groupsOf(declaration)[0];
      if (!group) {
        ungrouped.push(declaration);
        continue;
      }
      const entry = grouped.get(group.name) ?? { group, members: [] };
      entry.members.push(declaration);
      grouped.set(group.name, entry);
    }

    roff.macro('SH', 'MEMBERS').append(this.listing(ungrouped));
    const ordered = [...grouped.values()].sort((a, b) => a.group.order - b.group.order);
    for (const { group, members } of ordered) {
      roff.macro('SS', quoteArgument(group.title));
      if (group.description.length > 0) roff.append(renderBlocks(group.description, ctx));
      else if (group.brief.length > 0) roff.append(renderInline(group.brief, ctx));
      roff.macro('PP').append(this.listing(members));
    }

    this.trailingSections(roff, unit, sections, ctx);
    return roff;
  }

  private groupBody(group: Group): Roff {
    const ctx = this.context();
    const roff = new Roff();
    this.nameSection(roff, group.name, group.brief.length > 0 ? group.brief : [textRun(group.title)]);

    if (group.files.length > 0) {
      roff.macro('SH', 'SYNOPSIS').macro('nf');
      for (const file of group.files) {
        roff.macro('B', `#include <${escapeText(includeName(file, this.options.includePath ?? 'short'))}>`);
      }
      roff.macro('fi');
    }

    if (group.description.length > 0) {
      roff.macro('SH', 'DESCRIPTION').append(renderBlocks(group.description, ctx));
    } else if (group.brief.length > 0) {
      roff.macro('SH', 'DESCRIPTION').append(renderInline(group.brief, ctx));
    }

    roff.macro('SH', 'MEMBERS');
    const members: PageSubject[] = [
      ...this.index
        .membersOf(group)
        .filter(declaration => this.hasPage(declaration))
        .map((declaration): PageSubject => ({ kind: 'declaration', declaration })),
      ...group.children.flatMap((name): PageSubject[] => {
        const child = this.index.group(name);
        return child ? [{ kind: 'group', group: child }] : [];
      }),
    ];
    for (const member of members) {
      const name = this.titles.get(subjectKey(member));
      if (name === undefined) continue;
      const brief = member.kind === 'group' ? member.group.brief : sectionsOf(member.declaration.document).brief;
      roff.macro('TP').macro('BR', `${quoteArgument(name)} (${this.section})`);
      roff.append(renderInline(brief, ctx));
    }

    const related: SeeAlsoEntry[] = [];
    const parent = group.parent === undefined ? undefined : this.index.group(group.parent);
    if (parent) related.push({ kind: 'group', group: parent });
    this.seeAlsoSection(roff, related);
    return roff;
  }
}

/** Render one page against an already planned run. */
export function renderPage(subject: PageSubject, renderer: PageRenderer): RenderedPage {
  return renderer.render(subject);
}

/** Every page of a run in output order, plus collision and missing-example diagnostics. */
export function renderPages(index: SymbolIndex, options: RenderOptions = {}): RenderResult {
  const renderer = new PageRenderer(index, options);
  const pages = renderer.renderAll();
  return { pages, diagnostics: renderer.diagnostics };
}
