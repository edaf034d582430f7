// Model types
export type {
  DeclarationUnit,
  DeclarationKind,
  DeclarationDetails,
  CommentBlock,
  Member,
  Parameter,
} from './model/declaration.js';
export { buildDeclarationId } from './model/declaration.js';
export type { BlockNode, InlineNode, LinkNode, LinkTarget } from './model/document.js';
export type { Group } from './model/group.js';
export type { Diagnostic, DiagnosticCode, Severity } from './model/diagnostic.js';
export { hasErrors } from './model/diagnostic.js';

// Parsing
export { scanSource } from './parser/scanner.js';
export type { ScanResult, ScannedBlock } from './parser/scanner.js';
export { classifyDeclaration } from './parser/classifier.js';
export type { Classification } from './parser/classifier.js';
export { parseComment } from './markup/blocks.js';
export type { ParsedComment } from './markup/blocks.js';
export { parseSourceFile } from './parser/source-file.js';
export type { ParsedFile, SourceInput } from './parser/source-file.js';

// Index and resolution
export { buildSymbolIndex, SymbolIndex } from './resolve/symbol-index.js';
export type { IndexOptions } from './resolve/symbol-index.js';
export type { Resolution, SeeAlsoEntry } from './resolve/resolver.js';

// Rendering
export { renderPage, renderPages, PageRenderer } from './render/page.js';
export type { RenderOptions, RenderedPage, PageSubject, Decoration } from './render/page.js';
export { readLiteralLines } from './render/roff.js';
export { segment } from './render/sentence.js';

// Pipeline
export { runPipeline } from './pipeline.js';
export type { PipelineOptions, PipelineResult } from './pipeline.js';

// Configuration and errors
export { loadConfig } from './config.js';
export type { RoffdocConfig } from './config.js';
export { RoffdocError, NoInputError, ConfigError, SourceReadError } from './errors.js';
