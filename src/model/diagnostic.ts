export type Severity = 'error' | 'warning' | 'info';

export type DiagnosticCode =
  | 'unterminated-comment'
  | 'unterminated-code'
  | 'unbalanced-group'
  | 'unknown-command'
  | 'unresolved-symbol'
  | 'unresolved-reference'
  | 'duplicate-symbol'
  | 'unmatched-target'
  | 'group-cycle'
  | 'ambiguous-declaration'
  | 'malformed-table'
  | 'page-collision'
  | 'missing-example'
  | 'internal-error';

export interface Diagnostic {
  severity: Severity;
  code: DiagnosticCode;
  message: string;
  file?: string;
  line?: number;
}

export interface SourceLocation {
  file?: string;
  line?: number;
}

export function diagnostic(
  severity: Severity,
  code: DiagnosticCode,
  message: string,
  location: SourceLocation = {},
): Diagnostic {
  const result: Diagnostic = { severity, code, message };
  if (location.file !== undefined) result.file = location.file;
  if (location.line !== undefined) result.line = location.line;
  return result;
}

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some(d => d.severity === 'error');
}

/** Re-anchor diagnostics produced against a fragment (e.g. a comment body) onto its file. */
export function relocate(diagnostics: readonly Diagnostic[], file: string, lineOffset = 0): Diagnostic[] {
  return diagnostics.map(d => ({
    ...d,
    file: d.file ?? file,
    line: d.line !== undefined ? d.line + lineOffset : undefined,
  }));
}
