import type { RoffdocError } from '../../errors.js';
import type { Diagnostic } from '../../model/diagnostic.js';
import type { RenderedPage } from '../../render/page.js';

export interface JsonReport {
  diagnostics: readonly Diagnostic[];
  pages?: readonly RenderedPage[];
}

export function formatJson(report: JsonReport): string {
  return JSON.stringify({
    summary: {
      errors: report.diagnostics.filter(d => d.severity === 'error').length,
      warnings: report.diagnostics.filter(d => d.severity === 'warning').length,
      info: report.diagnostics.filter(d => d.severity === 'info').length,
      pages: report.pages?.length ?? 0,
    },
    diagnostics: report.diagnostics,
    pages: (report.pages ?? []).map(p => ({
      title: p.title,
      target: p.target,
      kind: p.kind,
      name: p.name,
      section: p.section,
      sourceId: p.sourceId,
    })),
  }, null, 2);
}

/** A run that stopped before producing diagnostics. */
export function formatJsonError(error: RoffdocError): string {
  return JSON.stringify({ error: error.toJSON() }, null, 2);
}
