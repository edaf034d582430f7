import chalk from 'chalk';
import type { Diagnostic, Severity } from '../../model/diagnostic.js';
import type { RenderedPage } from '../../render/page.js';

const SYMBOLS: Record<Severity, string> = {
  error: chalk.red('✖'),
  warning: chalk.yellow('⚠'),
  info: chalk.blue('ℹ'),
};

const COLORS: Record<Severity, (text: string) => string> = {
  error: chalk.red,
  warning: chalk.yellow,
  info: chalk.blue,
};

export interface TerminalReport {
  diagnostics: readonly Diagnostic[];
  pages?: readonly RenderedPage[];
  /** Directory pages were written to. */
  output?: string;
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count !== 1 ? 's' : ''}`;
}

export function formatTerminal(report: TerminalReport): string {
  const lines: string[] = [];

  const byFile = new Map<string, Diagnostic[]>();
  for (const item of report.diagnostics) {
    const file = item.file ?? '(run)';
    const list = byFile.get(file) ?? [];
    list.push(item);
    byFile.set(file, list);
  }

  for (const [file, items] of byFile) {
    const header = `─ ${file} `;
    const padLen = Math.max(0, 55 - header.length);
    lines.push(chalk.dim(`┌${header}${'─'.repeat(padLen)}`));
    lines.push(chalk.dim('│'));
    for (const item of items) {
      const location = item.line !== undefined ? String(item.line).padStart(5) : '     ';
      const tag = COLORS[item.severity](`[${item.code}]`);
      lines.push(chalk.dim('│  ') + `${SYMBOLS[item.severity]} ${chalk.dim(location)}  ${item.message} ${tag}`);
    }
    lines.push(chalk.dim('│'));
    lines.push(chalk.dim('└' + '─'.repeat(55)));
    lines.push('');
  }

  if (report.pages) {
    const where = report.output ? ` to ${report.output}` : '';
    lines.push(chalk.bold(`Wrote ${plural(report.pages.length, 'page')}${where}`));
  }

  const counts = { error: 0, warning: 0, info: 0 };
  for (const item of report.diagnostics) counts[item.severity]++;
  const parts: string[] = [];
  if (counts.error > 0) parts.push(chalk.red(plural(counts.error, 'error')));
  if (counts.warning > 0) parts.push(chalk.yellow(plural(counts.warning, 'warning')));
  if (counts.info > 0) parts.push(chalk.blue(plural(counts.info, 'note')));
  lines.push(parts.length > 0 ? `Summary: ${parts.join(', ')}` : chalk.dim('No problems found.'));

  return lines.join('\n');
}
