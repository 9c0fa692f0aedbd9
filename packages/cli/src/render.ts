import type { CLIErrorView, FileRepairReport } from '@fieldmend/core';

// Minimal ANSI helpers (no external deps)
const ANSI = {
  reset: '\u001B[0m',
  red: '\u001B[31m',
  bold: '\u001B[1m',
};

function colorize(text: string, useColor: boolean, color: string): string {
  if (!useColor) return text;
  return `${color}${text}${ANSI.reset}`;
}

function wrapText(text: string, width: number): string {
  if (!text) return '';
  const words = text.split(/\s+/);
  const lines: string[] = [];
  let line = '';
  for (const word of words) {
    if ((line + (line ? ' ' : '') + word).length > width) {
      if (line) lines.push(line);
      line = word;
    } else {
      line = line ? `${line} ${word}` : word;
    }
  }
  if (line) lines.push(line);
  return lines.join('\n');
}

export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth || 80;
  const lines: string[] = [];

  const title = `❌ ${view.title}`;
  lines.push(
    colorize(colorize(title, view.colors, ANSI.bold), view.colors, ANSI.red)
  );

  if (view.location) {
    // Paths stay on one line so they can be copied
    lines.push(`📍 ${view.location}`);
  }
  if (view.excerpt) {
    // Excerpts are raw source text
    lines.push(wrapText(`Excerpt: ${stripAnsi(view.excerpt)}`, width));
  }
  if (view.workaround) {
    lines.push(wrapText(`💡 Workaround: ${view.workaround}`, width));
  }

  return lines.join('\n');
}

export function stripAnsi(input: string): string {
  // Simple ANSI escape code stripper
  const ansiRe =
    /[\u001B\u009B][[\]()#;?]*(?:\d{1,4}(?:;\d{0,4})*)?[\dA-PR-TZcf-ntqry=><~]/g; // eslint-disable-line no-control-regex
  return input.replace(ansiRe, '');
}

/**
 * The stdout line for one processed file; failed files have none, their
 * error view goes to stderr.
 */
export function formatFileLine(
  report: FileRepairReport,
  dryRun: boolean
): string | undefined {
  switch (report.status) {
    case 'changed':
      return dryRun ? `Would fix ${report.filePath}` : `Fixed ${report.filePath}`;
    case 'unchanged':
      return `No changes needed in ${report.filePath}`;
    case 'failed':
      return undefined;
  }
}

/** One warning line per literal left as written because of a malformed segment */
export function formatSkippedWarnings(report: FileRepairReport): string[] {
  const warnings: string[] = [];
  for (const literal of report.literals) {
    const [first] = literal.malformed;
    if (literal.status !== 'skipped' || !first) continue;
    warnings.push(
      `[fieldmend] warning: ${report.filePath}:${literal.line} ${literal.tag} literal left unchanged (${first.message})`
    );
  }
  return warnings;
}

export default renderCLIView;
