import type { TargetRepairReport } from '@fieldmend/core';

/**
 * Print per-literal repair reports to stderr, one JSON line per file.
 * Intended to be used behind the --debug flag.
 */
export function printRepairDebug(report: TargetRepairReport): void {
  if (report.files.length === 0) {
    process.stderr.write(`[fieldmend] literals(${report.target}): <no files>\n`);
    return;
  }

  for (const file of report.files) {
    const literals = file.literals.map((literal) => ({
      tag: literal.tag,
      line: literal.line,
      status: literal.status,
      actions: literal.actions,
      malformed: literal.malformed.map((error) => ({
        segmentIndex: error.segmentIndex,
        message: error.message,
      })),
    }));
    process.stderr.write(
      `[fieldmend] literals(${file.filePath}): ${JSON.stringify(literals)}\n`
    );
  }
}
