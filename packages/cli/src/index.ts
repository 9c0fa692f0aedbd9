#!/usr/bin/env node

// CLI entry point
// - Command name: `fieldmend [path]`, path defaulting to `src`.
// - Repairs every registered literal in the files under `path` and prints one line per
//   file; failures render as error views on stderr and the run carries on.
// - Exit code: 0 when every file was processed, the first failure's exit code otherwise,
//   1 under --check when some file would change.

import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Command, CommanderError } from 'commander';
import {
  ErrorPresenter,
  InternalError,
  RepairMetricsCollector,
  SchemaRegistry,
  loadRegistryConfig,
  repairTarget,
  resolveOptions,
  toFieldmendError,
  type FieldmendError,
  type TargetRepairReport,
} from '@fieldmend/core';
import { buildRepairOptions, type CliOptions } from './flags.js';
import { printRepairDebug } from './debug.js';
import {
  formatFileLine,
  formatSkippedWarnings,
  renderCLIView,
} from './render.js';

export const DEFAULT_TARGET = 'src';

/**
 * Run one repair over `target` and return the process exit code
 */
export async function runRepairCommand(
  target: string,
  options: CliOptions
): Promise<number> {
  try {
    const loaded = options.config
      ? await loadRegistryConfig(options.config)
      : undefined;
    const registry = loaded?.registry ?? SchemaRegistry.defaults();
    const resolved = resolveOptions(
      buildRepairOptions(options, loaded?.options)
    );

    if (options.debug) {
      process.stderr.write(
        `[fieldmend] effective config: ${JSON.stringify({ ...resolved, tags: registry.tags })}\n`
      );
    }

    const metrics = new RepairMetricsCollector({
      enabled: options.printMetrics === true,
    });
    const report = await repairTarget(target, registry, resolved, metrics);
    const exitCode = reportFiles(report, resolved.dryRun);

    if (options.debug) {
      printRepairDebug(report);
    }
    if (metrics.isEnabled()) {
      process.stderr.write(
        `[fieldmend] metrics: ${JSON.stringify(metrics.snapshot())}\n`
      );
    }

    if (exitCode === 0 && options.check === true && report.changed > 0) {
      return 1;
    }
    return exitCode;
  } catch (err: unknown) {
    return handleCliError(err);
  }
}

function reportFiles(report: TargetRepairReport, dryRun: boolean): number {
  let exitCode = 0;
  for (const file of report.files) {
    if (file.status === 'failed') {
      const error =
        file.error ?? new InternalError(`Failed to repair ${file.filePath}`);
      printError(error);
      if (exitCode === 0) exitCode = error.getExitCode();
      continue;
    }

    const line = formatFileLine(file, dryRun);
    if (line) process.stdout.write(`${line}\n`);
    for (const warning of formatSkippedWarnings(file)) {
      process.stderr.write(`${warning}\n`);
    }
  }
  return exitCode;
}

function printError(error: FieldmendError): void {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });
  process.stderr.write(`${renderCLIView(presenter.formatForCLI(error))}\n`);
}

function handleCliError(err: unknown): number {
  const error = toFieldmendError(err);
  printError(error);
  return error.getExitCode();
}

export function createProgram(onExit: (code: number) => void): Command {
  const program = new Command();

  program
    .name('fieldmend')
    .description('Repair malformed error-construction literals in source files')
    .version('0.1.0')
    .argument('[path]', 'File or directory to repair', DEFAULT_TARGET)
    .option('--ext <list>', 'Comma separated file extensions (default: .rs)')
    .option('--config <file>', 'Schema registry JSON file')
    .option('--indent <n>', 'Spaces per indent level for rewritten fields')
    .option('--dry-run', 'Report what would change without writing', false)
    .option('--check', 'Like --dry-run, exit 1 when a file would change', false)
    .option('--print-metrics', 'Print run metrics as JSON to stderr', false)
    .option('--debug', 'Print per-literal reports to stderr', false)
    .action(async (target: string, options: CliOptions) => {
      onExit(await runRepairCommand(target, options));
    });

  return program;
}

/**
 * Parse `argv` and run the command; resolves with the exit code instead of
 * exiting so callers decide what to do with it.
 */
export async function runCli(argv: string[] = process.argv): Promise<number> {
  let exitCode = 0;
  const program = createProgram((code) => {
    exitCode = code;
  });
  program.exitOverride();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    // --help, --version and usage errors were already printed by commander
    if (error instanceof CommanderError) return error.exitCode;
    return handleCliError(error);
  }
  return exitCode;
}

const entryArg = process.argv[1];
const entryFile =
  typeof entryArg === 'string' && fs.existsSync(entryArg)
    ? fs.realpathSync(entryArg)
    : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  process.exitCode = await runCli();
}
