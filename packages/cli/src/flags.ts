import { ConfigurationError, type RepairOptions } from '@fieldmend/core';

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  ext?: string;
  config?: string;
  indent?: string;
  dryRun?: boolean;
  check?: boolean;
  printMetrics?: boolean;
  debug?: boolean;
}

const MAX_INDENT = 16;

/**
 * Parse `--ext rs,.ron` into normalized extensions (leading dot, lower case)
 */
export function parseExtensions(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  const extensions = value
    .split(',')
    .map((entry) => entry.trim().toLowerCase())
    .filter(Boolean)
    .map((entry) => (entry.startsWith('.') ? entry : `.${entry}`));
  if (extensions.length === 0) {
    throw new ConfigurationError('--ext needs at least one extension');
  }
  return Array.from(new Set(extensions));
}

/**
 * Parse `--indent <n>` into an indent unit of n spaces
 */
export function parseIndent(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const width = Number(value);
  if (!Number.isInteger(width) || width < 1 || width > MAX_INDENT) {
    throw new ConfigurationError(
      `Invalid --indent "${value}": expected an integer between 1 and ${MAX_INDENT}`
    );
  }
  return ' '.repeat(width);
}

/**
 * Layer CLI flags over options carried by a registry config file.
 * Flags win; anything they leave unset falls through to the file.
 */
export function buildRepairOptions(
  options: CliOptions,
  fromConfig: RepairOptions = {}
): RepairOptions {
  const repairOptions: RepairOptions = { ...fromConfig };

  const extensions = parseExtensions(options.ext);
  if (extensions) repairOptions.extensions = extensions;

  const indentUnit = parseIndent(options.indent);
  if (indentUnit) repairOptions.indentUnit = indentUnit;

  if (options.dryRun === true || options.check === true) {
    repairOptions.dryRun = true;
  }
  return repairOptions;
}
