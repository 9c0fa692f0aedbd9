import type { Dirent } from 'node:fs';
import { readdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { SchemaRegistry } from '../schemas/registry.js';
import {
  FileAccessError,
  type FieldmendError,
  toFieldmendError,
} from '../types/errors.js';
import type { LiteralReport } from '../types/literal.js';
import { DEFAULT_OPTIONS, type ResolvedOptions } from '../types/options.js';
import { isErr } from '../types/result.js';
import type { MetricPhase, RepairMetricsCollector } from '../util/metrics.js';
import { repairSource } from './source-repair.js';

export type FileRepairStatus = 'changed' | 'unchanged' | 'failed';

export interface FileRepairReport {
  filePath: string;
  status: FileRepairStatus;
  /** True when the new content reached the disk */
  written: boolean;
  literals: LiteralReport[];
  error?: FieldmendError;
}

export interface TargetRepairReport {
  target: string;
  files: FileRepairReport[];
  changed: number;
  unchanged: number;
  failed: number;
}

/**
 * Files selected by a target path. A file is taken as-is whatever its
 * extension; a directory is walked recursively, skipping `ignoreDirs` and
 * keeping files whose extension is listed. Paths come back sorted.
 *
 * @throws FileAccessError when the target cannot be listed
 */
export async function collectTargetFiles(
  target: string,
  options: Pick<ResolvedOptions, 'extensions' | 'ignoreDirs'> = DEFAULT_OPTIONS
): Promise<string[]> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(target)).isDirectory();
  } catch (error) {
    throw listError(target, error);
  }
  if (!isDirectory) return [target];

  const extensions = new Set(options.extensions.map((ext) => ext.toLowerCase()));
  const ignored = new Set(options.ignoreDirs);
  const files: string[] = [];

  await walkDir(target, ignored, async (filePath) => {
    if (extensions.has(path.extname(filePath).toLowerCase())) {
      files.push(filePath);
    }
  });

  return files.sort();
}

async function walkDir(
  dir: string,
  ignored: ReadonlySet<string>,
  onFile: (filePath: string) => Promise<void>
): Promise<void> {
  let dirents: Dirent[];
  try {
    dirents = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    throw listError(dir, error);
  }
  for (const dirent of dirents) {
    const fullPath = path.join(dir, dirent.name);
    if (dirent.isDirectory()) {
      if (ignored.has(dirent.name)) continue;
      await walkDir(fullPath, ignored, onFile);
    } else if (dirent.isFile()) {
      await onFile(fullPath);
    }
  }
}

/**
 * Repair one file in place. Failures are returned on the report, never
 * thrown, so a batch can carry on past them. The file is only rewritten
 * when a literal changed, through a sibling temp file and a rename.
 */
export async function repairFile(
  filePath: string,
  registry: SchemaRegistry,
  options: ResolvedOptions = DEFAULT_OPTIONS,
  metrics?: RepairMetricsCollector
): Promise<FileRepairReport> {
  metrics?.increment('filesScanned');
  try {
    const { text, mode } = await timed(metrics, 'READ', () =>
      readSource(filePath)
    );

    const result = await timed(metrics, 'REPAIR', () =>
      repairSource(text, registry, options)
    );
    if (isErr(result)) {
      return failed(filePath, result.error.withFilePath(filePath), metrics);
    }

    const { literals } = result.value;
    recordLiterals(literals, metrics);

    if (!result.value.changed) {
      return { filePath, status: 'unchanged', written: false, literals };
    }
    metrics?.increment('filesChanged');
    if (options.dryRun) {
      return { filePath, status: 'changed', written: false, literals };
    }

    await timed(metrics, 'WRITE', () =>
      writeAtomically(filePath, result.value.newText, mode)
    );
    return { filePath, status: 'changed', written: true, literals };
  } catch (error) {
    return failed(filePath, toFieldmendError(error), metrics);
  }
}

/**
 * Repair every file selected by `target`, one after another.
 *
 * @throws FileAccessError when the target itself cannot be listed
 */
export async function repairTarget(
  target: string,
  registry: SchemaRegistry,
  options: ResolvedOptions = DEFAULT_OPTIONS,
  metrics?: RepairMetricsCollector
): Promise<TargetRepairReport> {
  const filePaths = await collectTargetFiles(target, options);
  const files: FileRepairReport[] = [];
  for (const filePath of filePaths) {
    files.push(await repairFile(filePath, registry, options, metrics));
  }

  return {
    target,
    files,
    changed: files.filter((file) => file.status === 'changed').length,
    unchanged: files.filter((file) => file.status === 'unchanged').length,
    failed: files.filter((file) => file.status === 'failed').length,
  };
}

async function readSource(
  filePath: string
): Promise<{ text: string; mode: number }> {
  try {
    const [text, info] = await Promise.all([
      readFile(filePath, 'utf8'),
      stat(filePath),
    ]);
    return { text, mode: info.mode };
  } catch (error) {
    throw new FileAccessError({
      filePath,
      operation: 'read',
      cause: error instanceof Error ? error : undefined,
    });
  }
}

async function writeAtomically(
  filePath: string,
  text: string,
  mode: number
): Promise<void> {
  const tempPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`
  );
  try {
    await writeFile(tempPath, text, { encoding: 'utf8', mode });
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw new FileAccessError({
      filePath,
      operation: 'write',
      cause: error instanceof Error ? error : undefined,
    });
  }
}

function recordLiterals(
  literals: readonly LiteralReport[],
  metrics: RepairMetricsCollector | undefined
): void {
  if (!metrics) return;
  metrics.increment('literalsFound', literals.length);
  for (const literal of literals) {
    if (literal.status === 'repaired') {
      metrics.increment('literalsRepaired');
      metrics.increment('repairActions', literal.actions.length);
    } else if (literal.status === 'skipped') {
      metrics.increment('literalsSkipped');
    }
  }
}

function failed(
  filePath: string,
  error: FieldmendError,
  metrics: RepairMetricsCollector | undefined
): FileRepairReport {
  metrics?.increment('filesFailed');
  return { filePath, status: 'failed', written: false, literals: [], error };
}

function listError(target: string, error: unknown): FileAccessError {
  return new FileAccessError({
    filePath: target,
    operation: 'list',
    cause: error instanceof Error ? error : undefined,
  });
}

function timed<T>(
  metrics: RepairMetricsCollector | undefined,
  phase: MetricPhase,
  fn: () => T | Promise<T>
): Promise<T> {
  return metrics ? metrics.measure(phase, fn) : Promise.resolve().then(fn);
}
