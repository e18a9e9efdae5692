import * as core from '@actions/core';
import fs from 'fs-extra';
import type { Dirent } from 'fs';
import { readdir } from 'fs/promises';
import * as path from 'path';

import { ExclusionResolver } from './filter.js';
import { byName, errorMessage, isErrnoException, isPermissionError } from './helpers.js';
import { createLogProgress } from './progress.js';

import type { CopyEngineOptions, CopyOutcome, CopyResult, ProgressFactory, ProgressReporter } from './types.js';

/**
 * Raised inside the traversal once the abort signal fires
 */
export class CopyCancelledError extends Error {
  constructor() {
    super('Operation cancelled by user');
    this.name = 'CopyCancelledError';
  }
}

type EntryKind = 'file' | 'directory';

/**
 * Classifies a directory entry, following symbolic links. Broken links and
 * special files yield undefined.
 */
async function entryKind(fullPath: string, entry: Dirent): Promise<EntryKind | undefined> {
  if (entry.isFile()) return 'file';
  if (entry.isDirectory()) return 'directory';
  if (!entry.isSymbolicLink()) return undefined;

  try {
    const stat = await fs.stat(fullPath);
    if (stat.isFile()) return 'file';
    if (stat.isDirectory()) return 'directory';
    return undefined;
  } catch (err) {
    core.debug(`Skipping unresolvable link ${fullPath}: ${errorMessage(err)}`);
    return undefined;
  }
}

/**
 * Copies a directory tree, skipping entries excluded by `.ignorecopy` rules.
 *
 * A failure on a single file or directory is recorded and the walk goes on.
 * Only cancellation and unexpected (non OS) errors while walking directories
 * stop it.
 */
export class CopyEngine {
  public readonly source: string;
  public readonly destination: string;
  public filesCopied = 0;
  public errors: string[] = [];

  private readonly verbose: boolean;
  private readonly signal: AbortSignal | undefined;
  private readonly createProgress: ProgressFactory;
  private running = false;

  constructor(source: string, destination: string, options: CopyEngineOptions = {}) {
    this.source = path.resolve(source);
    this.destination = path.resolve(destination);
    this.verbose = options.verbose ?? false;
    this.signal = options.signal;
    this.createProgress = options.createProgress ?? createLogProgress;
  }

  /**
   * Counts every file below the source.
   *
   * Exclusion rules are not applied, so the total can be larger than the
   * number of files actually copied. Unreadable directories are skipped.
   */
  async countFiles(_ignoreFilters = false): Promise<number> {
    let count = 0;
    const pending = [this.source];

    for (let dir = pending.pop(); dir !== undefined; dir = pending.pop()) {
      let entries: Dirent[];
      try {
        entries = await readdir(dir, { withFileTypes: true });
      } catch (err) {
        core.debug(`Not counting ${dir}: ${errorMessage(err)}`);
        continue;
      }

      for (const entry of entries) {
        const fullPath = path.join(dir, entry.name);
        const kind = await entryKind(fullPath, entry);
        if (kind === 'file') {
          count++;
        } else if (kind === 'directory') {
          pending.push(fullPath);
        }
      }
    }

    return count;
  }

  /**
   * Copies the whole source tree into the destination
   */
  async copy(ignoreFilters = false): Promise<CopyResult> {
    if (this.running) {
      throw new Error('A copy is already running on this engine');
    }

    this.running = true;
    this.filesCopied = 0;
    this.errors = [];

    try {
      return await this.run(ignoreFilters);
    } finally {
      this.running = false;
    }
  }

  private async run(ignoreFilters: boolean): Promise<CopyResult> {
    if (this.verbose) {
      core.info(`Copying from: ${this.source}`);
      core.info(`Copying to: ${this.destination}`);
    }

    const total = await this.countFiles(ignoreFilters);

    if (total === 0) {
      core.info('No files to copy.');
      return this.result('succeeded', total);
    }

    const resolver = new ExclusionResolver(this.source, { ignoreFilters });
    const progress = this.createProgress(total, this.verbose);

    try {
      await this.copyRecursive(this.source, this.destination, resolver, progress);
    } catch (err) {
      if (err instanceof CopyCancelledError) {
        core.warning('Operation cancelled by user.');
        return this.result('cancelled', total);
      }

      const failure = errorMessage(err);
      core.error(`Critical error during copy operation: ${failure}`);
      core.debug(String(err));
      return this.result('failed', total, failure);
    } finally {
      progress.close();
    }

    core.info(`Copy completed: ${this.filesCopied} files copied`);
    if (this.errors.length > 0) {
      core.info(`Errors encountered: ${this.errors.length}`);
      if (this.verbose) {
        this.errors.forEach((error) => core.info(`  Error: ${error}`));
      }
    }

    return this.result('succeeded', total);
  }

  private async copyRecursive(
    currentSource: string,
    currentDest: string,
    resolver: ExclusionResolver,
    progress: ProgressReporter
  ): Promise<void> {
    this.throwIfCancelled();

    try {
      await fs.ensureDir(currentDest);
    } catch (err) {
      if (!isErrnoException(err)) throw err;
      this.recordError(`Cannot create directory '${currentDest}': ${err.message}`);
      return;
    }

    let entries: Dirent[];
    try {
      entries = await readdir(currentSource, { withFileTypes: true });
    } catch (err) {
      if (!isErrnoException(err)) throw err;
      const reason = isPermissionError(err) ? 'Permission denied' : 'OS error';
      this.recordError(`${reason} accessing '${currentSource}': ${err.message}`);
      return;
    }

    for (const entry of entries.sort(byName)) {
      this.throwIfCancelled();

      const sourcePath = path.join(currentSource, entry.name);
      const destPath = path.join(currentDest, entry.name);
      const kind = await entryKind(sourcePath, entry);

      if (kind === 'file') {
        if (await resolver.isFileExcluded(sourcePath)) {
          core.debug(`Excluding file ${sourcePath}`);
          continue;
        }
        await this.copyFile(sourcePath, destPath, progress);
      } else if (kind === 'directory') {
        if (await resolver.isDirectoryExcluded(sourcePath)) {
          core.debug(`Excluding directory ${sourcePath}`);
          continue;
        }
        await this.copyRecursive(sourcePath, destPath, resolver, progress);
      }
    }
  }

  private async copyFile(sourceFile: string, destFile: string, progress: ProgressReporter): Promise<void> {
    try {
      await fs.copy(sourceFile, destFile, { preserveTimestamps: true, dereference: true });
    } catch (err) {
      const reason = isPermissionError(err) ? 'Permission denied' : 'OS error';
      this.recordError(`${reason} copying '${sourceFile}': ${errorMessage(err)}`);
      // A failed file still counts as processed
      progress.advance();
      return;
    }

    this.filesCopied++;
    if (this.verbose) {
      progress.advanceWithMessage(`Copied: ${path.basename(sourceFile)}`);
    } else {
      progress.advance();
    }
  }

  private recordError(message: string): void {
    this.errors.push(message);
    if (this.verbose) {
      core.warning(message);
    }
  }

  private throwIfCancelled(): void {
    if (this.signal?.aborted) {
      throw new CopyCancelledError();
    }
  }

  private result(outcome: CopyOutcome, total: number, failure?: string): CopyResult {
    const result: CopyResult = {
      outcome,
      total,
      filesCopied: this.filesCopied,
      errors: [...this.errors]
    };
    if (failure !== undefined) {
      result.failure = failure;
    }
    return result;
  }
}
