import * as core from '@actions/core';
import fs from 'fs-extra';
import * as path from 'path';

import { CopyEngine } from './copier.js';
import { errorMessage, isWithin } from './helpers.js';

import type { CopyJob, CopyResult, ProgressFactory } from './types.js';

export class PathValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PathValidationError';
  }
}

export interface PreparedPaths {
  source: string;
  dest: string;
}

/**
 * Resolves both paths and checks the source is an existing directory that
 * neither equals nor contains the destination. Creates the destination (with
 * parents) when missing.
 */
export async function preparePaths(source: string, dest: string): Promise<PreparedPaths> {
  const sourcePath = path.resolve(source);
  const destPath = path.resolve(dest);

  if (!(await fs.pathExists(sourcePath))) {
    throw new PathValidationError(`Source directory '${sourcePath}' does not exist`);
  }

  const stat = await fs.stat(sourcePath);
  if (!stat.isDirectory()) {
    throw new PathValidationError(`Source '${sourcePath}' is not a directory`);
  }

  if (sourcePath === destPath) {
    throw new PathValidationError('Source and destination must be different paths');
  }

  if (isWithin(sourcePath, destPath)) {
    throw new PathValidationError(`Destination '${destPath}' must not be inside the source directory`);
  }

  try {
    await fs.ensureDir(destPath);
  } catch (err) {
    core.debug(errorMessage(err));
    throw new PathValidationError(`Cannot create destination directory '${destPath}'`);
  }

  return { source: sourcePath, dest: destPath };
}

export interface RunJobOptions {
  signal?: AbortSignal;
  createProgress?: ProgressFactory;
}

/**
 * Validates the paths of one job and copies its tree
 */
export async function runCopyJob(job: CopyJob, options: RunJobOptions = {}): Promise<CopyResult> {
  const { source, dest } = await preparePaths(job.source, job.dest);

  core.info(`Copy job: ${source} -> ${dest}`);
  if (job.ignoreFilters) {
    core.info('Ignoring .ignorecopy rules, copying everything');
  }

  const engine = new CopyEngine(source, dest, {
    verbose: job.verbose,
    ...options
  });

  return engine.copy(job.ignoreFilters);
}
