import * as core from '@actions/core';
import fs from 'fs-extra';
import * as path from 'path';

import { isWithin, relativeToRoot } from './helpers.js';
import { EMPTY_RULES, loadRules, matchesPattern, mergeRules } from './patterns.js';

import type { MergedFilter, ResolverOptions, RuleSet } from './types.js';

export const IGNORE_FILE_NAME = '.ignorecopy';

function matchesAny(candidates: readonly string[], patterns: ReadonlySet<string>): boolean {
  for (const pattern of patterns) {
    if (candidates.some((candidate) => matchesPattern(candidate, pattern))) {
      return true;
    }
  }
  return false;
}

/**
 * Ancestor directories of a relative path, nearest first ("a/b/c" -> ["a/b", "a"])
 */
function ancestorsOf(relative: string): string[] {
  const ancestors: string[] = [];
  let current = path.posix.dirname(relative);

  while (current !== '.' && current !== '/') {
    ancestors.push(current);
    current = path.posix.dirname(current);
  }

  return ancestors;
}

/**
 * Resolves exclusion rules for paths below a copy root.
 *
 * Each directory's filter is the union of every marker file between the root
 * and that directory. Filters are built lazily and cached for the lifetime of
 * the resolver; marker files are assumed not to change while it is in use.
 */
export class ExclusionResolver {
  public readonly root: string;
  private readonly ignoreFilters: boolean;
  private readonly markerFile: string;
  private readonly cache = new Map<string, MergedFilter>();

  constructor(root: string, options: ResolverOptions = {}) {
    this.root = path.resolve(root);
    this.ignoreFilters = options.ignoreFilters ?? false;
    this.markerFile = options.markerFile ?? IGNORE_FILE_NAME;
  }

  /**
   * Returns the merged filter that applies to entries of `directory`
   */
  async resolve(directory: string): Promise<MergedFilter> {
    if (this.ignoreFilters) {
      return EMPTY_RULES;
    }

    const key = path.resolve(directory);
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      return cached;
    }

    if (!isWithin(this.root, key)) {
      core.debug(`Not resolving rules for ${key}: outside of ${this.root}`);
      return EMPTY_RULES;
    }

    // Collected leaf-first, loaded root-first
    const markerFiles: string[] = [];
    let current = key;

    for (;;) {
      const candidate = path.join(current, this.markerFile);
      if (await fs.pathExists(candidate)) {
        markerFiles.push(candidate);
      }

      if (current === this.root) {
        break;
      }

      const parent = path.dirname(current);
      if (parent === current) {
        break;
      }
      current = parent;
    }

    const ruleSets: RuleSet[] = [];
    for (const markerFile of markerFiles.reverse()) {
      ruleSets.push(await loadRules(markerFile));
    }

    const merged = mergeRules(ruleSets);
    this.cache.set(key, merged);
    return merged;
  }

  /**
   * Checks a file against generic patterns: its root-relative path, its name
   * and each of its ancestor directories are candidates.
   */
  async isFileExcluded(filePath: string): Promise<boolean> {
    const absolute = path.resolve(filePath);
    const filter = await this.resolve(path.dirname(absolute));

    if (filter.patterns.size === 0) {
      return false;
    }

    const relative = relativeToRoot(this.root, absolute);
    if (relative === undefined) {
      return false;
    }

    const candidates = [relative, path.posix.basename(relative), ...ancestorsOf(relative)];
    return matchesAny(candidates, filter.patterns);
  }

  /**
   * Checks a directory's root-relative path and name against directory-only
   * and generic patterns.
   */
  async isDirectoryExcluded(dirPath: string): Promise<boolean> {
    const absolute = path.resolve(dirPath);
    const filter = await this.resolve(path.dirname(absolute));

    if (filter.patterns.size === 0 && filter.directoryPatterns.size === 0) {
      return false;
    }

    const relative = relativeToRoot(this.root, absolute);
    if (relative === undefined) {
      return false;
    }

    const candidates = [relative, path.posix.basename(relative)];
    return matchesAny(candidates, filter.directoryPatterns) || matchesAny(candidates, filter.patterns);
  }
}
