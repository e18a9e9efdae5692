import * as core from '@actions/core';
import fs from 'fs-extra';
import picomatch from 'picomatch';
import { TextDecoder } from 'util';

import type { RuleSet } from './types.js';

/**
 * Only `*`, `?`, `[seq]` and `[!seq]` are special. Wildcards match names
 * starting with a dot, and `*` also matches `/`.
 */
const MATCH_OPTIONS: picomatch.PicomatchOptions = {
  bash: true,
  dot: true,
  nobrace: true,
  noextglob: true,
  nonegate: true
};

const compiled = new Map<string, picomatch.Matcher>();

/**
 * Checks a relative path or bare name against one glob pattern
 */
export function matchesPattern(candidate: string, pattern: string): boolean {
  let matcher = compiled.get(pattern);
  if (matcher === undefined) {
    matcher = picomatch(pattern, MATCH_OPTIONS);
    compiled.set(pattern, matcher);
  }
  return matcher(candidate);
}

export const EMPTY_RULES: RuleSet = Object.freeze({
  patterns: new Set<string>(),
  directoryPatterns: new Set<string>()
});

/**
 * Parses the lines of a marker file.
 *
 * Blank lines and `#` comments are skipped, a leading `/` is dropped and a
 * trailing `/` makes the pattern apply to directories only.
 */
export function parseRules(lines: Iterable<string>): RuleSet {
  const patterns = new Set<string>();
  const directoryPatterns = new Set<string>();

  for (const line of lines) {
    let pattern = line.trim();

    if (!pattern || pattern.startsWith('#')) {
      continue;
    }

    if (pattern.startsWith('/')) {
      pattern = pattern.slice(1);
    }

    if (pattern.endsWith('/')) {
      const directory = pattern.slice(0, -1);
      if (directory) {
        directoryPatterns.add(directory);
      }
    } else if (pattern) {
      patterns.add(pattern);
    }
  }

  return { patterns, directoryPatterns };
}

/**
 * Loads a marker file. Unreadable or non UTF-8 files contribute no rules.
 */
export async function loadRules(filePath: string): Promise<RuleSet> {
  let content: string;

  try {
    const buffer = await fs.readFile(filePath);
    content = new TextDecoder('utf-8', { fatal: true }).decode(buffer);
  } catch (err) {
    core.debug(`Ignoring unreadable rule file ${filePath}: ${String(err)}`);
    return EMPTY_RULES;
  }

  return parseRules(content.split(/\r?\n/));
}

/**
 * Unions rule sets in the given order
 */
export function mergeRules(ruleSets: readonly RuleSet[]): RuleSet {
  const patterns = new Set<string>();
  const directoryPatterns = new Set<string>();

  for (const rules of ruleSets) {
    rules.patterns.forEach((pattern) => patterns.add(pattern));
    rules.directoryPatterns.forEach((pattern) => directoryPatterns.add(pattern));
  }

  return { patterns, directoryPatterns };
}
