import * as core from '@actions/core';
import * as yaml from 'js-yaml';
import fs from 'fs-extra';

import { readFlagInput, readTextInput } from './input.js';
import type { ConfigContext, CopyJob } from './types.js';

/**
 * Initialize and validate configuration context
 */
function initializeContext(): ConfigContext {
  const context: ConfigContext = {
    SOURCE: readTextInput('SOURCE'),
    DESTINATION: readTextInput('DESTINATION'),
    CONFIG_PATH: readTextInput('CONFIG_PATH'),
    INLINE_CONFIG: readTextInput('INLINE_CONFIG'),
    IGNORE_FILTERS: readFlagInput('IGNORE_FILTERS', false),
    VERBOSE: readFlagInput('VERBOSE', false)
  };

  const hasJobList = context.CONFIG_PATH !== '' || context.INLINE_CONFIG !== '';

  if (!hasJobList && (!context.SOURCE || !context.DESTINATION)) {
    core.setFailed('You must provide SOURCE and DESTINATION, or a CONFIG_PATH / INLINE_CONFIG job list');
    process.exit(1);
  }

  core.debug(JSON.stringify(context, null, 2));

  return context;
}

// Initialize context - will exit process if configuration is invalid
let context: ConfigContext;

try {
  context = initializeContext();
} catch (err) {
  core.setFailed(err instanceof Error ? err.message : String(err));
  process.exit(1);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  if (typeof value === 'string' && value.trim() !== '') {
    return value.trim();
  }
  return undefined;
}

function optionalBoolean(value: unknown, defaultValue: boolean): boolean {
  return typeof value === 'boolean' ? value : defaultValue;
}

/**
 * Parse copy jobs from a loaded YAML document.
 *
 * The document is a list of `{ source, dest, ignoreFilters?, verbose? }`
 * entries or a single such mapping.
 */
export function parseJobs(document: unknown, defaults: Pick<CopyJob, 'ignoreFilters' | 'verbose'>): CopyJob[] {
  if (document === undefined || document === null) {
    return [];
  }

  const entries: unknown[] = Array.isArray(document) ? document : [document];

  return entries
    .map((entry, index): CopyJob | undefined => {
      if (!isRecord(entry)) {
        core.warning(`Warn: Copy job #${index + 1} is not a mapping`);
        return undefined;
      }

      const source = optionalString(entry['source']);
      const dest = optionalString(entry['dest']) ?? optionalString(entry['destination']);

      if (source === undefined || dest === undefined) {
        core.warning(`Warn: Copy job #${index + 1} needs both source and dest`);
        return undefined;
      }

      return {
        source,
        dest,
        ignoreFilters: optionalBoolean(entry['ignoreFilters'], defaults.ignoreFilters),
        verbose: optionalBoolean(entry['verbose'], defaults.verbose)
      };
    })
    .filter((job): job is CopyJob => job !== undefined);
}

/**
 * Build the list of copy jobs from the inline config, the config file or the
 * SOURCE/DESTINATION inputs, in that order of preference
 */
export async function parseConfig(): Promise<CopyJob[]> {
  const defaults = { ignoreFilters: context.IGNORE_FILTERS, verbose: context.VERBOSE };

  if (context.INLINE_CONFIG) {
    return parseJobs(yaml.load(context.INLINE_CONFIG), defaults);
  }

  if (context.CONFIG_PATH) {
    const fileContent = await fs.promises.readFile(context.CONFIG_PATH);
    return parseJobs(yaml.load(fileContent.toString()), defaults);
  }

  return [{ source: context.SOURCE, dest: context.DESTINATION, ...defaults }];
}

export default context;
