import * as core from '@actions/core';

/**
 * Reads a path or text input, empty when unset
 */
export function readTextInput(key: string): string {
  return core.getInput(key, { trimWhitespace: true });
}

/**
 * Reads a flag input. An unset flag takes `fallback`; any other value must be
 * a YAML 1.2 boolean or core throws.
 */
export function readFlagInput(key: string, fallback: boolean): boolean {
  if (readTextInput(key) === '') {
    return fallback;
  }
  return core.getBooleanInput(key);
}
