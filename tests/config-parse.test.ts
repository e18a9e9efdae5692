/**
 * Tests for config.ts parseConfig / parseJobs
 *
 * These tests mock all dependencies to properly test the config module
 * which has side effects on import (initializeContext runs immediately).
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

// Store mock values
const mockInputs: Record<string, string> = {};

// Mock @actions/core before any imports
vi.mock('@actions/core', () => ({
  getInput: vi.fn((key: string) => mockInputs[key] ?? ''),
  getBooleanInput: vi.fn((key: string) => {
    const value = mockInputs[key]?.toLowerCase();
    if (value === 'true') return true;
    if (value === 'false') return false;
    throw new Error(`Input does not meet YAML 1.2 "Core Schema" specification: ${key}`);
  }),
  debug: vi.fn(),
  info: vi.fn(),
  warning: vi.fn(),
  error: vi.fn(),
  setFailed: vi.fn(),
  setOutput: vi.fn()
}));

// Mock fs-extra
const mockFileContents: Record<string, string> = {};
vi.mock('fs-extra', () => ({
  default: {
    promises: {
      readFile: vi.fn((filePath: string) => {
        const content = mockFileContents[filePath];
        if (content) {
          return Promise.resolve(Buffer.from(content));
        }
        return Promise.reject(new Error(`File not found: ${filePath}`));
      })
    }
  }
}));

describe('config.ts - parseConfig function', () => {
  beforeEach(() => {
    vi.clearAllMocks();

    // Reset mock stores
    Object.keys(mockInputs).forEach((key) => delete mockInputs[key]);
    Object.keys(mockFileContents).forEach((key) => delete mockFileContents[key]);
  });

  afterEach(() => {
    vi.resetModules();
  });

  describe('with SOURCE and DESTINATION inputs', () => {
    it('should build a single job', async () => {
      mockInputs['SOURCE'] = 'projects';
      mockInputs['DESTINATION'] = '/backup/projects';

      const { parseConfig } = await import('../src/config.js');
      const result = await parseConfig();

      expect(result).toEqual([{ source: 'projects', dest: '/backup/projects', ignoreFilters: false, verbose: false }]);
    });

    it('should apply IGNORE_FILTERS and VERBOSE', async () => {
      mockInputs['SOURCE'] = 'projects';
      mockInputs['DESTINATION'] = '/backup/projects';
      mockInputs['IGNORE_FILTERS'] = 'true';
      mockInputs['VERBOSE'] = 'true';

      const { parseConfig, default: context } = await import('../src/config.js');
      const result = await parseConfig();

      expect(context.IGNORE_FILTERS).toBe(true);
      expect(result[0]).toMatchObject({ ignoreFilters: true, verbose: true });
    });
  });

  describe('with file-based config', () => {
    it('should parse a list of jobs', async () => {
      mockInputs['CONFIG_PATH'] = '.github/copy.yml';
      mockFileContents['.github/copy.yml'] = `
- source: projects/app
  dest: /backup/app
- source: projects/lib
  dest: /backup/lib
  ignoreFilters: true
`;

      const { parseConfig } = await import('../src/config.js');
      const result = await parseConfig();

      expect(result).toEqual([
        { source: 'projects/app', dest: '/backup/app', ignoreFilters: false, verbose: false },
        { source: 'projects/lib', dest: '/backup/lib', ignoreFilters: true, verbose: false }
      ]);
    });

    it('should take job defaults from the inputs', async () => {
      mockInputs['CONFIG_PATH'] = 'copy.yml';
      mockInputs['VERBOSE'] = 'true';
      mockFileContents['copy.yml'] = `
- source: a
  dest: b
- source: c
  dest: d
  verbose: false
`;

      const { parseConfig } = await import('../src/config.js');
      const result = await parseConfig();

      expect(result.map((job) => job.verbose)).toEqual([true, false]);
    });

    it('should reject when the config file cannot be read', async () => {
      mockInputs['CONFIG_PATH'] = 'missing.yml';

      const { parseConfig } = await import('../src/config.js');

      await expect(parseConfig()).rejects.toThrow('File not found: missing.yml');
    });
  });

  describe('with inline config', () => {
    it('should prefer INLINE_CONFIG over CONFIG_PATH', async () => {
      mockInputs['CONFIG_PATH'] = 'copy.yml';
      mockInputs['INLINE_CONFIG'] = 'source: inline-src\ndest: inline-dest\n';
      mockFileContents['copy.yml'] = '- source: file-src\n  dest: file-dest\n';

      const { parseConfig } = await import('../src/config.js');
      const result = await parseConfig();

      expect(result).toEqual([{ source: 'inline-src', dest: 'inline-dest', ignoreFilters: false, verbose: false }]);
    });

    it('should accept destination as an alias of dest', async () => {
      mockInputs['INLINE_CONFIG'] = '- source: a\n  destination: b\n';

      const { parseConfig } = await import('../src/config.js');
      const result = await parseConfig();

      expect(result[0]?.dest).toBe('b');
    });
  });

  describe('parseJobs', () => {
    const defaults = { ignoreFilters: false, verbose: false };

    beforeEach(() => {
      mockInputs['SOURCE'] = 'projects';
      mockInputs['DESTINATION'] = '/backup';
    });

    it('should skip entries without source or dest and warn', async () => {
      const core = await import('@actions/core');
      const { parseJobs } = await import('../src/config.js');

      const result = parseJobs([{ source: 'a' }, { dest: 'b' }, 'plain', { source: 'c', dest: 'd' }], defaults);

      expect(result).toEqual([{ source: 'c', dest: 'd', ignoreFilters: false, verbose: false }]);
      expect(core.warning).toHaveBeenCalledWith('Warn: Copy job #1 needs both source and dest');
      expect(core.warning).toHaveBeenCalledWith('Warn: Copy job #2 needs both source and dest');
      expect(core.warning).toHaveBeenCalledWith('Warn: Copy job #3 is not a mapping');
    });

    it('should ignore flags that are not booleans', async () => {
      const { parseJobs } = await import('../src/config.js');

      const result = parseJobs({ source: 'a', dest: 'b', ignoreFilters: 'yes' }, { ignoreFilters: true, verbose: false });

      expect(result[0]?.ignoreFilters).toBe(true);
    });

    it('should trim paths and treat blank ones as missing', async () => {
      const { parseJobs } = await import('../src/config.js');

      expect(parseJobs({ source: '  a  ', dest: ' b ' }, defaults)).toEqual([
        { source: 'a', dest: 'b', ignoreFilters: false, verbose: false }
      ]);
      expect(parseJobs({ source: '   ', dest: 'b' }, defaults)).toEqual([]);
    });

    it('should return no jobs for an empty document', async () => {
      const { parseJobs } = await import('../src/config.js');

      expect(parseJobs(null, defaults)).toEqual([]);
      expect(parseJobs(undefined, defaults)).toEqual([]);
    });
  });
});
