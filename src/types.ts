// Exclusion rule types
export interface RuleSet {
  patterns: ReadonlySet<string>;
  directoryPatterns: ReadonlySet<string>;
}

// Union of every rule set from the copy root down to one directory
export type MergedFilter = RuleSet;

export interface ResolverOptions {
  ignoreFilters?: boolean;
  markerFile?: string;
}

// Progress types
export interface ProgressReporter {
  advance(amount?: number): void;
  advanceWithMessage(message: string, amount?: number): void;
  close(): void;
}

export type ProgressFactory = (total: number, verbose: boolean) => ProgressReporter;

// Copy engine types
export type CopyOutcome = 'succeeded' | 'cancelled' | 'failed';

export interface CopyResult {
  outcome: CopyOutcome;
  total: number;
  filesCopied: number;
  errors: string[];
  failure?: string;
}

export interface CopyEngineOptions {
  verbose?: boolean;
  signal?: AbortSignal;
  createProgress?: ProgressFactory;
}

export interface CopyJob {
  source: string;
  dest: string;
  ignoreFilters: boolean;
  verbose: boolean;
}

// Config context type
export interface ConfigContext {
  SOURCE: string;
  DESTINATION: string;
  CONFIG_PATH: string;
  INLINE_CONFIG: string;
  IGNORE_FILTERS: boolean;
  VERBOSE: boolean;
}

// Called once per item by forEachSeries
export type SeriesCallback<T> = (item: T, position: number) => Promise<void>;
