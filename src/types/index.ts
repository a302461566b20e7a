/**
 * Core type definitions for profile-sweep
 */

// Profile Types
export type RetentionOrder = 'fileName' | 'created' | 'modified';

export type PatternException = 'firstAscending' | 'firstDescending' | 'mostRecent';

export interface CountRetention {
  kind: 'count';
  order: RetentionOrder;
  count: number;
}

/**
 * Legacy profile shape: keeps exactly one match, chosen by the exception
 */
export interface ExceptionRetention {
  kind: 'exception';
  exception: PatternException;
}

export type Retention = CountRetention | ExceptionRetention;

export interface PathEntry {
  type: 'path';
  path: string;
}

export interface PatternEntry {
  type: 'pattern';
  pattern: string;
  retention?: Retention;
}

export type Entry = PathEntry | PatternEntry;

export interface Profile {
  readonly name: string;
  readonly entries: readonly Entry[];
}

// Configuration Types
export type RunMode = 'silent' | 'everyEntry' | 'everyPath';

export interface ReportingOptions {
  verbose: boolean;
  logPath?: string;
}

export interface CleanConfig {
  profilePath: string;
  mode: RunMode;
  reporting: ReportingOptions;
}

// Metadata Types
export interface PathTimes {
  modified?: Date;
  created?: Date;
}

// Result Types
export type RemovedKind = 'file' | 'directory' | 'symlink' | 'other';

export type ErrorType =
  | 'invalid_pattern'
  | 'inspect'
  | 'read_directory'
  | 'remove_file'
  | 'remove_directory'
  | 'unknown';

export interface CleanError {
  type: ErrorType;
  message: string;
  path?: string;
  entry?: string;
  timestamp: Date;
  recoverable: boolean;
}

export interface ExpansionOutcome {
  entry: Entry;
  paths: string[];
  error?: CleanError;
}

// Report Types
export interface RemovedPath {
  path: string;
  kind: RemovedKind;
  bytesReclaimed: number;
}

export interface CleanReport {
  timestamp: Date;
  profileName: string;
  mode: RunMode;
  summary: {
    entriesProcessed: number;
    pathsResolved: number;
    pathsRemoved: number;
    pathsSkipped: number;
    pathsFailed: number;
    bytesReclaimed: number;
    expansionTime: number;
    removalTime: number;
  };
  details: {
    removed: RemovedPath[];
    skipped: string[];
    errors: CleanError[];
  };
}
