import { CleanError, CleanReport, RemovedPath, RunMode } from '../types';
import winston from 'winston';

export interface ReportInput {
  profileName: string;
  mode: RunMode;
  entriesProcessed: number;
  pathsResolved: number;
  removed: RemovedPath[];
  skipped: string[];
  /** Paths whose removal failed, counted once each */
  pathsFailed: number;
  bytesReclaimed: number;
  errors: CleanError[];
  expansionTime: number;
  removalTime: number;
}

/**
 * Interface for reporting and logging operations
 */
export interface IReporter {
  /**
   * Generate a run report from the collected results
   */
  generateReport(input: ReportInput): CleanReport;

  /**
   * Generate summary statistics
   */
  generateSummary(report: CleanReport): string;

  /**
   * Save report to file, if a log directory is configured
   */
  saveReport(report: CleanReport, filename?: string): Promise<string | undefined>;

  /**
   * Save summary to file, if a log directory is configured
   */
  saveSummary(report: CleanReport, filename?: string): Promise<string | undefined>;

  /**
   * Log profile loading
   */
  logProfileLoad(profilePath: string): void;

  /**
   * Log clean operation start
   */
  logOperationStart(profileName: string, mode: RunMode, entryCount: number): void;

  /**
   * Log the outcome of expanding every entry
   */
  logExpansion(pathCount: number, elapsed: number): void;

  /**
   * Log clean operation completion
   */
  logOperationComplete(report: CleanReport): void;

  /**
   * Log a path about to be removed
   */
  logPathStart(path: string, index: number, total: number): void;

  /**
   * Log path removal
   */
  logPathRemoval(path: string, success: boolean, bytesReclaimed: number, errors?: string[]): void;

  /**
   * Log path skip
   */
  logPathSkip(path: string, reason: string): void;

  /**
   * Log a report or summary file that could not be written
   */
  logSaveFailure(message: string): void;

  /**
   * Log an entry that failed to expand
   */
  logEntryError(error: CleanError): void;

  /**
   * Get logger instance for external use
   */
  getLogger(): winston.Logger;

  /**
   * Flush and close every transport
   */
  close(): void;
}
