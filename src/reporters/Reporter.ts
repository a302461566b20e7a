import { CleanError, CleanReport, RemovedKind, RunMode } from '../types';
import { IReporter, ReportInput } from '../interfaces';
import { SizeCalculator } from '../utils/SizeCalculator';
import { errorMessage } from '../errors';
import * as fs from 'fs';
import * as path from 'path';
import winston from 'winston';

const KIND_LABELS: Record<RemovedKind, string> = {
  file: 'Files',
  directory: 'Directories',
  symlink: 'Symlinks',
  other: 'Other entries'
};

/**
 * Reporter for generating clean summaries and logs
 */
export class Reporter implements IReporter {
  private logger!: winston.Logger;
  private logPath?: string;
  private verbose: boolean;

  /**
   * @param logPath - directory for log and report files; console only when omitted
   * @param verbose - include debug output on the console
   */
  constructor(logPath?: string, verbose: boolean = false) {
    this.logPath = logPath;
    this.verbose = verbose;
    this.setupLogger();
  }

  /**
   * Generate a run report from the collected results
   */
  generateReport(input: ReportInput): CleanReport {
    const report: CleanReport = {
      timestamp: new Date(),
      profileName: input.profileName,
      mode: input.mode,
      summary: {
        entriesProcessed: input.entriesProcessed,
        pathsResolved: input.pathsResolved,
        pathsRemoved: input.removed.length,
        pathsSkipped: input.skipped.length,
        pathsFailed: input.pathsFailed,
        bytesReclaimed: input.bytesReclaimed,
        expansionTime: input.expansionTime,
        removalTime: input.removalTime
      },
      details: {
        removed: input.removed,
        skipped: input.skipped,
        errors: input.errors
      }
    };

    this.logger.debug('Clean report generated', {
      profileName: report.profileName,
      mode: report.mode,
      summary: report.summary,
      errorCount: report.details.errors.length
    });

    return report;
  }

  /**
   * Generate summary statistics
   */
  generateSummary(report: CleanReport): string {
    const { summary, details } = report;
    const lines: string[] = [];

    lines.push(`=== Clean Report: ${report.profileName} (${report.mode}) ===`);
    lines.push(`Timestamp: ${report.timestamp.toISOString()}`);
    lines.push('');

    lines.push('SUMMARY:');
    lines.push(`  Entries Processed: ${summary.entriesProcessed}`);
    lines.push(`  Paths Resolved: ${summary.pathsResolved}`);
    lines.push(`  Paths Removed: ${summary.pathsRemoved}`);
    lines.push(`  Paths Skipped: ${summary.pathsSkipped}`);
    lines.push(`  Paths Failed: ${summary.pathsFailed}`);
    lines.push(`  Space Reclaimed: ${SizeCalculator.formatBytes(summary.bytesReclaimed)}`);
    lines.push(`  Expansion Time: ${SizeCalculator.formatDuration(summary.expansionTime)}`);
    lines.push(`  Removal Time: ${SizeCalculator.formatDuration(summary.removalTime)}`);
    lines.push('');

    const kindCounts = this.getKindCounts(report);
    if (kindCounts.length > 0) {
      lines.push('REMOVED BREAKDOWN:');
      kindCounts.forEach(([kind, count]) => {
        lines.push(`  ${KIND_LABELS[kind]}: ${count}`);
      });
      lines.push('');
    }

    if (details.skipped.length > 0) {
      lines.push('SKIPPED PATHS:');
      details.skipped.forEach(skipped => {
        lines.push(`  ${skipped}`);
      });
      lines.push('');
    }

    if (details.errors.length > 0) {
      lines.push('ERRORS:');
      details.errors.forEach(error => {
        lines.push(`  ${error.type}: ${error.message}`);
        if (error.entry) {
          lines.push(`    Entry: ${error.entry}`);
        }
      });
      lines.push('');
    }

    // Per path: one failed directory counts once, however many children failed
    const totalAttempted = summary.pathsRemoved + summary.pathsSkipped + summary.pathsFailed;
    const successRate = totalAttempted > 0 ? (summary.pathsRemoved / totalAttempted * 100).toFixed(1) : '100.0';
    lines.push(`Success Rate: ${successRate}%`);

    return lines.join('\n');
  }

  /**
   * Save report to file
   */
  async saveReport(report: CleanReport, filename?: string): Promise<string | undefined> {
    if (!this.logPath) {
      return undefined;
    }

    await this.ensureLogDirectory(this.logPath);

    if (!filename) {
      filename = `clean-report-${this.fileTimestamp(report)}.json`;
    }

    return this.writeLogFile(path.join(this.logPath, filename), JSON.stringify(report, null, 2), 'Report');
  }

  /**
   * Save summary to file
   */
  async saveSummary(report: CleanReport, filename?: string): Promise<string | undefined> {
    if (!this.logPath) {
      return undefined;
    }

    await this.ensureLogDirectory(this.logPath);

    if (!filename) {
      filename = `clean-summary-${this.fileTimestamp(report)}.txt`;
    }

    return this.writeLogFile(path.join(this.logPath, filename), this.generateSummary(report), 'Summary');
  }

  logProfileLoad(profilePath: string): void {
    this.logger.info(`Loading profile from path <${profilePath}>...`, { profilePath });
  }

  logOperationStart(profileName: string, mode: RunMode, entryCount: number): void {
    this.logger.info(`Discovering paths using profile '${profileName}'...`, {
      profileName,
      mode,
      entryCount
    });
  }

  logExpansion(pathCount: number, elapsed: number): void {
    this.logger.info(`Expanded ${pathCount} paths in ${elapsed}ms.`, { pathCount, elapsed });
  }

  logOperationComplete(report: CleanReport): void {
    this.logger.info(
      `Deleted ${report.summary.pathsRemoved} paths in ${report.summary.removalTime}ms, ` +
      `reclaiming ${SizeCalculator.formatBytes(report.summary.bytesReclaimed)} of space.`,
      {
        profileName: report.profileName,
        mode: report.mode,
        pathsResolved: report.summary.pathsResolved,
        pathsRemoved: report.summary.pathsRemoved,
        pathsSkipped: report.summary.pathsSkipped,
        pathsFailed: report.summary.pathsFailed,
        bytesReclaimed: report.summary.bytesReclaimed,
        errorCount: report.details.errors.length
      }
    );
  }

  logPathStart(target: string, index: number, total: number): void {
    this.logger.info(`Deleting path ${index + 1} of ${total}: <${target}>...`, { path: target });
  }

  logPathRemoval(target: string, success: boolean, bytesReclaimed: number, errors: string[] = []): void {
    if (success) {
      this.logger.debug(`Removed <${target}>`, { path: target, bytesReclaimed });
    } else {
      this.logger.error(`Failed to delete path <${target}>`, {
        path: target,
        bytesReclaimed,
        errors
      });
    }
  }

  logPathSkip(target: string, reason: string): void {
    this.logger.warn(`Skipped <${target}>`, { path: target, reason });
  }

  logSaveFailure(message: string): void {
    this.logger.error(message);
  }

  logEntryError(error: CleanError): void {
    this.logger.error(`Failed to expand entry: ${error.message}`, {
      type: error.type,
      entry: error.entry
    });
  }

  getLogger(): winston.Logger {
    return this.logger;
  }

  close(): void {
    this.logger.close();
  }

  /**
   * Setup Winston logger with console and, when a log directory is given, file transports
   */
  private setupLogger(): void {
    const logFormat = winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    );

    const consoleFormat = winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    );

    const level = this.verbose ? 'debug' : 'info';

    const consoleTransport = new winston.transports.Console({
      format: consoleFormat,
      level: process.env.NODE_ENV === 'test' ? 'error' : level
    });

    const fileTransports = this.logPath ? this.createFileTransports(this.logPath) : [];

    this.logger = winston.createLogger({
      level,
      format: logFormat,
      transports: [consoleTransport, ...fileTransports]
    });
  }

  /**
   * File transports for all logs and for errors only
   */
  private createFileTransports(logPath: string) {
    this.ensureLogDirectorySync(logPath);

    return [
      new winston.transports.File({
        filename: path.join(logPath, 'clean.log'),
        maxsize: 10 * 1024 * 1024, // 10MB
        maxFiles: 5,
        tailable: true
      }),
      new winston.transports.File({
        filename: path.join(logPath, 'clean-error.log'),
        level: 'error',
        maxsize: 10 * 1024 * 1024, // 10MB
        maxFiles: 5,
        tailable: true
      })
    ];
  }

  private getKindCounts(report: CleanReport): Array<[RemovedKind, number]> {
    const counts = new Map<RemovedKind, number>();

    report.details.removed.forEach(removed => {
      counts.set(removed.kind, (counts.get(removed.kind) ?? 0) + 1);
    });

    return [...counts.entries()];
  }

  private fileTimestamp(report: CleanReport): string {
    return report.timestamp.toISOString().replace(/[:.]/g, '-');
  }

  private async writeLogFile(filePath: string, content: string, label: string): Promise<string> {
    try {
      await fs.promises.writeFile(filePath, content, 'utf8');
      this.logger.info(`${label} saved to ${filePath}`);
      return filePath;
    } catch (error) {
      throw new Error(`Failed to save ${label.toLowerCase()}: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async ensureLogDirectory(logPath: string): Promise<void> {
    await fs.promises.mkdir(logPath, { recursive: true });
  }

  private ensureLogDirectorySync(logPath: string): void {
    fs.mkdirSync(logPath, { recursive: true });
  }
}
