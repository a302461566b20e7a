import {
  CleanError,
  CleanReport,
  Entry,
  RemovedPath,
  RunMode
} from '../types';
import {
  ICleanOrchestrator,
  IEntryExpander,
  IPathCanonicalizer,
  IProfileLoader,
  IPrompter,
  IRemover,
  IReporter,
  RemovalResult
} from '../interfaces';
import { EntryError, errorMessage } from '../errors';
import { describeEntry } from '../utils/entries';
import { SizeCalculator } from '../utils/SizeCalculator';

/**
 * Main orchestrator that coordinates the clean workflow.
 *
 * Everything runs sequentially so that prompts appear one at a time and
 * size accounting stays in order. Only a profile that fails to load stops
 * the run; entry and path failures are recorded and the run continues.
 */
export class CleanOrchestrator implements ICleanOrchestrator {
  private profileLoader: IProfileLoader;
  private entryExpander: IEntryExpander;
  private canonicalizer: IPathCanonicalizer;
  private remover: IRemover;
  private reporter: IReporter;
  private prompter: IPrompter;

  constructor(
    profileLoader: IProfileLoader,
    entryExpander: IEntryExpander,
    canonicalizer: IPathCanonicalizer,
    remover: IRemover,
    reporter: IReporter,
    prompter: IPrompter
  ) {
    this.profileLoader = profileLoader;
    this.entryExpander = entryExpander;
    this.canonicalizer = canonicalizer;
    this.remover = remover;
    this.reporter = reporter;
    this.prompter = prompter;
  }

  /**
   * Execute the complete clean workflow
   */
  async clean(profilePath: string, mode: RunMode): Promise<CleanReport> {
    this.reporter.logProfileLoad(profilePath);

    // Step 1: Load the profile (fatal on failure)
    const profile = await this.profileLoader.load(profilePath);

    this.reporter.logOperationStart(profile.name, mode, profile.entries.length);

    // Step 2: Let the user pick entries
    const entries = mode === 'everyEntry'
      ? await this.selectEntries(profile.entries)
      : [...profile.entries];

    // Step 3: Expand and canonicalize
    const expansionStart = Date.now();
    const { paths, errors } = await this.resolvePaths(entries);
    const expansionTime = Date.now() - expansionStart;

    this.reporter.logExpansion(paths.length, expansionTime);

    // Step 4: Remove
    const removalStart = Date.now();
    const { removed, skipped, failed, results } = await this.removePaths(paths, mode, errors);
    const removalTime = Date.now() - removalStart;

    // Step 5: Report
    const report = this.reporter.generateReport({
      profileName: profile.name,
      mode,
      entriesProcessed: entries.length,
      pathsResolved: paths.length,
      removed,
      skipped,
      pathsFailed: failed,
      bytesReclaimed: SizeCalculator.totalBytes(results),
      errors,
      expansionTime,
      removalTime
    });

    await this.saveOutputs(report);

    this.reporter.logOperationComplete(report);

    return report;
  }

  /**
   * Load a profile and check every pattern compiles
   */
  async validate(profilePath: string): Promise<CleanError[]> {
    this.reporter.logProfileLoad(profilePath);

    const profile = await this.profileLoader.load(profilePath);
    const errors: CleanError[] = [];

    for (const entry of profile.entries) {
      if (entry.type !== 'pattern') {
        continue;
      }

      try {
        this.entryExpander.validatePattern(entry.pattern);
      } catch (error) {
        if (!(error instanceof EntryError)) {
          throw error;
        }
        errors.push(error.toCleanError(describeEntry(entry)));
      }
    }

    return errors;
  }

  /**
   * Write the report files. The paths are already gone by now, so a
   * write failure is logged and does not fail the run.
   */
  private async saveOutputs(report: CleanReport): Promise<void> {
    const writers = [
      () => this.reporter.saveReport(report),
      () => this.reporter.saveSummary(report)
    ];

    for (const write of writers) {
      try {
        await write();
      } catch (error) {
        this.reporter.logSaveFailure(errorMessage(error));
      }
    }
  }

  /**
   * Ask for each entry whether it should be included
   */
  private async selectEntries(entries: readonly Entry[]): Promise<Entry[]> {
    const selected: Entry[] = [];

    for (const entry of entries) {
      if (await this.prompter.confirm(`Include entry [${describeEntry(entry)}]?`)) {
        selected.push(entry);
      }
    }

    return selected;
  }

  /**
   * Expand entries and canonicalize the results, collecting entry errors
   */
  private async resolvePaths(entries: readonly Entry[]): Promise<{ paths: string[]; errors: CleanError[] }> {
    const outcomes = await this.entryExpander.expandAll(entries);
    const expanded: string[] = [];
    const errors: CleanError[] = [];

    for (const outcome of outcomes) {
      if (outcome.error) {
        errors.push(outcome.error);
        this.reporter.logEntryError(outcome.error);
      }
      expanded.push(...outcome.paths);
    }

    return { paths: await this.canonicalizer.canonicalize(expanded), errors };
  }

  /**
   * Remove resolved paths one by one, continuing past failures
   */
  private async removePaths(
    paths: string[],
    mode: RunMode,
    errors: CleanError[]
  ): Promise<{ removed: RemovedPath[]; skipped: string[]; failed: number; results: RemovalResult[] }> {
    const removed: RemovedPath[] = [];
    const skipped: string[] = [];
    let failed = 0;
    const results: RemovalResult[] = [];

    for (const [index, target] of paths.entries()) {
      if (mode === 'everyPath') {
        if (!(await this.prompter.confirm(`Delete path <${target}>?`))) {
          skipped.push(target);
          this.reporter.logPathSkip(target, 'Declined at prompt');
          continue;
        }
      } else {
        this.reporter.logPathStart(target, index, paths.length);
      }

      let result: RemovalResult;
      try {
        result = await this.remover.remove(target);
      } catch (error) {
        const cleanError: CleanError = {
          type: 'unknown',
          path: target,
          message: errorMessage(error),
          timestamp: new Date(),
          recoverable: false
        };

        errors.push(cleanError);
        failed++;
        this.reporter.logPathRemoval(target, false, 0, [cleanError.message]);
        continue;
      }

      results.push(result);

      if (result.success) {
        removed.push({ path: result.path, kind: result.kind, bytesReclaimed: result.bytesReclaimed });
      } else {
        failed++;
        errors.push(...result.errors.map(e => e.toCleanError()));
      }

      this.reporter.logPathRemoval(
        target,
        result.success,
        result.bytesReclaimed,
        result.errors.map(e => e.message)
      );
    }

    return { removed, skipped, failed, results };
  }
}
