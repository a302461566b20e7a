import { Entry, ExpansionOutcome } from '../types';

/**
 * Interface for turning profile entries into filesystem paths
 */
export interface IEntryExpander {
  /**
   * Expand one entry; rejects with an EntryError for an invalid pattern
   */
  expand(entry: Entry): Promise<string[]>;

  /**
   * Expand entries in order, recording failures instead of aborting
   */
  expandAll(entries: readonly Entry[]): Promise<ExpansionOutcome[]>;

  /**
   * Check that a pattern compiles, throwing an EntryError if it does not
   */
  validatePattern(pattern: string): void;
}
