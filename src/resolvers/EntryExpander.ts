import globby from 'globby';
import picomatch from 'picomatch';
import { Entry, ExpansionOutcome, PatternEntry } from '../types';
import { IEntryExpander } from '../interfaces';
import { EntryError, errorMessage } from '../errors';
import { describeEntry } from '../utils/entries';
import { RetentionResolver } from './RetentionResolver';

// Extglob, brace and negation syntax; plain glob treats these literally
const LITERAL_CHARACTERS = new Set(['(', ')', '{', '}', '!', '@', '+']);

/**
 * Escape everything but `*`, `**`, `?` and `[...]` classes so the matcher
 * reads the pattern as a plain glob. Existing escapes are kept as they are.
 */
export function toPlainGlob(pattern: string): string {
  let escaped = '';
  let inClass = false;
  let classStart = 0;

  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i];

    if (char === '\\' && i + 1 < pattern.length) {
      escaped += char + pattern[i + 1];
      i++;
      continue;
    }

    if (inClass) {
      // `]` directly after `[` or `[!` is a member, not the end of the class
      if (char === ']' && i !== classStart) {
        inClass = false;
      }
      escaped += char;
      continue;
    }

    if (char === '[') {
      inClass = true;
      // `[!...]` negates; the matcher only reads `[^...]` that way
      if (pattern[i + 1] === '!') {
        escaped += '[^';
        i++;
      } else {
        escaped += char;
      }
      classStart = i + 1;
      continue;
    }

    escaped += LITERAL_CHARACTERS.has(char) ? `\\${char}` : char;
  }

  return escaped;
}

/**
 * Expands profile entries into the paths they describe.
 *
 * A path entry is used verbatim, whether or not it exists. A pattern entry
 * is a plain glob (`*`, `**`, `?`, `[...]`; parentheses, braces and `!` are
 * literal) matched against the filesystem at call time (files and
 * directories, dot files included) and then narrowed by its retention rule. Matches are
 * returned in ascending path order, which is also the tie-break order for
 * retention ranking.
 */
export class EntryExpander implements IEntryExpander {
  private retentionResolver: RetentionResolver;
  private cwd: string;

  constructor(retentionResolver: RetentionResolver = new RetentionResolver(), cwd: string = process.cwd()) {
    this.retentionResolver = retentionResolver;
    this.cwd = cwd;
  }

  /**
   * Expand one entry
   */
  async expand(entry: Entry): Promise<string[]> {
    switch (entry.type) {
    case 'path':
      return [entry.path];
    case 'pattern':
      return this.expandPattern(entry);
    }
  }

  /**
   * Expand entries in order. An entry that fails is recorded with its
   * error and contributes no paths.
   */
  async expandAll(entries: readonly Entry[]): Promise<ExpansionOutcome[]> {
    const outcomes: ExpansionOutcome[] = [];

    for (const entry of entries) {
      try {
        outcomes.push({ entry, paths: await this.expand(entry) });
      } catch (error) {
        const label = describeEntry(entry);
        outcomes.push({
          entry,
          paths: [],
          error: error instanceof EntryError
            ? error.toCleanError(label)
            : {
              type: 'unknown',
              message: `failed to expand entry [${errorMessage(error)}]`,
              entry: label,
              timestamp: new Date(),
              recoverable: false
            }
        });
      }
    }

    return outcomes;
  }

  /**
   * Check that a pattern is a well-formed glob
   */
  validatePattern(pattern: string): void {
    if (pattern.length === 0) {
      throw new EntryError(pattern, 'pattern is empty');
    }

    try {
      picomatch.makeRe(toPlainGlob(pattern), { strictBrackets: true });
    } catch (error) {
      throw new EntryError(pattern, error);
    }
  }

  private async expandPattern(entry: PatternEntry): Promise<string[]> {
    this.validatePattern(entry.pattern);

    const matches = await this.findMatches(entry.pattern);

    if (!entry.retention) {
      return matches;
    }

    return this.retentionResolver.resolve(matches, entry.retention);
  }

  /**
   * Enumerate filesystem matches; directories that cannot be read are skipped
   */
  private async findMatches(pattern: string): Promise<string[]> {
    const matches = await globby(toPlainGlob(pattern), {
      cwd: this.cwd,
      absolute: true,
      dot: true,
      onlyFiles: false,
      expandDirectories: false,
      suppressErrors: true
    });

    return matches.sort();
  }
}
