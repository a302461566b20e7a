import * as fs from 'fs/promises';
import * as path from 'path';
import {
  CountRetention,
  ExceptionRetention,
  PathTimes,
  Retention,
  RetentionOrder
} from '../types';

export type MetadataReader = (target: string) => Promise<PathTimes>;

type RankKey = string | number;

interface RankedPath {
  path: string;
  key: RankKey;
}

// Unreadable timestamps rank below every real one
const LOWEST_RANK = Number.NEGATIVE_INFINITY;

/**
 * Read modification and creation times, leaving out whatever the platform cannot provide
 */
export async function readPathTimes(target: string): Promise<PathTimes> {
  try {
    const stats = await fs.stat(target);
    return {
      modified: stats.mtime,
      // A zero birthtime means the filesystem does not record creation
      created: stats.birthtimeMs > 0 ? stats.birthtime : undefined
    };
  } catch {
    return {};
  }
}

/**
 * Order two keys so that the larger one comes first
 */
export function compareDescending(a: RankKey, b: RankKey): number {
  if (a === b) return 0;
  return a > b ? -1 : 1;
}

/**
 * Decides which pattern matches survive a retention rule
 */
export class RetentionResolver {
  private readMetadata: MetadataReader;

  constructor(readMetadata: MetadataReader = readPathTimes) {
    this.readMetadata = readMetadata;
  }

  /**
   * Return the matches that should be deleted under the given rule
   */
  async resolve(matches: readonly string[], retention: Retention): Promise<string[]> {
    switch (retention.kind) {
    case 'count':
      return this.resolveCount(matches, retention);
    case 'exception':
      return this.resolveException(matches, retention);
    }
  }

  /**
   * Keep the `count` most favourable matches, ranked newest first or by
   * reverse file name. Ties keep their enumeration order.
   */
  private async resolveCount(matches: readonly string[], retention: CountRetention): Promise<string[]> {
    const ranked = await this.rank(matches, retention.order);
    ranked.sort((a, b) => compareDescending(a.key, b.key));

    return ranked.slice(retention.count).map(r => r.path);
  }

  /**
   * Keep a single match. An empty match set deletes nothing.
   */
  private async resolveException(matches: readonly string[], retention: ExceptionRetention): Promise<string[]> {
    if (matches.length === 0) {
      return [];
    }

    const excluded = await this.findExcluded(matches, retention);
    return matches.filter(match => match !== excluded);
  }

  private async findExcluded(matches: readonly string[], retention: ExceptionRetention): Promise<string> {
    switch (retention.exception) {
    case 'firstAscending':
      return this.pickFirstMinimum(await this.rank(matches, 'fileName'));
    case 'firstDescending':
      return this.pickLastMaximum(await this.rank(matches, 'fileName'));
    case 'mostRecent':
      return this.pickLastMaximum(await this.rankByMostRecent(matches));
    }
  }

  private async rank(matches: readonly string[], order: RetentionOrder): Promise<RankedPath[]> {
    if (order === 'fileName') {
      return matches.map(match => ({ path: match, key: path.basename(match) }));
    }

    const ranked: RankedPath[] = [];
    for (const match of matches) {
      const times = await this.readMetadata(match);
      const time = order === 'created' ? times.created : times.modified;
      ranked.push({ path: match, key: time ? time.getTime() : LOWEST_RANK });
    }
    return ranked;
  }

  private async rankByMostRecent(matches: readonly string[]): Promise<RankedPath[]> {
    const ranked: RankedPath[] = [];
    for (const match of matches) {
      const times = await this.readMetadata(match);
      const time = times.modified ?? times.created;
      ranked.push({ path: match, key: time ? time.getTime() : LOWEST_RANK });
    }
    return ranked;
  }

  private pickFirstMinimum(ranked: RankedPath[]): string {
    return ranked.reduce((best, candidate) =>
      compareDescending(candidate.key, best.key) > 0 ? candidate : best
    ).path;
  }

  private pickLastMaximum(ranked: RankedPath[]): string {
    return ranked.reduce((best, candidate) =>
      compareDescending(candidate.key, best.key) <= 0 ? candidate : best
    ).path;
  }
}
