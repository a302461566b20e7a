import * as fs from 'fs/promises';
import * as path from 'path';
import winston from 'winston';
import { IPathCanonicalizer } from '../interfaces';
import { errorCode } from '../errors';

/**
 * Resolves expanded paths to absolute, symlink-free form.
 * A path that no longer exists needs no removal, so it is dropped, and
 * so is an empty path.
 */
export class PathCanonicalizer implements IPathCanonicalizer {
  private cwd: string;
  private logger?: winston.Logger;

  constructor(cwd: string = process.cwd(), logger?: winston.Logger) {
    this.cwd = cwd;
    this.logger = logger;
  }

  async canonicalize(paths: readonly string[]): Promise<string[]> {
    const resolved: string[] = [];

    for (const target of paths) {
      // Resolving '' would yield the working directory itself
      if (target.length === 0) {
        this.logger?.debug('Dropped empty path');
        continue;
      }

      try {
        resolved.push(await fs.realpath(path.resolve(this.cwd, target)));
      } catch (error) {
        this.logger?.debug(`Dropped unresolvable path <${target}>`, {
          path: target,
          code: errorCode(error) ?? 'unknown'
        });
      }
    }

    return resolved;
  }
}
