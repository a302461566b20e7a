import { Stats } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import winston from 'winston';
import { IRemover, RemovalResult, RemoverFileSystem } from '../interfaces';
import { RemoveError } from '../errors';

export const nodeFileSystem: RemoverFileSystem = {
  lstat: target => fs.lstat(target),
  readdir: target => fs.readdir(target),
  unlink: target => fs.unlink(target),
  rmdir: target => fs.rmdir(target)
};

/**
 * Deletes files and directory trees while counting reclaimed bytes.
 *
 * Removal is best-effort: a child that cannot be removed is skipped and its
 * errors are collected, its siblings are still removed, and the bytes of
 * everything that was deleted are reported even when the enclosing
 * directory itself cannot be removed afterwards.
 *
 * Symlinks are unlinked without being followed and count zero bytes.
 * Sockets, FIFOs and devices are left alone and count as a successful
 * no-op.
 */
export class Remover implements IRemover {
  private fileSystem: RemoverFileSystem;
  private logger?: winston.Logger;

  constructor(fileSystem: RemoverFileSystem = nodeFileSystem, logger?: winston.Logger) {
    this.fileSystem = fileSystem;
    this.logger = logger;
  }

  /**
   * Remove a path, recursively for directories
   */
  async remove(target: string): Promise<RemovalResult> {
    let stats: Stats;
    try {
      stats = await this.fileSystem.lstat(target);
    } catch (error) {
      return this.failed(target, 'other', 0, [new RemoveError('inspect', target, error)]);
    }

    if (stats.isFile()) {
      return this.removeFile(target, stats.size);
    }

    if (stats.isDirectory()) {
      return this.removeDirectory(target);
    }

    if (stats.isSymbolicLink()) {
      return this.removeLink(target);
    }

    this.logger?.debug(`Left non-regular entry in place <${target}>`, { path: target });
    return { path: target, kind: 'other', success: true, bytesReclaimed: 0, errors: [] };
  }

  private async removeFile(target: string, size: number): Promise<RemovalResult> {
    try {
      await this.fileSystem.unlink(target);
    } catch (error) {
      return this.failed(target, 'file', 0, [new RemoveError('removeFile', target, error)]);
    }

    return { path: target, kind: 'file', success: true, bytesReclaimed: size, errors: [] };
  }

  private async removeLink(target: string): Promise<RemovalResult> {
    try {
      await this.fileSystem.unlink(target);
    } catch (error) {
      return this.failed(target, 'symlink', 0, [new RemoveError('removeFile', target, error)]);
    }

    return { path: target, kind: 'symlink', success: true, bytesReclaimed: 0, errors: [] };
  }

  private async removeDirectory(target: string): Promise<RemovalResult> {
    let children: string[];
    try {
      children = await this.fileSystem.readdir(target);
    } catch (error) {
      return this.failed(target, 'directory', 0, [new RemoveError('readDirectory', target, error)]);
    }

    let bytesReclaimed = 0;
    const errors: RemoveError[] = [];

    // Sequential, depth-first: children before their parent
    for (const child of children) {
      const result = await this.remove(path.join(target, child));
      bytesReclaimed += result.bytesReclaimed;
      errors.push(...result.errors);

      if (!result.success) {
        this.logger?.debug(`Skipped child that could not be removed <${result.path}>`, {
          path: result.path,
          errorCount: result.errors.length
        });
      }
    }

    try {
      await this.fileSystem.rmdir(target);
    } catch (error) {
      errors.push(new RemoveError('removeDirectory', target, error));
    }

    if (errors.length > 0) {
      return this.failed(target, 'directory', bytesReclaimed, errors);
    }

    return { path: target, kind: 'directory', success: true, bytesReclaimed, errors };
  }

  private failed(
    target: string,
    kind: RemovalResult['kind'],
    bytesReclaimed: number,
    errors: RemoveError[]
  ): RemovalResult {
    return { path: target, kind, success: false, bytesReclaimed, errors };
  }
}
