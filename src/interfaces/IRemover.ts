import { Stats } from 'fs';
import { RemovedKind } from '../types';
import { RemoveError } from '../errors';

export interface RemovalResult {
  path: string;
  kind: RemovedKind;
  /** True only when nothing in the subtree failed */
  success: boolean;
  /** Bytes of every file actually deleted, including partial directory removals */
  bytesReclaimed: number;
  errors: RemoveError[];
}

/**
 * The filesystem calls the remover depends on
 */
export interface RemoverFileSystem {
  lstat(path: string): Promise<Stats>;
  readdir(path: string): Promise<string[]>;
  unlink(path: string): Promise<void>;
  rmdir(path: string): Promise<void>;
}

/**
 * Interface for path removal
 */
export interface IRemover {
  /**
   * Remove a path, recursively for directories
   */
  remove(path: string): Promise<RemovalResult>;
}
