/**
 * Interface for resolving expanded paths to canonical form
 */
export interface IPathCanonicalizer {
  /**
   * Resolve paths to absolute, symlink-free form, dropping those that cannot be resolved
   */
  canonicalize(paths: readonly string[]): Promise<string[]>;
}
