import { Profile } from '../types';

/**
 * Interface for loading profile documents
 */
export interface IProfileLoader {
  /**
   * Read and validate a profile; rejects with a ProfileLoadError
   */
  load(profilePath: string): Promise<Profile>;
}
