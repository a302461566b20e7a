import { CleanError, CleanReport, RunMode } from '../types';

/**
 * Interface for clean orchestration
 */
export interface ICleanOrchestrator {
  /**
   * Load a profile, resolve its entries and remove the resulting paths
   */
  clean(profilePath: string, mode: RunMode): Promise<CleanReport>;

  /**
   * Load a profile and check that every pattern compiles
   */
  validate(profilePath: string): Promise<CleanError[]>;
}
