import { Region, RegionScope } from '../types';

/**
 * Interface for resolving the regions a run covers
 */
export interface IRegionEnumerator {
  /**
   * Resolve a scope selector into a non-empty, ordered region list
   */
  resolve(scope: RegionScope): Promise<Region[]>;
}
