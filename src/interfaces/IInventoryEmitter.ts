import { Inventory, RegionResult, RunMode } from '../types';

/**
 * Interface for aggregating region results
 */
export interface IInventoryEmitter {
  /**
   * Merge region results into the immutable run inventory
   */
  emit(mode: RunMode, results: RegionResult[], generatedAt: Date): Inventory;
}
