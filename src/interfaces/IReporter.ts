import winston from 'winston';
import { Inventory, RegionResult, RunMode, StepOutcome } from '../types';
import { RetryAttemptInfo } from '../utils/RetryPolicy';

/**
 * Interface for logging and inventory persistence
 */
export interface IReporter {
  /**
   * Log run start
   */
  logRunStart(mode: RunMode, regionCount: number): void;

  /**
   * Log run completion with summary counters
   */
  logRunComplete(inventory: Inventory): void;

  /**
   * Log the start of a region pipeline
   */
  logRegionStart(region: string, mode: RunMode): void;

  /**
   * Log the end of a region pipeline
   */
  logRegionComplete(result: RegionResult): void;

  /**
   * Log a single step outcome
   */
  logStepOutcome(region: string, outcome: StepOutcome): void;

  /**
   * Log a retried provider call
   */
  logRetry(region: string, info: RetryAttemptInfo): void;

  /**
   * Log backup operation
   */
  logBackupOperation(region: string, backupPath: string, success: boolean, error?: string): void;

  /**
   * Write the inventory as JSON
   */
  saveInventory(inventory: Inventory, filename?: string): Promise<string>;

  /**
   * Get logger instance for external use
   */
  getLogger(): winston.Logger;
}
