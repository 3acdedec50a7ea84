import { ClassifiedRule, ErrorDetail, Inventory, RegionScan, RegionScope, RunMode } from '../types';

export interface RunRequest {
  mode: RunMode;
  scope: RegionScope;
}

export interface RegionDiscovery {
  region: string;
  scan?: RegionScan;
  classified: ClassifiedRule[];
  error?: ErrorDetail;
}

/**
 * Interface for cleanup orchestration
 */
export interface ICleanupOrchestrator {
  /**
   * Execute the complete discovery and cleanup workflow
   */
  run(request: RunRequest): Promise<Inventory>;

  /**
   * Scan and classify every region in scope without planning or executing anything
   */
  discover(scope: RegionScope): Promise<RegionDiscovery[]>;
}
