import { ClassifiedRule, DeletionPlan, RegionScan } from '../types';

/**
 * Interface for ordering a region's deletions
 */
export interface IDeletionPlanner {
  /**
   * Build the ordered deletion plan for one region
   */
  plan(scan: RegionScan, classified: ClassifiedRule[]): DeletionPlan;

  /**
   * Report ordering violations in a plan; empty when the plan is valid
   */
  validatePlan(plan: DeletionPlan): string[];
}
