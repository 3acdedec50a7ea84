import { ClassifiedRule, DeletionPlan, RegionScan, RunMode, StepOutcome } from '../types';
import { IConfigServiceClient } from './IConfigServiceClient';

export interface ExecutionContext {
  mode: RunMode;
  client: IConfigServiceClient;
  scan: RegionScan;
  /** Rule classifications; delete-rule steps are refused unless the rule is CLEANABLE */
  classified: ClassifiedRule[];
  signal?: AbortSignal;
}

/**
 * Interface for applying or simulating a deletion plan
 */
export interface IPlanExecutor {
  /**
   * Run the plan's steps in order and return one outcome per step
   */
  execute(plan: DeletionPlan, context: ExecutionContext): Promise<StepOutcome[]>;
}
