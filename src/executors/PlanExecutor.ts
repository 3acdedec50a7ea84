import { DeletionPlan, PlanStep, RegionScan, StepOutcome } from '../types';
import { ExecutionContext, IConfigServiceClient, IDeletionPlanner, IPlanExecutor } from '../interfaces';
import { DeletionError, PlanningError, formatErrorMessage, isNotFoundError } from '../errors';
import { DeletionPlanner } from '../planners/DeletionPlanner';
import { RetryAttemptInfo, RetryPolicy } from '../utils/RetryPolicy';

export const TIMEOUT_REASON = 'timeout';
export const RECORDER_NOT_STOPPED_REASON = 'configuration recorder could not be stopped';
export const RULE_FAILURE_REASON = 'dependent rule deletion failed';
export const PRESERVED_RULE_REASON = 'rule is not classified CLEANABLE';
export const CHANNEL_FAILURE_WARNING = 'delivery channel deletion failed; recorder deleted after it was stopped';

export interface PlanExecutorOptions {
  retryPolicy?: RetryPolicy;
  planner?: IDeletionPlanner;
  onStep?: (region: string, outcome: StepOutcome) => void;
  onRetry?: (region: string, info: RetryAttemptInfo) => void;
}

/**
 * Applies a deletion plan one step at a time.
 *
 * Dry-run issues no mutating call; every valid step is reported SIMULATED.
 * A missing resource on delete counts as already deleted.
 * A rule step runs only when the rule was classified CLEANABLE, whatever planner built the plan.
 */
export class PlanExecutor implements IPlanExecutor {
  private retryPolicy: RetryPolicy;
  private planner: IDeletionPlanner;
  private onStep?: (region: string, outcome: StepOutcome) => void;
  private onRetry?: (region: string, info: RetryAttemptInfo) => void;

  constructor(options: PlanExecutorOptions = {}) {
    this.retryPolicy = options.retryPolicy ?? new RetryPolicy();
    this.planner = options.planner ?? new DeletionPlanner();
    this.onStep = options.onStep;
    this.onRetry = options.onRetry;
  }

  async execute(plan: DeletionPlan, context: ExecutionContext): Promise<StepOutcome[]> {
    const outcomes: StepOutcome[] = [];
    const record = (outcome: StepOutcome): void => {
      outcomes.push(outcome);
      this.onStep?.(plan.region, outcome);
    };

    const violations = this.planner.validatePlan(plan);
    if (violations.length > 0) {
      const error = new PlanningError(`Invalid deletion plan for ${plan.region}: ${violations.join('; ')}`, {
        type: 'validation'
      }).toDetail();
      for (const step of this.allSteps(plan)) {
        record({ kind: step.kind, target: step.target, status: 'FAILED', reason: 'invalid plan', error });
      }
      return outcomes;
    }

    let recorderStopFailed = false;
    let ruleFailed = false;
    let channelFailed = false;

    if (plan.stopRecorder) {
      if (context.signal?.aborted) {
        record({ kind: 'stop-recorder', target: plan.stopRecorder.target, status: 'SKIPPED', reason: TIMEOUT_REASON });
        recorderStopFailed = true;
      } else {
        const outcome = await this.runStep(plan.stopRecorder, context);
        recorderStopFailed = outcome.status === 'FAILED';
        record(outcome);
      }
    }

    for (const step of plan.steps) {
      // Checked between steps only; an in-flight call always completes
      if (context.signal?.aborted) {
        record({ kind: step.kind, target: step.target, status: 'SKIPPED', reason: TIMEOUT_REASON });
        continue;
      }

      const missing = this.checkTargetExists(step, context.scan);
      if (missing) {
        record({ kind: step.kind, target: step.target, status: 'FAILED', reason: 'invalid plan', error: missing });
        if (step.kind === 'delete-rule') ruleFailed = true;
        if (step.kind === 'delete-channel') channelFailed = true;
        continue;
      }

      const notCleanable = this.checkRuleCleanable(step, context);
      if (notCleanable) {
        record({ kind: step.kind, target: step.target, status: 'FAILED', reason: PRESERVED_RULE_REASON, error: notCleanable });
        ruleFailed = true;
        continue;
      }

      if (context.mode === 'execute') {
        if (step.kind === 'delete-channel' && recorderStopFailed) {
          record({ kind: step.kind, target: step.target, status: 'SKIPPED', reason: RECORDER_NOT_STOPPED_REASON });
          continue;
        }
        if (step.kind === 'delete-recorder' && recorderStopFailed) {
          record({ kind: step.kind, target: step.target, status: 'SKIPPED', reason: RECORDER_NOT_STOPPED_REASON });
          continue;
        }
        if (step.kind === 'delete-recorder' && ruleFailed) {
          record({ kind: step.kind, target: step.target, status: 'SKIPPED', reason: RULE_FAILURE_REASON });
          continue;
        }
      }

      const outcome = await this.runStep(step, context);

      if (outcome.status === 'FAILED') {
        if (step.kind === 'delete-rule') ruleFailed = true;
        if (step.kind === 'delete-channel') channelFailed = true;
      }
      if (step.kind === 'delete-recorder' && channelFailed) {
        outcome.warning = CHANNEL_FAILURE_WARNING;
      }

      record(outcome);
    }

    return outcomes;
  }

  private allSteps(plan: DeletionPlan): PlanStep[] {
    return plan.stopRecorder ? [plan.stopRecorder, ...plan.steps] : [...plan.steps];
  }

  /**
   * Every step must target a resource present in the region's scan snapshot
   */
  private checkTargetExists(step: PlanStep, scan: RegionScan): StepOutcome['error'] {
    let exists = false;
    switch (step.kind) {
    case 'delete-rule':
      exists = scan.rules.some(rule => rule.name === step.target);
      break;
    case 'delete-channel':
      exists = scan.channel?.name === step.target;
      break;
    case 'delete-recorder':
    case 'stop-recorder':
      exists = scan.recorder?.name === step.target;
      break;
    }

    if (exists) {
      return undefined;
    }
    return new PlanningError(`${step.kind} target ${step.target} was not found in the ${scan.region} scan`, {
      type: 'validation',
      resource: step.target
    }).toDetail();
  }

  private checkRuleCleanable(step: PlanStep, context: ExecutionContext): StepOutcome['error'] {
    if (step.kind !== 'delete-rule') {
      return undefined;
    }
    const entry = context.classified.find(candidate => candidate.rule.name === step.target);
    if (entry?.classification === 'CLEANABLE') {
      return undefined;
    }
    const why = entry ? `is classified PRESERVE (${entry.preserveReason ?? 'preserved'})` : 'has no classification';
    return new PlanningError(`Rule ${step.target} ${why} and cannot be deleted`, {
      type: 'validation',
      resource: step.target
    }).toDetail();
  }

  private async runStep(step: PlanStep, context: ExecutionContext): Promise<StepOutcome> {
    const success = step.kind === 'stop-recorder' ? 'STOPPED' : 'DELETED';

    if (context.mode === 'dry-run') {
      return { kind: step.kind, target: step.target, status: 'SIMULATED' };
    }

    try {
      await this.retryPolicy.execute(
        () => this.invoke(step, context.client),
        `${step.kind}:${step.target}`,
        info => this.onRetry?.(context.client.region, info)
      );
      return { kind: step.kind, target: step.target, status: success };
    } catch (error) {
      if (isNotFoundError(error)) {
        return { kind: step.kind, target: step.target, status: success, alreadyAbsent: true };
      }

      const deletionError = new DeletionError(
        `Failed to ${step.kind.replace('-', ' ')} ${step.target}: ${formatErrorMessage(error)}`,
        { cause: error, resource: step.target }
      );
      return { kind: step.kind, target: step.target, status: 'FAILED', error: deletionError.toDetail() };
    }
  }

  private invoke(step: PlanStep, client: IConfigServiceClient): Promise<void> {
    switch (step.kind) {
    case 'stop-recorder':
      return client.stopConfigurationRecorder(step.target);
    case 'delete-rule':
      return client.deleteConfigRule(step.target);
    case 'delete-channel':
      return client.deleteDeliveryChannel(step.target);
    case 'delete-recorder':
      return client.deleteConfigurationRecorder(step.target);
    }
  }
}
