import {
  ChannelRecord,
  ClassifiedRule,
  DeletionPlan,
  ErrorDetail,
  Inventory,
  InventorySummary,
  Outcome,
  RecorderRecord,
  RegionResult,
  RegionScan,
  RuleRecord,
  RunMode,
  StepOutcome,
  StopStatus
} from '../types';
import { IInventoryEmitter } from '../interfaces';
import { TIMEOUT_REASON } from '../executors/PlanExecutor';

export interface RegionResultInput {
  scan: RegionScan;
  classified: ClassifiedRule[];
  plan: DeletionPlan;
  outcomes: StepOutcome[];
  backupPath?: string;
}

/**
 * Map a step status onto a resource outcome
 */
function toOutcome(step: StepOutcome | undefined): Outcome {
  if (!step) {
    return 'PENDING';
  }
  return step.status === 'STOPPED' ? 'DELETED' : step.status;
}

function stepDetails(step: StepOutcome | undefined): Pick<RuleRecord, 'alreadyAbsent' | 'reason' | 'error'> {
  if (!step) {
    return {};
  }
  return {
    ...(step.alreadyAbsent ? { alreadyAbsent: true } : {}),
    ...(step.reason ? { reason: step.reason } : {}),
    ...(step.error ? { error: step.error } : {})
  };
}

function toStopStatus(plan: DeletionPlan, stop: StepOutcome | undefined): StopStatus {
  if (!plan.stopRecorder) {
    return 'NOT_REQUIRED';
  }
  switch (stop?.status) {
  case 'STOPPED':
  case 'DELETED':
    return 'STOPPED';
  case 'SIMULATED':
    return 'SIMULATED';
  case 'FAILED':
    return 'FAILED';
  default:
    return 'SKIPPED';
  }
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Assemble one region's result from its scan, classification, plan and step outcomes
 */
export function buildRegionResult(input: RegionResultInput): RegionResult {
  const { scan, classified, plan, outcomes } = input;
  const findStep = (kind: StepOutcome['kind'], target: string): StepOutcome | undefined =>
    outcomes.find(outcome => outcome.kind === kind && outcome.target === target);
  const planningErrorFor = (name: string): ErrorDetail | undefined =>
    plan.errors.find(error => error.resource === `rule:${name}`);

  const rules = classified.map(({ rule, classification, preserveReason }): RuleRecord => {
    const record: RuleRecord = {
      name: rule.name,
      ...(rule.arn ? { arn: rule.arn } : {}),
      ...(rule.sourceOwner ? { sourceOwner: rule.sourceOwner } : {}),
      ...(rule.sourceIdentifier ? { sourceIdentifier: rule.sourceIdentifier } : {}),
      ...(rule.createdBy ? { createdBy: rule.createdBy } : {}),
      classification,
      ...(preserveReason ? { preserveReason } : {}),
      outcome: 'PENDING'
    };

    if (classification === 'PRESERVE') {
      return { ...record, outcome: 'SKIPPED', reason: preserveReason ?? 'preserved' };
    }

    const planningError = planningErrorFor(rule.name);
    if (planningError) {
      return { ...record, outcome: 'FAILED', error: planningError };
    }

    const step = findStep('delete-rule', rule.name);
    return { ...record, outcome: toOutcome(step), ...stepDetails(step) };
  });

  let recorder: RecorderRecord | null = null;
  if (scan.recorder) {
    const stop = findStep('stop-recorder', scan.recorder.name);
    const step = findStep('delete-recorder', scan.recorder.name);
    const stopStatus = toStopStatus(plan, stop);
    recorder = {
      name: scan.recorder.name,
      recording: scan.recorder.recording,
      ...(scan.recorder.roleArn ? { roleArn: scan.recorder.roleArn } : {}),
      stopStatus,
      outcome: toOutcome(step),
      ...stepDetails(step),
      ...(step?.warning ? { warning: step.warning } : {})
    };
    if (stop?.error && !recorder.error) {
      recorder.error = stop.error;
    }
  }

  let channel: ChannelRecord | null = null;
  if (scan.channel) {
    const step = findStep('delete-channel', scan.channel.name);
    channel = {
      name: scan.channel.name,
      ...(scan.channel.s3BucketName ? { s3BucketName: scan.channel.s3BucketName } : {}),
      ...(scan.channel.snsTopicArn ? { snsTopicArn: scan.channel.snsTopicArn } : {}),
      outcome: toOutcome(step),
      ...stepDetails(step)
    };
  }

  return {
    region: scan.region,
    recorder,
    channel,
    rules,
    steps: [...outcomes],
    quarantined: [...scan.quarantined],
    planningErrors: [...plan.errors],
    timedOut: outcomes.some(outcome => outcome.reason === TIMEOUT_REASON),
    ...(input.backupPath ? { backupPath: input.backupPath } : {})
  };
}

/**
 * Result for a region that could not be scanned: no resources, error attached
 */
export function buildFailedRegionResult(region: string, error: ErrorDetail, timedOut: boolean = false): RegionResult {
  return {
    region,
    recorder: null,
    channel: null,
    rules: [],
    steps: [],
    quarantined: [],
    planningErrors: [],
    error,
    timedOut
  };
}

/**
 * Aggregates region results into the run inventory
 */
export class InventoryEmitter implements IInventoryEmitter {
  emit(mode: RunMode, results: RegionResult[], generatedAt: Date): Inventory {
    const inventory: Inventory = {
      mode,
      generatedAt: generatedAt.toISOString(),
      regions: [...results],
      summary: this.summarize(results)
    };
    return deepFreeze(inventory);
  }

  /**
   * Fold every rule's final outcome into the run counters
   */
  summarize(results: RegionResult[]): InventorySummary {
    const summary: InventorySummary = {
      regions: results.length,
      regionsFailed: 0,
      discovered: 0,
      preserved: 0,
      cleaned: 0,
      failed: 0,
      simulated: 0,
      skipped: 0,
      quarantined: 0
    };

    for (const result of results) {
      if (result.error) {
        summary.regionsFailed++;
      }
      summary.quarantined += result.quarantined.length;

      for (const rule of result.rules) {
        summary.discovered++;
        if (rule.classification === 'PRESERVE') {
          summary.preserved++;
        }
        switch (rule.outcome) {
        case 'DELETED':
          summary.cleaned++;
          break;
        case 'SIMULATED':
          summary.cleaned++;
          summary.simulated++;
          break;
        case 'FAILED':
          summary.failed++;
          break;
        case 'SKIPPED':
          summary.skipped++;
          break;
        case 'PENDING':
          break;
        }
      }
    }

    return summary;
  }
}
