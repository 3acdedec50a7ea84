import {
  ClassifiedRule,
  DeletionPlan,
  DeletionStep,
  DeletionStepKind,
  ErrorDetail,
  RegionScan,
  SkippedRule
} from '../types';
import { IDeletionPlanner } from '../interfaces';
import { PlanningError } from '../errors';

export const MAX_RULE_NAME_LENGTH = 128;

const STEP_RANK: Record<DeletionStepKind, number> = {
  'delete-rule': 0,
  'delete-channel': 1,
  'delete-recorder': 2
};

/**
 * Builds a region's deletion plan.
 *
 * Order: stop recorder (when recording), CLEANABLE rules by name, delivery channel, recorder.
 * PRESERVE rules never enter the step list.
 */
export class DeletionPlanner implements IDeletionPlanner {
  plan(scan: RegionScan, classified: ClassifiedRule[]): DeletionPlan {
    const skipped: SkippedRule[] = [];
    const errors: ErrorDetail[] = [];
    const ruleSteps: DeletionStep[] = [];
    const seen = new Set<string>();

    for (const entry of classified) {
      if (entry.classification === 'PRESERVE') {
        skipped.push({ name: entry.rule.name, reason: entry.preserveReason ?? 'preserve-pattern' });
        continue;
      }

      const problem = DeletionPlanner.checkRuleName(entry.rule.name);
      if (problem) {
        errors.push(new PlanningError(problem, {
          type: 'validation',
          resource: `rule:${entry.rule.name}`
        }).toDetail());
        continue;
      }

      if (seen.has(entry.rule.name)) {
        continue;
      }
      seen.add(entry.rule.name);
      ruleSteps.push({ kind: 'delete-rule', target: entry.rule.name });
    }

    ruleSteps.sort((a, b) => (a.target < b.target ? -1 : a.target > b.target ? 1 : 0));

    const steps: DeletionStep[] = [...ruleSteps];
    if (scan.channel) {
      steps.push({ kind: 'delete-channel', target: scan.channel.name });
    }
    if (scan.recorder) {
      steps.push({ kind: 'delete-recorder', target: scan.recorder.name });
    }

    const plan: DeletionPlan = { region: scan.region, steps, skipped, errors };
    if (scan.recorder?.recording) {
      plan.stopRecorder = { kind: 'stop-recorder', target: scan.recorder.name };
    }
    return plan;
  }

  validatePlan(plan: DeletionPlan): string[] {
    const violations: string[] = [];
    const targets = new Set<string>();
    let highestRank = -1;

    plan.steps.forEach((step, index) => {
      const rank = STEP_RANK[step.kind];
      if (rank < highestRank) {
        violations.push(`step ${index} (${step.kind} ${step.target}) follows a later-phase step`);
      }
      highestRank = Math.max(highestRank, rank);

      const key = `${step.kind}:${step.target}`;
      if (targets.has(key)) {
        violations.push(`step ${index} (${step.kind} ${step.target}) is a duplicate`);
      }
      targets.add(key);
    });

    const channelSteps = plan.steps.filter(step => step.kind === 'delete-channel').length;
    const recorderSteps = plan.steps.filter(step => step.kind === 'delete-recorder').length;
    if (channelSteps > 1) {
      violations.push('plan deletes more than one delivery channel');
    }
    if (recorderSteps > 1) {
      violations.push('plan deletes more than one configuration recorder');
    }
    if (plan.stopRecorder && !plan.steps.some(step => step.kind === 'delete-recorder' && step.target === plan.stopRecorder?.target)) {
      violations.push(`recorder ${plan.stopRecorder.target} is stopped but never deleted`);
    }

    return violations;
  }

  /**
   * Returns a problem description, or undefined when the name is usable
   */
  static checkRuleName(name: string): string | undefined {
    if (name.trim().length === 0) {
      return 'Config rule name is empty';
    }
    if (name.length > MAX_RULE_NAME_LENGTH) {
      return `Config rule name exceeds ${MAX_RULE_NAME_LENGTH} characters: ${name.substring(0, 32)}...`;
    }
    return undefined;
  }
}
