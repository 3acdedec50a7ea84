import {
  ClassificationPolicy,
  ClassificationResult,
  ClassifiedRule,
  ConfigRuleResource
} from '../types';
import { IRuleClassifier } from '../interfaces';

export const DEFAULT_CLASSIFICATION_POLICY: ClassificationPolicy = {
  securityServicePrincipals: ['securityhub.amazonaws.com'],
  preservePatterns: ['securityhub-*'],
  preserveServiceLinked: true,
  includePatterns: []
};

/**
 * Decides whether a Config rule is preserved or may be cleaned up.
 * Works only on scanned attributes, so the same rule always gets the same answer.
 *
 * Pattern syntax:
 * - `securityhub-*` wildcard against the rule name
 * - `arn:aws:config:*:*:config-rule/...` against the rule ARN
 * - `source:AWS_*` against the managed rule source identifier
 */
export class RuleClassifier implements IRuleClassifier {
  private readonly policy: ClassificationPolicy;
  private readonly principals: Set<string>;
  private readonly preserveMatchers: Array<(rule: ConfigRuleResource) => boolean>;
  private readonly includeMatchers: Array<(rule: ConfigRuleResource) => boolean>;

  constructor(policy: Partial<ClassificationPolicy> = {}) {
    this.policy = {
      securityServicePrincipals: [...(policy.securityServicePrincipals ?? DEFAULT_CLASSIFICATION_POLICY.securityServicePrincipals)],
      preservePatterns: [...(policy.preservePatterns ?? DEFAULT_CLASSIFICATION_POLICY.preservePatterns)],
      preserveServiceLinked: policy.preserveServiceLinked ?? DEFAULT_CLASSIFICATION_POLICY.preserveServiceLinked,
      includePatterns: [...(policy.includePatterns ?? DEFAULT_CLASSIFICATION_POLICY.includePatterns)]
    };
    this.principals = new Set(this.policy.securityServicePrincipals.map(p => p.toLowerCase()));
    this.preserveMatchers = this.policy.preservePatterns.map(pattern => RuleClassifier.compilePattern(pattern));
    this.includeMatchers = this.policy.includePatterns.map(pattern => RuleClassifier.compilePattern(pattern));
  }

  classify(rule: ConfigRuleResource): ClassificationResult {
    if (rule.createdBy && this.principals.has(rule.createdBy.toLowerCase())) {
      return { classification: 'PRESERVE', preserveReason: 'security-service-owner' };
    }

    if (this.preserveMatchers.some(matches => matches(rule))) {
      return { classification: 'PRESERVE', preserveReason: 'preserve-pattern' };
    }

    // Rules created by any AWS service principal are service-linked
    if (this.policy.preserveServiceLinked && rule.createdBy) {
      return { classification: 'PRESERVE', preserveReason: 'service-linked' };
    }

    if (this.includeMatchers.length > 0 && !this.includeMatchers.some(matches => matches(rule))) {
      return { classification: 'PRESERVE', preserveReason: 'not-included' };
    }

    return { classification: 'CLEANABLE' };
  }

  classifyAll(rules: ConfigRuleResource[]): ClassifiedRule[] {
    return rules.map(rule => ({ rule, ...this.classify(rule) }));
  }

  getPolicy(): ClassificationPolicy {
    return {
      securityServicePrincipals: [...this.policy.securityServicePrincipals],
      preservePatterns: [...this.policy.preservePatterns],
      preserveServiceLinked: this.policy.preserveServiceLinked,
      includePatterns: [...this.policy.includePatterns]
    };
  }

  /**
   * Compile a pattern into a rule predicate
   */
  static compilePattern(pattern: string): (rule: ConfigRuleResource) => boolean {
    if (pattern.startsWith('source:')) {
      const regex = RuleClassifier.wildcardToRegex(pattern.substring('source:'.length));
      return rule => rule.sourceIdentifier !== undefined && regex.test(rule.sourceIdentifier);
    }

    if (pattern.startsWith('arn:')) {
      const regex = RuleClassifier.wildcardToRegex(pattern);
      return rule => rule.arn !== undefined && regex.test(rule.arn);
    }

    const regex = RuleClassifier.wildcardToRegex(pattern);
    return rule => regex.test(rule.name);
  }

  /**
   * Convert wildcard pattern to an anchored regex
   * Supports * as wildcard; it also matches line breaks
   */
  static wildcardToRegex(pattern: string): RegExp {
    // Escape special regex characters except *
    const escaped = pattern.replace(/[.+?^${}()|[\]\\]/g, '\\$&');
    return new RegExp(`^${escaped.replace(/\*/g, '.*')}$`, 's');
  }
}
