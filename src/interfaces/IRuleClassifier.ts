import { ClassificationResult, ClassifiedRule, ConfigRuleResource } from '../types';

/**
 * Interface for deciding which rules are preserved
 */
export interface IRuleClassifier {
  /**
   * Classify a single rule from its scanned attributes
   */
  classify(rule: ConfigRuleResource): ClassificationResult;

  /**
   * Classify every rule of a region
   */
  classifyAll(rules: ConfigRuleResource[]): ClassifiedRule[];
}
