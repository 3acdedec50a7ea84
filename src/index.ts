export * from './types';
export * from './interfaces';
export * from './errors';
export { AwsConfigClient, createAwsConfigClient } from './clients/AwsConfigClient';
export { AwsRegionClient } from './clients/AwsRegionClient';
export { RegionEnumerator, isValidRegionName } from './scanners/RegionEnumerator';
export { ResourceScanner, ResourceScannerOptions } from './scanners/ResourceScanner';
export { RuleClassifier, DEFAULT_CLASSIFICATION_POLICY } from './classifiers/RuleClassifier';
export { DeletionPlanner, MAX_RULE_NAME_LENGTH } from './planners/DeletionPlanner';
export {
  PlanExecutor,
  PlanExecutorOptions,
  TIMEOUT_REASON,
  RECORDER_NOT_STOPPED_REASON,
  RULE_FAILURE_REASON,
  CHANNEL_FAILURE_WARNING
} from './executors/PlanExecutor';
export { InventoryEmitter, buildRegionResult, buildFailedRegionResult } from './reporters/InventoryEmitter';
export { Reporter, ReporterOptions } from './reporters/Reporter';
export { BackupManager } from './managers/BackupManager';
export {
  CleanupOrchestrator,
  CleanupOrchestratorDependencies,
  CleanupOrchestratorOptions,
  BACKUP_FAILED_REASON
} from './orchestrators/CleanupOrchestrator';
export { RetryPolicy, RetryAttemptInfo, RetryPolicyOptions, DEFAULT_RETRY_OPTIONS } from './utils/RetryPolicy';
export {
  ConfigValidationError,
  CliOptions,
  createDefaultConfig,
  loadConfig,
  validateConfig,
  toRegionScope
} from './config/ConfigLoader';
