/**
 * Core type definitions for the AWS Config cleanup engine
 */

// Run Types
export type RunMode = 'dry-run' | 'execute';

export type RegionScope =
  | { kind: 'all' }
  | { kind: 'explicit'; regions: string[] };

export interface Region {
  name: string;
  enabled: boolean;
  optInStatus?: string;
}

// Resource Types
export type ResourceKind = 'recorder' | 'channel' | 'rule';

export interface ConfigRecorderResource {
  kind: 'recorder';
  name: string;
  recording: boolean;
  roleArn?: string;
  lastStatus?: string;
}

export interface DeliveryChannelResource {
  kind: 'channel';
  name: string;
  s3BucketName?: string;
  s3KeyPrefix?: string;
  snsTopicArn?: string;
}

export interface ConfigRuleResource {
  kind: 'rule';
  name: string;
  arn?: string;
  ruleId?: string;
  sourceOwner?: string;
  sourceIdentifier?: string;
  createdBy?: string;
  description?: string;
  state?: string;
}

export type ConfigResource = ConfigRecorderResource | DeliveryChannelResource | ConfigRuleResource;

export interface QuarantinedResource {
  kind: ResourceKind;
  identifier: string;
  reason: string;
}

export interface RegionScan {
  region: string;
  recorder: ConfigRecorderResource | null;
  channel: DeliveryChannelResource | null;
  rules: ConfigRuleResource[];
  quarantined: QuarantinedResource[];
}

// Classification Types
export type Classification = 'PRESERVE' | 'CLEANABLE';

export type PreserveReason =
  | 'security-service-owner'
  | 'preserve-pattern'
  | 'service-linked'
  | 'not-included';

export interface ClassificationPolicy {
  securityServicePrincipals: string[];
  preservePatterns: string[];
  preserveServiceLinked: boolean;
  includePatterns: string[];
}

export interface ClassificationResult {
  classification: Classification;
  preserveReason?: PreserveReason;
}

export interface ClassifiedRule extends ClassificationResult {
  rule: ConfigRuleResource;
}

// Error Types
export type ErrorClass = 'DiscoveryError' | 'RegionScanError' | 'PlanningError' | 'DeletionError';

export type ErrorType =
  | 'authentication'
  | 'permission'
  | 'throttling'
  | 'resource_in_use'
  | 'resource_not_found'
  | 'network'
  | 'validation'
  | 'timeout'
  | 'unknown';

export interface ErrorDetail {
  errorClass: ErrorClass;
  type: ErrorType;
  message: string;
  code?: string;
  retryable: boolean;
  resource?: string;
}

// Plan Types
export type DeletionStepKind = 'delete-rule' | 'delete-channel' | 'delete-recorder';

export interface DeletionStep {
  kind: DeletionStepKind;
  target: string;
}

export interface StopRecorderStep {
  kind: 'stop-recorder';
  target: string;
}

export type PlanStep = StopRecorderStep | DeletionStep;

export interface SkippedRule {
  name: string;
  reason: PreserveReason;
}

export interface DeletionPlan {
  region: string;
  stopRecorder?: StopRecorderStep;
  steps: DeletionStep[];
  skipped: SkippedRule[];
  errors: ErrorDetail[];
}

// Outcome Types
export type Outcome = 'PENDING' | 'DELETED' | 'FAILED' | 'SKIPPED' | 'SIMULATED';

export type StopStatus = 'STOPPED' | 'SIMULATED' | 'FAILED' | 'SKIPPED' | 'NOT_REQUIRED';

export type StepStatus = Exclude<Outcome, 'PENDING'> | 'STOPPED';

export interface StepOutcome {
  kind: PlanStep['kind'];
  target: string;
  status: StepStatus;
  alreadyAbsent?: boolean;
  reason?: string;
  warning?: string;
  error?: ErrorDetail;
}

// Result Types
export interface RuleRecord {
  name: string;
  arn?: string;
  sourceOwner?: string;
  sourceIdentifier?: string;
  createdBy?: string;
  classification: Classification;
  preserveReason?: PreserveReason;
  outcome: Outcome;
  alreadyAbsent?: boolean;
  reason?: string;
  error?: ErrorDetail;
}

export interface RecorderRecord {
  name: string;
  recording: boolean;
  roleArn?: string;
  stopStatus: StopStatus;
  outcome: Outcome;
  alreadyAbsent?: boolean;
  reason?: string;
  warning?: string;
  error?: ErrorDetail;
}

export interface ChannelRecord {
  name: string;
  s3BucketName?: string;
  snsTopicArn?: string;
  outcome: Outcome;
  alreadyAbsent?: boolean;
  reason?: string;
  error?: ErrorDetail;
}

export interface RegionResult {
  region: string;
  recorder: RecorderRecord | null;
  channel: ChannelRecord | null;
  rules: RuleRecord[];
  steps: StepOutcome[];
  quarantined: QuarantinedResource[];
  planningErrors: ErrorDetail[];
  error?: ErrorDetail;
  timedOut: boolean;
  backupPath?: string;
}

export interface InventorySummary {
  regions: number;
  regionsFailed: number;
  discovered: number;
  preserved: number;
  cleaned: number;
  failed: number;
  simulated: number;
  skipped: number;
  quarantined: number;
}

export interface Inventory {
  mode: RunMode;
  generatedAt: string;
  regions: readonly RegionResult[];
  summary: InventorySummary;
}

// Configuration Types
export interface ScopeOptions {
  allRegions: boolean;
  regions: string[];
}

export interface CleanupOptions {
  dryRun: boolean;
  concurrency: number;
  timeoutMs?: number;
  backupEnabled: boolean;
  backupPath: string;
}

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface ReportingOptions {
  verbose: boolean;
  logPath: string;
  outputPath: string;
}

export interface CleanupConfig {
  scope: ScopeOptions;
  cleanup: CleanupOptions;
  classification: ClassificationPolicy;
  retry: RetryOptions;
  reporting: ReportingOptions;
}

// Backup Types
export interface Backup {
  timestamp: Date;
  region: string;
  scan: RegionScan;
  classified: ClassifiedRule[];
  metadata: {
    ruleCount: number;
    cleanableCount: number;
  };
}

export interface BackupResult {
  success: boolean;
  backupPath: string;
  error?: string;
}
