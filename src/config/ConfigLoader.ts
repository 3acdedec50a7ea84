import * as fs from 'fs';
import { CleanupConfig, RegionScope } from '../types';
import { DEFAULT_CLASSIFICATION_POLICY } from '../classifiers/RuleClassifier';
import { DEFAULT_RETRY_OPTIONS } from '../utils/RetryPolicy';
import { isValidRegionName } from '../scanners/RegionEnumerator';
import { formatErrorMessage } from '../errors';

export const DEFAULT_CONCURRENCY = 4;

/**
 * Raised for an unreadable config file, a malformed value or an invalid flag combination
 */
export class ConfigValidationError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigValidationError';
    this.problems = problems;
  }
}

/**
 * Options accepted from the command line; numbers arrive as strings
 */
export interface CliOptions {
  config?: string;
  regions?: string;
  allRegions?: boolean;
  execute?: boolean;
  protect?: string;
  include?: string;
  securityPrincipals?: string;
  preserveServiceLinked?: boolean;
  concurrency?: string;
  timeout?: string;
  backup?: boolean;
  backupPath?: string;
  output?: string;
  verbose?: boolean;
  logPath?: string;
}

export function createDefaultConfig(): CleanupConfig {
  return {
    scope: {
      allRegions: true,
      regions: []
    },
    cleanup: {
      dryRun: true,
      concurrency: DEFAULT_CONCURRENCY,
      backupEnabled: true,
      backupPath: './backups'
    },
    classification: {
      securityServicePrincipals: [...DEFAULT_CLASSIFICATION_POLICY.securityServicePrincipals],
      preservePatterns: [...DEFAULT_CLASSIFICATION_POLICY.preservePatterns],
      preserveServiceLinked: DEFAULT_CLASSIFICATION_POLICY.preserveServiceLinked,
      includePatterns: [...DEFAULT_CLASSIFICATION_POLICY.includePatterns]
    },
    retry: { ...DEFAULT_RETRY_OPTIONS },
    reporting: {
      verbose: false,
      logPath: './logs',
      outputPath: './inventory'
    }
  };
}

/**
 * Load configuration: defaults, then the JSON file, then CLI flags.
 * The result is validated before it is returned.
 */
export function loadConfig(options: CliOptions = {}): CleanupConfig {
  const config = createDefaultConfig();
  // Only the file can force a dry run; otherwise --execute decides
  config.cleanup.dryRun = false;

  if (options.config) {
    applyConfigFile(config, readConfigFile(options.config));
  }

  applyCliOptions(config, options);
  validateConfig(config);

  return config;
}

export function readConfigFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    throw new ConfigValidationError([`config file not found: ${filePath}`]);
  }
  try {
    return JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigValidationError([`config file ${filePath} is not valid JSON: ${formatErrorMessage(error)}`]);
  }
}

/**
 * Merge a parsed config file into the defaults. Unknown keys are ignored, known keys must have the right type.
 */
export function applyConfigFile(config: CleanupConfig, raw: unknown): void {
  if (!isRecord(raw)) {
    throw new ConfigValidationError(['config file must contain a JSON object']);
  }

  const problems: string[] = [];
  const reader = new SectionReader(problems);

  const scope = reader.section(raw, 'scope');
  if (scope) {
    config.scope.allRegions = reader.boolean(scope, 'scope.allRegions') ?? config.scope.allRegions;
    const regions = reader.stringArray(scope, 'scope.regions');
    if (regions) {
      config.scope.regions = regions;
      if (scope.allRegions === undefined) {
        config.scope.allRegions = false;
      }
    }
  }

  const cleanup = reader.section(raw, 'cleanup');
  if (cleanup) {
    config.cleanup.dryRun = reader.boolean(cleanup, 'cleanup.dryRun') ?? config.cleanup.dryRun;
    config.cleanup.concurrency = reader.number(cleanup, 'cleanup.concurrency') ?? config.cleanup.concurrency;
    const timeoutMs = reader.number(cleanup, 'cleanup.timeoutMs');
    if (timeoutMs !== undefined) {
      config.cleanup.timeoutMs = timeoutMs;
    }
    config.cleanup.backupEnabled = reader.boolean(cleanup, 'cleanup.backupEnabled') ?? config.cleanup.backupEnabled;
    config.cleanup.backupPath = reader.string(cleanup, 'cleanup.backupPath') ?? config.cleanup.backupPath;
  }

  const classification = reader.section(raw, 'classification');
  if (classification) {
    const policy = config.classification;
    policy.securityServicePrincipals =
      reader.stringArray(classification, 'classification.securityServicePrincipals') ?? policy.securityServicePrincipals;
    policy.preservePatterns = reader.stringArray(classification, 'classification.preservePatterns') ?? policy.preservePatterns;
    policy.preserveServiceLinked =
      reader.boolean(classification, 'classification.preserveServiceLinked') ?? policy.preserveServiceLinked;
    policy.includePatterns = reader.stringArray(classification, 'classification.includePatterns') ?? policy.includePatterns;
  }

  const retry = reader.section(raw, 'retry');
  if (retry) {
    config.retry.maxAttempts = reader.number(retry, 'retry.maxAttempts') ?? config.retry.maxAttempts;
    config.retry.baseDelayMs = reader.number(retry, 'retry.baseDelayMs') ?? config.retry.baseDelayMs;
    config.retry.maxDelayMs = reader.number(retry, 'retry.maxDelayMs') ?? config.retry.maxDelayMs;
  }

  const reporting = reader.section(raw, 'reporting');
  if (reporting) {
    config.reporting.verbose = reader.boolean(reporting, 'reporting.verbose') ?? config.reporting.verbose;
    config.reporting.logPath = reader.string(reporting, 'reporting.logPath') ?? config.reporting.logPath;
    config.reporting.outputPath = reader.string(reporting, 'reporting.outputPath') ?? config.reporting.outputPath;
  }

  if (problems.length > 0) {
    throw new ConfigValidationError(problems);
  }
}

/**
 * Apply CLI options to configuration
 */
export function applyCliOptions(config: CleanupConfig, options: CliOptions): void {
  const problems: string[] = [];

  // Scope
  if (options.regions !== undefined && options.allRegions) {
    problems.push('--regions and --all-regions are mutually exclusive');
  }
  if (options.regions !== undefined) {
    config.scope.allRegions = false;
    config.scope.regions = splitList(options.regions);
  } else if (options.allRegions) {
    config.scope.allRegions = true;
  }

  // Execution stays a dry run unless explicitly requested and not disabled by the config file
  config.cleanup.dryRun = config.cleanup.dryRun || !options.execute;

  // Classification
  if (options.protect !== undefined) {
    config.classification.preservePatterns = splitList(options.protect);
  }
  if (options.include !== undefined) {
    config.classification.includePatterns = splitList(options.include);
  }
  if (options.securityPrincipals !== undefined) {
    config.classification.securityServicePrincipals = splitList(options.securityPrincipals);
  }
  if (options.preserveServiceLinked === false) {
    config.classification.preserveServiceLinked = false;
  }

  // Concurrency and timeout
  if (options.concurrency !== undefined) {
    const concurrency = parseInteger(options.concurrency);
    if (concurrency === undefined) {
      problems.push(`--concurrency must be an integer, got "${options.concurrency}"`);
    } else {
      config.cleanup.concurrency = concurrency;
    }
  }
  if (options.timeout !== undefined) {
    const timeoutMs = parseInteger(options.timeout);
    if (timeoutMs === undefined) {
      problems.push(`--timeout must be an integer number of milliseconds, got "${options.timeout}"`);
    } else {
      config.cleanup.timeoutMs = timeoutMs;
    }
  }

  // Backup settings
  if (options.backup === false) {
    config.cleanup.backupEnabled = false;
  }
  if (options.backupPath) {
    config.cleanup.backupPath = options.backupPath;
  }

  // Reporting settings
  if (options.verbose) {
    config.reporting.verbose = true;
  }
  if (options.logPath) {
    config.reporting.logPath = options.logPath;
  }
  if (options.output) {
    config.reporting.outputPath = options.output;
  }

  if (problems.length > 0) {
    throw new ConfigValidationError(problems);
  }
}

/**
 * Validate configuration values; throws ConfigValidationError listing every problem
 */
export function validateConfig(config: CleanupConfig): void {
  const problems: string[] = [];

  if (!config.scope.allRegions) {
    if (config.scope.regions.length === 0) {
      problems.push('an explicit region list must not be empty');
    }
    const invalid = config.scope.regions.filter(name => !isValidRegionName(name.trim()));
    if (invalid.length > 0) {
      problems.push(`invalid region names: ${invalid.join(', ')}`);
    }
  }

  if (!Number.isInteger(config.cleanup.concurrency) || config.cleanup.concurrency < 1) {
    problems.push(`cleanup.concurrency must be a positive integer, got ${config.cleanup.concurrency}`);
  }
  if (config.cleanup.timeoutMs !== undefined && (!Number.isFinite(config.cleanup.timeoutMs) || config.cleanup.timeoutMs < 0)) {
    problems.push(`cleanup.timeoutMs must not be negative, got ${config.cleanup.timeoutMs}`);
  }
  if (config.cleanup.backupEnabled && config.cleanup.backupPath.trim() === '') {
    problems.push('cleanup.backupPath must not be empty when backups are enabled');
  }

  if (!Number.isInteger(config.retry.maxAttempts) || config.retry.maxAttempts < 1) {
    problems.push(`retry.maxAttempts must be at least 1, got ${config.retry.maxAttempts}`);
  }
  if (config.retry.baseDelayMs < 0 || config.retry.maxDelayMs < 0) {
    problems.push('retry delays must not be negative');
  }

  const emptyPattern = [...config.classification.preservePatterns, ...config.classification.includePatterns]
    .some(pattern => pattern.trim() === '');
  if (emptyPattern) {
    problems.push('classification patterns must not be empty strings');
  }

  if (problems.length > 0) {
    throw new ConfigValidationError(problems);
  }
}

export function toRegionScope(config: CleanupConfig): RegionScope {
  return config.scope.allRegions
    ? { kind: 'all' }
    : { kind: 'explicit', regions: [...config.scope.regions] };
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

function parseInteger(value: string): number | undefined {
  return /^-?\d+$/.test(value.trim()) ? Number.parseInt(value, 10) : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Typed field access over an untyped config object, collecting problems instead of throwing
 */
class SectionReader {
  constructor(private problems: string[]) {}

  section(raw: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
    const value = raw[key];
    if (value === undefined) {
      return undefined;
    }
    if (!isRecord(value)) {
      this.problems.push(`${key} must be an object`);
      return undefined;
    }
    return value;
  }

  boolean(section: Record<string, unknown>, path: string): boolean | undefined {
    return this.typed(section, path, 'boolean', (value): value is boolean => typeof value === 'boolean');
  }

  number(section: Record<string, unknown>, path: string): number | undefined {
    return this.typed(section, path, 'number', (value): value is number => typeof value === 'number');
  }

  string(section: Record<string, unknown>, path: string): string | undefined {
    return this.typed(section, path, 'string', (value): value is string => typeof value === 'string');
  }

  stringArray(section: Record<string, unknown>, path: string): string[] | undefined {
    return this.typed(section, path, 'array of strings', (value): value is string[] =>
      Array.isArray(value) && value.every(item => typeof item === 'string'));
  }

  private typed<T>(
    section: Record<string, unknown>,
    path: string,
    expected: string,
    guard: (value: unknown) => value is T
  ): T | undefined {
    const key = path.slice(path.lastIndexOf('.') + 1);
    const value = section[key];
    if (value === undefined) {
      return undefined;
    }
    if (!guard(value)) {
      this.problems.push(`${path} must be a ${expected}`);
      return undefined;
    }
    return value;
  }
}
