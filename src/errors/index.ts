import { ErrorClass, ErrorDetail, ErrorType } from '../types';

export interface CleanupErrorContext {
  type?: ErrorType;
  code?: string;
  retryable?: boolean;
  resource?: string;
  cause?: unknown;
}

/**
 * Base class for the engine's error taxonomy.
 * Only DiscoveryError is allowed to escape a run; the others are recorded in the inventory.
 */
export abstract class CleanupError extends Error {
  abstract readonly errorClass: ErrorClass;
  readonly type: ErrorType;
  readonly code?: string;
  readonly retryable: boolean;
  readonly resource?: string;

  constructor(message: string, context: CleanupErrorContext = {}) {
    super(message, context.cause !== undefined ? { cause: context.cause } : undefined);
    this.name = new.target.name;
    const classified = context.cause !== undefined ? classifyAwsError(context.cause) : undefined;
    this.type = context.type ?? classified?.type ?? 'unknown';
    this.code = context.code ?? classified?.code;
    this.retryable = context.retryable ?? classified?.retryable ?? false;
    this.resource = context.resource;
  }

  toDetail(): ErrorDetail {
    const detail: ErrorDetail = {
      errorClass: this.errorClass,
      type: this.type,
      message: this.message,
      retryable: this.retryable
    };
    if (this.code) {
      detail.code = this.code;
    }
    if (this.resource) {
      detail.resource = this.resource;
    }
    return detail;
  }
}

export class DiscoveryError extends CleanupError {
  readonly errorClass = 'DiscoveryError';
}

export class RegionScanError extends CleanupError {
  readonly errorClass = 'RegionScanError';
  readonly region: string;

  constructor(region: string, message: string, context: CleanupErrorContext = {}) {
    super(message, context);
    this.region = region;
  }
}

export class PlanningError extends CleanupError {
  readonly errorClass = 'PlanningError';
}

export class DeletionError extends CleanupError {
  readonly errorClass = 'DeletionError';
}

export interface ClassifiedAwsError {
  type: ErrorType;
  code?: string;
  retryable: boolean;
  message: string;
}

const THROTTLING_CODES = new Set([
  'ThrottlingException',
  'Throttling',
  'TooManyRequestsException',
  'RequestLimitExceeded',
  'SlowDown'
]);

const NOT_FOUND_CODES = new Set([
  'NoSuchConfigRuleException',
  'NoSuchDeliveryChannelException',
  'NoSuchConfigurationRecorderException',
  'ResourceNotFoundException'
]);

const PERMISSION_CODES = new Set([
  'AccessDenied',
  'AccessDeniedException',
  'UnauthorizedOperation',
  'InsufficientPermissionsException'
]);

const AUTHENTICATION_CODES = new Set([
  'UnrecognizedClientException',
  'InvalidClientTokenId',
  'ExpiredToken',
  'ExpiredTokenException',
  'AuthFailure',
  'CredentialsProviderError'
]);

const SERVER_CODES = new Set([
  'ServiceUnavailable',
  'ServiceUnavailableException',
  'InternalFailure',
  'InternalServerError',
  'InternalError'
]);

const NETWORK_CODES = new Set([
  'TimeoutError',
  'RequestTimeout',
  'RequestTimeoutException',
  'NetworkingError',
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN'
]);

const VALIDATION_CODES = new Set([
  'ValidationException',
  'InvalidParameterValueException',
  'InvalidParameterValue',
  'InvalidNextTokenException',
  'LastDeliveryChannelDeleteFailedException'
]);

function readField(source: object, key: string): unknown {
  return key in source ? Reflect.get(source, key) : undefined;
}

/**
 * SDK v3 errors carry the service code in `name`; older shapes use `Code` or `code`
 */
function readCode(error: object): string | undefined {
  for (const key of ['Code', 'code', 'name']) {
    const candidate = readField(error, key);
    if (typeof candidate === 'string' && candidate.length > 0 && candidate !== 'Error') {
      return candidate;
    }
  }
  return undefined;
}

function readStatus(error: object): number | undefined {
  const metadata = readField(error, '$metadata');
  if (!metadata || typeof metadata !== 'object') {
    return undefined;
  }
  const status = readField(metadata, 'httpStatusCode');
  return typeof status === 'number' ? status : undefined;
}

/**
 * Map an SDK (or network) error onto the engine's ErrorType and retryability
 */
export function classifyAwsError(error: unknown): ClassifiedAwsError {
  if (error instanceof CleanupError) {
    return { type: error.type, code: error.code, retryable: error.retryable, message: error.message };
  }

  const message = formatErrorMessage(error);
  if (!error || typeof error !== 'object') {
    return { type: 'unknown', retryable: false, message };
  }

  const code = readCode(error);
  const status = readStatus(error);

  if (code && NOT_FOUND_CODES.has(code)) {
    return { type: 'resource_not_found', code, retryable: false, message };
  }
  if ((code && THROTTLING_CODES.has(code)) || status === 429 || /rate exceeded/i.test(message)) {
    return { type: 'throttling', code, retryable: true, message };
  }
  if (code === 'ResourceInUseException') {
    return { type: 'resource_in_use', code, retryable: true, message };
  }
  if (code && AUTHENTICATION_CODES.has(code)) {
    return { type: 'authentication', code, retryable: false, message };
  }
  if ((code && PERMISSION_CODES.has(code)) || status === 403) {
    return { type: 'permission', code, retryable: false, message };
  }
  if (code && NETWORK_CODES.has(code)) {
    return { type: 'network', code, retryable: true, message };
  }
  if ((code && SERVER_CODES.has(code)) || (status !== undefined && status >= 500)) {
    return { type: 'network', code, retryable: true, message };
  }
  if ((code && VALIDATION_CODES.has(code)) || status === 400) {
    return { type: 'validation', code, retryable: false, message };
  }

  return { type: 'unknown', code, retryable: readField(error, '$retryable') !== undefined, message };
}

/**
 * Deletion calls treat a missing resource as already cleaned up
 */
export function isNotFoundError(error: unknown): boolean {
  return classifyAwsError(error).type === 'resource_not_found';
}

export function isRetryableError(error: unknown): boolean {
  return classifyAwsError(error).retryable;
}

/**
 * Format error message from any thrown value
 */
export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name || 'Error';
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
