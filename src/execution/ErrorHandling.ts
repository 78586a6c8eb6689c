/**
 * Sandbox Error Handling Module
 *
 * Typed errors for every failure an execution can report, plus conversion
 * helpers used at the adapter and front-door boundaries.
 */

export type ErrorKind =
  | 'DownloadError'
  | 'UnsupportedCodeKind'
  | 'InvalidRequest'
  | 'SyntaxError'
  | 'RuntimeError'
  | 'InstantiationError'
  | 'Trap'
  | 'InvalidMemoryAccess'
  | 'Timeout'
  | 'FetchPolicyViolation'
  | 'FetchTransportError'
  | 'ResourceLimitExceeded';

export type ErrorDetails = Record<string, unknown>;

/**
 * Base error class for all sandbox-related errors
 */
export class SandboxError extends Error {
  public readonly kind: ErrorKind;
  public readonly statusCode: number;
  public readonly details: ErrorDetails | null;
  public readonly timestamp: Date;

  constructor(message: string, kind: ErrorKind, statusCode: number = 500, details?: ErrorDetails) {
    super(message);
    this.name = 'SandboxError';
    this.kind = kind;
    this.statusCode = statusCode;
    this.details = details ?? null;
    this.timestamp = new Date();

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, SandboxError.prototype);
  }

  /** Wire code reported in `error.code`. */
  get code(): ErrorKind {
    return this.kind;
  }
}

/**
 * Error thrown when the remote resource cannot be downloaded
 */
export class DownloadError extends SandboxError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'DownloadError', 502, details);
    this.name = 'DownloadError';
    Object.setPrototypeOf(this, DownloadError.prototype);
  }
}

/**
 * Error thrown when the code kind cannot be resolved to script or module
 */
export class UnsupportedCodeKindError extends SandboxError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'UnsupportedCodeKind', 400, details);
    this.name = 'UnsupportedCodeKindError';
    Object.setPrototypeOf(this, UnsupportedCodeKindError.prototype);
  }
}

/**
 * Error thrown when a front-door request is malformed
 */
export class InvalidRequestError extends SandboxError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'InvalidRequest', 400, details);
    this.name = 'InvalidRequestError';
    Object.setPrototypeOf(this, InvalidRequestError.prototype);
  }
}

export class GuestSyntaxError extends SandboxError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'SyntaxError', 500, details);
    this.name = 'GuestSyntaxError';
    Object.setPrototypeOf(this, GuestSyntaxError.prototype);
  }
}

export class GuestRuntimeError extends SandboxError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'RuntimeError', 500, details);
    this.name = 'GuestRuntimeError';
    Object.setPrototypeOf(this, GuestRuntimeError.prototype);
  }
}

/**
 * Error thrown when a module cannot be compiled or linked
 */
export class InstantiationError extends SandboxError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'InstantiationError', 500, details);
    this.name = 'InstantiationError';
    Object.setPrototypeOf(this, InstantiationError.prototype);
  }
}

/**
 * Error raised for an unrecoverable fault inside a running module
 */
export class TrapError extends SandboxError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'Trap', 500, details);
    this.name = 'TrapError';
    Object.setPrototypeOf(this, TrapError.prototype);
  }
}

/**
 * Error raised when a host import receives a pointer/length pair outside guest memory
 */
export class InvalidMemoryAccessError extends SandboxError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'InvalidMemoryAccess', 500, details);
    this.name = 'InvalidMemoryAccessError';
    Object.setPrototypeOf(this, InvalidMemoryAccessError.prototype);
  }
}

export class ExecutionTimeoutError extends SandboxError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'Timeout', 500, details);
    this.name = 'ExecutionTimeoutError';
    Object.setPrototypeOf(this, ExecutionTimeoutError.prototype);
  }
}

/**
 * Error raised when guest fetch breaks the configured egress policy
 */
export class FetchPolicyViolationError extends SandboxError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'FetchPolicyViolation', 500, details);
    this.name = 'FetchPolicyViolationError';
    Object.setPrototypeOf(this, FetchPolicyViolationError.prototype);
  }
}

/**
 * Error raised for network-level failures of guest fetch, timeouts included
 */
export class FetchTransportError extends SandboxError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'FetchTransportError', 500, details);
    this.name = 'FetchTransportError';
    Object.setPrototypeOf(this, FetchTransportError.prototype);
  }
}

export class ResourceLimitExceededError extends SandboxError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'ResourceLimitExceeded', 500, details);
    this.name = 'ResourceLimitExceededError';
    Object.setPrototypeOf(this, ResourceLimitExceededError.prototype);
  }
}

const ERROR_CLASSES: Record<ErrorKind, new (message: string, details?: ErrorDetails) => SandboxError> =
  {
    DownloadError,
    UnsupportedCodeKind: UnsupportedCodeKindError,
    InvalidRequest: InvalidRequestError,
    SyntaxError: GuestSyntaxError,
    RuntimeError: GuestRuntimeError,
    InstantiationError,
    Trap: TrapError,
    InvalidMemoryAccess: InvalidMemoryAccessError,
    Timeout: ExecutionTimeoutError,
    FetchPolicyViolation: FetchPolicyViolationError,
    FetchTransportError,
    ResourceLimitExceeded: ResourceLimitExceededError,
  };

export function isErrorKind(value: unknown): value is ErrorKind {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(ERROR_CLASSES, value);
}

/**
 * Rebuild a typed error from its wire form (used for errors crossing a worker boundary)
 */
export function createSandboxError(
  kind: ErrorKind,
  message: string,
  details?: ErrorDetails | null,
): SandboxError {
  const ErrorClass = ERROR_CLASSES[kind];
  return new ErrorClass(message, details ?? undefined);
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Convert any thrown value to a SandboxError, defaulting to the given kind
 */
export function toSandboxError(error: unknown, fallback: ErrorKind = 'RuntimeError'): SandboxError {
  if (error instanceof SandboxError) {
    return error;
  }

  const details: ErrorDetails = {};
  if (error instanceof Error) {
    details.name = error.name;
    if (error.stack) {
      details.stack = error.stack;
    }
  }
  return createSandboxError(fallback, errorMessage(error), details);
}

/**
 * Wire form of an error: `{ code, message, details }`
 */
export interface SerializedError {
  code: ErrorKind;
  message: string;
  details: ErrorDetails | null;
}

export function serializeError(error: SandboxError): SerializedError {
  return {
    code: error.kind,
    message: error.message,
    details: error.details,
  };
}
