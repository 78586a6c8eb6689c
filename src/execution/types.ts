import type { ErrorDetails, ErrorKind, SerializedError } from './ErrorHandling.js';

export type CodeKind = 'script' | 'module';

export type DetectedKind = CodeKind | 'unknown';

export type ScriptDialect = 'javascript' | 'typescript';

/**
 * Downloaded bytes for a single execution. Never shared between requests.
 */
export interface FetchedResource {
  readonly bytes: Uint8Array;
  readonly sizeBytes: number;
  readonly detectedKind: DetectedKind;
  /** Only meaningful for scripts; defaults to JavaScript. */
  readonly dialect?: ScriptDialect;
}

/**
 * `kind` must be resolved to script or module before dispatch; `unknown` is
 * rejected as UnsupportedCodeKind.
 */
export interface ExecutionRequest {
  resource: FetchedResource;
  kind: DetectedKind;
}

export interface CapturedStreams {
  stdout: string;
  stderr: string;
  warnings: string[];
}

export interface SuccessOutcome extends CapturedStreams {
  status: 'success';
  returnValue: string | null;
}

export interface FailureOutcome extends CapturedStreams {
  status: 'failure';
  errorKind: ErrorKind;
  message: string;
  details: ErrorDetails | null;
}

export type ExecutionOutcome = SuccessOutcome | FailureOutcome;

export interface ExecutionMetadata {
  executionTimeMs: number;
  codeKind: CodeKind;
  completedAt: Date;
  resourceSizeBytes: number;
}

export interface ExecutionReport {
  outcome: ExecutionOutcome;
  metadata: ExecutionMetadata;
}

export type CodeType = 'javascript' | 'webassembly' | 'unknown';

/**
 * Response body returned by the front door
 */
export interface ExecuteResponse {
  status: 'success' | 'error';
  output: string | null;
  stdout: string;
  stderr: string;
  error: SerializedError | null;
  metadata: {
    executionTimeMs: number;
    codeType: CodeType;
    timestamp: string;
    resourceSize: number;
    warnings: string[];
  };
}

export interface ExecuteHttpResult {
  statusCode: number;
  body: ExecuteResponse;
}
