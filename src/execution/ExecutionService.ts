import type { Logger } from 'winston';
import { detectCodeKind, detectScriptDialect, hasWasmMagic } from '../resource/detectCodeKind.js';
import { ResourceDownloader } from '../resource/ResourceDownloader.js';
import type { SandboxConfig } from '../utils/SandboxConfig.js';
import { createSilentLogger } from '../utils/logger.js';
import {
  InvalidRequestError,
  SandboxError,
  UnsupportedCodeKindError,
  serializeError,
  toSandboxError,
} from './ErrorHandling.js';
import { ExecutionOrchestrator } from './ExecutionOrchestrator.js';
import type { ExecutionOrchestratorDeps } from './ExecutionOrchestrator.js';
import type {
  CodeKind,
  CodeType,
  ExecuteHttpResult,
  ExecutionReport,
  FetchedResource,
  ScriptDialect,
} from './types.js';

export type SourceLanguage = 'javascript' | 'typescript' | 'webassembly';
export type SourceEncoding = 'utf8' | 'base64';

export interface ExecutionServiceDeps extends ExecutionOrchestratorDeps {
  downloader?: ResourceDownloader;
  orchestrator?: ExecutionOrchestrator;
}

const STATUS_OK = 200;
const STATUS_EXECUTION_FAILED = 500;

function codeTypeOf(kind: CodeKind): CodeType {
  return kind === 'script' ? 'javascript' : 'webassembly';
}

/**
 * Front-door glue: turns a URL or inline source into an execution and maps
 * the report onto the response body and status code.
 */
export class ExecutionService {
  private readonly logger: Logger;
  private readonly downloader: ResourceDownloader;
  private readonly orchestrator: ExecutionOrchestrator;

  constructor(config: SandboxConfig, deps: ExecutionServiceDeps = {}) {
    this.logger = deps.logger ?? createSilentLogger();
    this.downloader =
      deps.downloader ??
      new ResourceDownloader(config.download, { fetchImpl: deps.fetchImpl, logger: this.logger });
    this.orchestrator = deps.orchestrator ?? new ExecutionOrchestrator(config, deps);
  }

  /**
   * Download the resource at `url`, detect its kind and execute it.
   */
  public async executeUrl(url: string): Promise<ExecuteHttpResult> {
    const startedAt = performance.now();
    let resourceSize = 0;
    try {
      const bytes = await this.downloader.download(url);
      resourceSize = bytes.length;
      const detectedKind = detectCodeKind(url, bytes);
      this.logger.info('Resource downloaded', { url, sizeBytes: bytes.length, detectedKind });

      const resource: FetchedResource = {
        bytes,
        sizeBytes: bytes.length,
        detectedKind,
        dialect: detectedKind === 'script' ? detectScriptDialect(url) : undefined,
      };
      return await this.run(resource);
    } catch (error) {
      return this.requestFailure(error, startedAt, resourceSize);
    }
  }

  /**
   * Execute inline source. `webassembly` sources are expected base64-encoded.
   */
  public async executeSource(
    source: string,
    language: SourceLanguage,
    encoding: SourceEncoding = language === 'webassembly' ? 'base64' : 'utf8',
  ): Promise<ExecuteHttpResult> {
    const startedAt = performance.now();
    let resourceSize = 0;
    try {
      const bytes = this.decodeSource(source, encoding);
      resourceSize = bytes.length;
      let kind: CodeKind;
      let dialect: ScriptDialect | undefined;
      if (language === 'webassembly') {
        if (!hasWasmMagic(bytes)) {
          throw new UnsupportedCodeKindError('Source is not a WebAssembly binary', { language });
        }
        kind = 'module';
      } else {
        kind = 'script';
        dialect = language;
      }

      return await this.run({ bytes, sizeBytes: bytes.length, detectedKind: kind, dialect });
    } catch (error) {
      return this.requestFailure(error, startedAt, resourceSize);
    }
  }

  private decodeSource(source: string, encoding: SourceEncoding): Uint8Array {
    if (encoding === 'utf8') {
      return new Uint8Array(Buffer.from(source, 'utf-8'));
    }
    const compact = source.replace(/\s+/g, '');
    if (!/^[A-Za-z0-9+/]*={0,2}$/.test(compact) || compact.length % 4 !== 0) {
      throw new InvalidRequestError('Source is not valid base64');
    }
    return new Uint8Array(Buffer.from(compact, 'base64'));
  }

  private async run(resource: FetchedResource): Promise<ExecuteHttpResult> {
    const report = await this.orchestrator.execute({ resource, kind: resource.detectedKind });
    return this.toResponse(report);
  }

  private toResponse({ outcome, metadata }: ExecutionReport): ExecuteHttpResult {
    const base = {
      stdout: outcome.stdout,
      stderr: outcome.stderr,
      metadata: {
        executionTimeMs: metadata.executionTimeMs,
        codeType: codeTypeOf(metadata.codeKind),
        timestamp: metadata.completedAt.toISOString(),
        resourceSize: metadata.resourceSizeBytes,
        warnings: outcome.warnings,
      },
    };

    if (outcome.status === 'success') {
      return {
        statusCode: STATUS_OK,
        body: { status: 'success', output: outcome.returnValue, error: null, ...base },
      };
    }
    return {
      statusCode: STATUS_EXECUTION_FAILED,
      body: {
        status: 'error',
        output: null,
        error: { code: outcome.errorKind, message: outcome.message, details: outcome.details },
        ...base,
      },
    };
  }

  /**
   * Request-level failure (download, bad input, unresolved kind): no execution
   * happened, so there is no output and the code type is unknown.
   */
  private requestFailure(error: unknown, startedAt: number, resourceSize: number): ExecuteHttpResult {
    const failure: SandboxError = toSandboxError(error);
    if (failure.statusCode >= STATUS_EXECUTION_FAILED) {
      this.logger.error('Execution request failed', { code: failure.code, message: failure.message });
    } else {
      this.logger.warn('Execution request rejected', { code: failure.code, message: failure.message });
    }

    return {
      statusCode: failure.statusCode,
      body: {
        status: 'error',
        output: null,
        stdout: '',
        stderr: '',
        error: serializeError(failure),
        metadata: {
          executionTimeMs: Math.round(performance.now() - startedAt),
          codeType: 'unknown',
          timestamp: new Date().toISOString(),
          resourceSize,
          warnings: [],
        },
      },
    };
  }
}
