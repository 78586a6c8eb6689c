import type { Logger } from 'winston';
import { FetchPolicy } from '../sandbox/bridge/FetchPolicy.js';
import type { HostResolver } from '../sandbox/bridge/FetchPolicy.js';
import { HostBridge } from '../sandbox/bridge/HostBridge.js';
import type { GuestFetch } from '../sandbox/bridge/pinnedFetch.js';
import { CaptureSink } from '../sandbox/capture/CaptureSink.js';
import { createSandboxAdapter } from '../sandbox/createSandboxAdapter.js';
import type { AdapterResult, SandboxAdapter, SandboxOptions } from '../sandbox/types.js';
import type { SandboxConfig } from '../utils/SandboxConfig.js';
import { createSilentLogger } from '../utils/logger.js';
import { ExecutionTimeoutError, UnsupportedCodeKindError, toSandboxError } from './ErrorHandling.js';
import type {
  CodeKind,
  ExecutionOutcome,
  ExecutionReport,
  ExecutionRequest,
  FetchedResource,
} from './types.js';

export interface ExecutionOrchestratorDeps {
  logger?: Logger;
  fetchImpl?: GuestFetch;
  resolveHost?: HostResolver;
  /** Milliseconds since the epoch; drives `get_unixtime`. */
  clock?: () => number;
  createAdapter?: (kind: CodeKind, options: SandboxOptions) => SandboxAdapter;
}

/**
 * Drives one execution: fresh sink, bridge and adapter per request, a
 * wall-clock deadline the guest cannot block, and a uniform report.
 */
export class ExecutionOrchestrator {
  private readonly logger: Logger;
  private readonly createAdapter: (kind: CodeKind, options: SandboxOptions) => SandboxAdapter;

  constructor(
    private readonly config: SandboxConfig,
    private readonly deps: ExecutionOrchestratorDeps = {},
  ) {
    this.logger = deps.logger ?? createSilentLogger();
    this.createAdapter = deps.createAdapter ?? createSandboxAdapter;
  }

  public async execute(request: ExecutionRequest): Promise<ExecutionReport> {
    const { resource, kind } = request;
    if (kind === 'unknown') {
      throw new UnsupportedCodeKindError(`Unsupported code kind: ${kind}`, { kind });
    }

    const startedAt = performance.now();
    const sink = new CaptureSink({
      stdout: this.config.capture.maxStdoutBytes,
      stderr: this.config.capture.maxStderrBytes,
    });
    const bridge = new HostBridge(
      { sink, fetchPolicy: new FetchPolicy(this.config.fetch, this.deps.resolveHost) },
      { fetchImpl: this.deps.fetchImpl, clock: this.deps.clock, logger: this.logger },
    );
    const adapter = this.createAdapter(kind, { config: this.config, logger: this.logger });

    const result = await this.runWithDeadline(adapter, resource, bridge);
    const warnings = [...bridge.warnings, ...sink.warnings()];
    const captured = {
      stdout: sink.drain('stdout'),
      stderr: sink.drain('stderr'),
      warnings,
    };

    const outcome: ExecutionOutcome = result.ok
      ? { status: 'success', returnValue: result.returnValue, ...captured }
      : {
          status: 'failure',
          errorKind: result.error.kind,
          message: result.error.message,
          details: result.error.details,
          ...captured,
        };

    const executionTimeMs = Math.round(performance.now() - startedAt);
    this.logger.info('Execution finished', {
      kind,
      status: outcome.status,
      errorKind: outcome.status === 'failure' ? outcome.errorKind : undefined,
      executionTimeMs,
      resourceSizeBytes: resource.sizeBytes,
    });

    return {
      outcome,
      metadata: {
        executionTimeMs,
        codeKind: kind,
        completedAt: new Date(),
        resourceSizeBytes: resource.sizeBytes,
      },
    };
  }

  /**
   * Abort the adapter at the deadline; if it has not settled within the grace
   * period after that, report the timeout without it.
   */
  private async runWithDeadline(
    adapter: SandboxAdapter,
    resource: FetchedResource,
    bridge: HostBridge,
  ): Promise<AdapterResult> {
    const { timeoutMs, graceMs } = this.config.execution;
    const controller = new AbortController();
    let graceTimer: NodeJS.Timeout | undefined;

    const expired = new Promise<AdapterResult>((resolve) => {
      controller.signal.addEventListener(
        'abort',
        () => {
          graceTimer = setTimeout(() => {
            this.logger.warn('Adapter did not settle after abort', { kind: adapter.kind, graceMs });
            resolve({
              ok: false,
              error: new ExecutionTimeoutError(`Execution exceeded the ${timeoutMs}ms budget`, {
                timeoutMs,
              }),
            });
          }, graceMs);
        },
        { once: true },
      );
    });
    const deadline = setTimeout(() => controller.abort(), timeoutMs);

    const running = adapter.execute(resource, bridge, controller.signal).catch(
      (error: unknown): AdapterResult => ({ ok: false, error: toSandboxError(error) }),
    );

    try {
      return await Promise.race([running, expired]);
    } finally {
      clearTimeout(deadline);
      if (graceTimer) {
        clearTimeout(graceTimer);
      }
    }
  }
}
