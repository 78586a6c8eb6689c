import path from 'path';
import { MessageChannel, Worker, receiveMessageOnPort } from 'node:worker_threads';
import {
  ExecutionTimeoutError,
  FetchPolicyViolationError,
  InstantiationError,
  ResourceLimitExceededError,
  SandboxError,
  TrapError,
  errorMessage,
  toSandboxError,
} from '../../execution/ErrorHandling.js';
import type { FetchedResource } from '../../execution/types.js';
import type { FetchReply, HostBridge } from '../bridge/HostBridge.js';
import type { AdapterResult, SandboxAdapter, SandboxOptions } from '../types.js';
import { validateLinkage } from './ModuleRunner.js';
import { limitModuleMemory } from './memoryLimits.js';
import { WorkerMessageSchema, fromWireResult } from './protocol.js';
import type { HostReply, ModuleWorkerData } from './protocol.js';

/**
 * JSON reply a module receives from `env.fetch`.
 */
export interface GuestFetchReply extends FetchReply {
  error: { code: string; message: string } | null;
}

/**
 * Worker entry beside this file. When running from TypeScript sources the
 * worker needs the tsx loader to import it.
 */
function defaultWorkerFile(): string {
  return path.join(__dirname, `moduleWorker${path.extname(__filename)}`);
}

function failedFetch(error: SandboxError): GuestFetchReply {
  return {
    status: 0,
    headers: {},
    body: '',
    truncated: false,
    error: { code: error.code, message: error.message },
  };
}

/**
 * Runs WebAssembly modules on a dedicated worker thread per execution.
 * Memory limits are written into the module, then compilation and linkage
 * are checked here first so a module that cannot be linked never costs a
 * thread.
 */
export class ModuleSandboxAdapter implements SandboxAdapter {
  public readonly kind = 'module' as const;

  constructor(
    private readonly options: SandboxOptions,
    private readonly workerFile: string = defaultWorkerFile(),
  ) {}

  private get logger() {
    return this.options.logger;
  }

  public async execute(
    resource: FetchedResource,
    bridge: HostBridge,
    signal: AbortSignal,
  ): Promise<AdapterResult> {
    let module: WebAssembly.Module;
    try {
      const capped = limitModuleMemory(resource.bytes, this.options.config.module.maxMemoryBytes);
      module = await WebAssembly.compile(new Uint8Array(capped));
      validateLinkage(module);
    } catch (error) {
      if (error instanceof SandboxError) {
        return { ok: false, error };
      }
      return {
        ok: false,
        error: new InstantiationError(`Invalid WebAssembly module: ${errorMessage(error)}`),
      };
    }

    if (signal.aborted) {
      return { ok: false, error: this.timeoutError() };
    }

    return this.runInWorker(module, bridge, signal);
  }

  private runInWorker(
    module: WebAssembly.Module,
    bridge: HostBridge,
    signal: AbortSignal,
  ): Promise<AdapterResult> {
    const { entryPoint, maxMemoryBytes, workerHeapMb } = this.options.config.module;
    const replyFlag = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT);
    const flag = new Int32Array(replyFlag);
    const { port1, port2 } = new MessageChannel();

    const workerData: ModuleWorkerData = {
      module,
      entryPoint,
      maxMemoryBytes,
      signal: replyFlag,
      port: port2,
    };
    const worker = new Worker(this.workerFile, {
      workerData,
      transferList: [port2],
      resourceLimits: { maxOldGenerationSizeMb: workerHeapMb },
      execArgv: this.workerFile.endsWith('.ts') ? ['--require', 'tsx/cjs'] : [],
    });

    return new Promise<AdapterResult>((resolve) => {
      let settled = false;

      const finish = (result: AdapterResult): void => {
        if (settled) {
          return;
        }
        settled = true;
        signal.removeEventListener('abort', onAbort);
        port1.close();
        worker.terminate().catch((error: unknown) => {
          this.logger?.warn('Failed to terminate module worker', { error: errorMessage(error) });
        });
        resolve(result);
      };

      const reply = (message: HostReply): void => {
        if (settled) {
          return;
        }
        port1.postMessage(message);
        Atomics.store(flag, 0, 1);
        Atomics.notify(flag, 0);
      };

      const handle = (raw: unknown): void => {
        if (settled) {
          return;
        }
        const parsed = WorkerMessageSchema.safeParse(raw);
        if (!parsed.success) {
          finish({ ok: false, error: new TrapError('Malformed message from module worker') });
          return;
        }

        const message = parsed.data;
        switch (message.type) {
          case 'capture':
            bridge.capture(message.stream, message.data);
            break;
          case 'log':
            bridge.log(message.level, message.message);
            break;
          case 'time':
            reply({ op: 'time', value: bridge.currentUnixTime() });
            break;
          case 'fetch':
            this.fetchForGuest(bridge, message.request).then(
              (value) => reply({ op: 'fetch', value }),
              (error: unknown) =>
                reply({ op: 'fetch', value: JSON.stringify(failedFetch(toSandboxError(error))) }),
            );
            break;
          case 'done':
            finish(fromWireResult(message.result));
            break;
        }
      };

      const onAbort = (): void => finish({ ok: false, error: this.timeoutError() });

      signal.addEventListener('abort', onAbort, { once: true });
      port1.on('message', handle);

      worker.on('error', (error: Error) => {
        const code = 'code' in error ? error.code : undefined;
        if (code === 'ERR_WORKER_OUT_OF_MEMORY') {
          finish({
            ok: false,
            error: new ResourceLimitExceededError(
              `Module worker exceeded its ${workerHeapMb} MB heap limit`,
              { workerHeapMb },
            ),
          });
          return;
        }
        finish({
          ok: false,
          error: new TrapError(`Module worker crashed: ${error.message}`, { name: error.name }),
        });
      });

      worker.on('exit', (exitCode: number) => {
        // Output posted just before exit may still be queued on the port
        for (let queued = receiveMessageOnPort(port1); queued && !settled; queued = receiveMessageOnPort(port1)) {
          handle(queued.message);
        }
        finish({
          ok: false,
          error: new TrapError(`Module worker exited before reporting a result (code ${exitCode})`, {
            exitCode,
          }),
        });
      });
    });
  }

  /**
   * Serve one guest fetch. Always resolves to the JSON reply text; failures
   * are reported in its `error` field so the guest can handle them.
   */
  private async fetchForGuest(bridge: HostBridge, request: string): Promise<string> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(request);
    } catch {
      return JSON.stringify(
        failedFetch(new FetchPolicyViolationError('Fetch options are not valid JSON')),
      );
    }

    try {
      const response = await bridge.fetch(parsed);
      const body: GuestFetchReply = { ...response, error: null };
      return JSON.stringify(body);
    } catch (error) {
      return JSON.stringify(failedFetch(toSandboxError(error, 'FetchTransportError')));
    }
  }

  private timeoutError(): ExecutionTimeoutError {
    const { timeoutMs } = this.options.config.execution;
    return new ExecutionTimeoutError(`Module exceeded the ${timeoutMs}ms execution budget`, {
      timeoutMs,
    });
  }
}
