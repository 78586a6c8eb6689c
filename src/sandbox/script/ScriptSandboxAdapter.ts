import ivm from 'isolated-vm';
import { z } from 'zod';
import {
  ExecutionTimeoutError,
  GuestRuntimeError,
  GuestSyntaxError,
  ResourceLimitExceededError,
  SandboxError,
  errorMessage,
  serializeError,
  toSandboxError,
} from '../../execution/ErrorHandling.js';
import type { ErrorDetails } from '../../execution/ErrorHandling.js';
import type { FetchedResource } from '../../execution/types.js';
import type { HostBridge } from '../bridge/HostBridge.js';
import type { AdapterResult, SandboxAdapter, SandboxOptions } from '../types.js';
import { transpileTypeScript } from './transpile.js';

const GUEST_FILENAME = 'guest.js';

/**
 * Installs the capability globals and hides the host references they close over.
 */
const BOOTSTRAP = `
  (() => {
    const capture = globalThis.__hostCapture;
    const log = globalThis.__hostLog;
    const time = globalThis.__hostTime;
    const hostFetch = globalThis.__hostFetch;
    delete globalThis.__hostCapture;
    delete globalThis.__hostLog;
    delete globalThis.__hostTime;
    delete globalThis.__hostFetch;

    const format = (value) => {
      if (typeof value === 'string') return value;
      if (value !== null && typeof value === 'object') {
        try {
          const json = JSON.stringify(value);
          if (json !== undefined) return json;
        } catch (error) {
          return String(value);
        }
      }
      return String(value);
    };

    const writer = (stream) => (...args) => {
      capture.applySync(undefined, [stream, args.map(format).join(' ') + '\\n']);
    };

    globalThis.console = {
      log: writer('stdout'),
      info: writer('stdout'),
      debug: writer('stdout'),
      warn: writer('stderr'),
      error: writer('stderr'),
    };

    globalThis.app_log = (level, message) => {
      log.applySync(undefined, [
        level === undefined ? '' : String(level),
        message === undefined ? '' : String(message),
      ]);
    };

    globalThis.get_unixtime = () => time.applySync(undefined, []);

    globalThis.fetch = (options) => {
      const request = typeof options === 'string' ? { url: options } : options;
      const payload = JSON.stringify(request === undefined ? null : request);
      const reply = JSON.parse(hostFetch.applySyncPromise(undefined, [payload]));
      if (reply.ok) return reply.value;
      const error = new Error(reply.error.message);
      error.name = reply.error.code;
      error.code = reply.error.code;
      error.details = reply.error.details;
      throw error;
    };
  })();
`;

/**
 * Evaluates the guest by indirect eval so the completion value of the last
 * statement comes back, then renders it to text inside the isolate. Errors
 * propagate as they are; any other thrown value is rendered and reported as
 * a completion, since only Error instances survive the isolate boundary.
 */
const RUN_GUEST = `
  const render = (value) => {
    if (value === undefined) return null;
    if (typeof value === 'string') return value;
    if (value !== null && typeof value === 'object') {
      try {
        const json = JSON.stringify(value);
        if (json !== undefined) return json;
      } catch (error) {
        return String(value);
      }
    }
    return String(value);
  };
  const settle = (value) => ({ ok: true, value: render(value) });
  const fail = (thrown) => {
    if (thrown instanceof Error) throw thrown;
    return { ok: false, thrown: thrown === undefined ? 'undefined' : render(thrown) };
  };
  return new Promise((resolve) => resolve((0, eval)($0))).then(settle, fail);
`;

const GuestCompletionSchema = z.discriminatedUnion('ok', [
  z.object({ ok: z.literal(true), value: z.string().nullable() }),
  z.object({ ok: z.literal(false), thrown: z.string() }),
]);

const TIMEOUT_PATTERN = /execution timed out/i;
const MEMORY_PATTERN = /memory limit/i;

type FetchEnvelope =
  | { ok: true; value: unknown }
  | { ok: false; error: ReturnType<typeof serializeError> };

/**
 * Runs JavaScript (or TypeScript, transpiled first) in a fresh isolated-vm
 * isolate. The isolate is disposed after every execution.
 */
export class ScriptSandboxAdapter implements SandboxAdapter {
  public readonly kind = 'script' as const;

  constructor(private readonly options: SandboxOptions) {}

  private get timeout(): number {
    return this.options.config.execution.timeoutMs;
  }

  private get memoryLimit(): number {
    return this.options.config.script.memoryLimitMb;
  }

  public async execute(
    resource: FetchedResource,
    bridge: HostBridge,
    signal: AbortSignal,
  ): Promise<AdapterResult> {
    let source: string;
    try {
      source = this.prepareSource(resource);
    } catch (error) {
      return { ok: false, error: toSandboxError(error, 'SyntaxError') };
    }

    if (signal.aborted) {
      return { ok: false, error: this.timeoutError() };
    }

    const isolate = new ivm.Isolate({ memoryLimit: this.memoryLimit });
    const onAbort = () => this.dispose(isolate);
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      const context = await isolate.createContext();
      await this.bind(context, bridge);
      await this.compile(isolate, source);

      const completion = GuestCompletionSchema.safeParse(
        await context.evalClosure(RUN_GUEST, [source], {
          timeout: this.timeout,
          arguments: { copy: true },
          result: { promise: true, copy: true },
        }),
      );
      if (!completion.success) {
        return { ok: false, error: new GuestRuntimeError('Script completed with an unreadable result') };
      }
      if (!completion.data.ok) {
        const { thrown } = completion.data;
        return { ok: false, error: new GuestRuntimeError(`Uncaught ${thrown}`, { thrown }) };
      }
      return { ok: true, returnValue: completion.data.value };
    } catch (error) {
      return { ok: false, error: this.toFailure(error, signal) };
    } finally {
      signal.removeEventListener('abort', onAbort);
      this.dispose(isolate);
    }
  }

  private prepareSource(resource: FetchedResource): string {
    let text: string;
    try {
      text = new TextDecoder('utf-8', { fatal: true }).decode(resource.bytes);
    } catch {
      throw new GuestSyntaxError('Script source is not valid UTF-8');
    }

    if (resource.dialect === 'typescript') {
      return transpileTypeScript(text);
    }
    return text;
  }

  private async bind(context: ivm.Context, bridge: HostBridge): Promise<void> {
    const jail = context.global;
    await jail.set('global', jail.derefInto());
    await jail.set('globalThis', jail.derefInto());

    await jail.set(
      '__hostCapture',
      new ivm.Reference((stream: string, text: string) => {
        bridge.capture(stream === 'stderr' ? 'stderr' : 'stdout', text);
      }),
    );
    await jail.set(
      '__hostLog',
      new ivm.Reference((level: string, message: string) => {
        bridge.log(level, message);
      }),
    );
    await jail.set(
      '__hostTime',
      new ivm.Reference(() => bridge.currentUnixTime()),
    );
    await jail.set(
      '__hostFetch',
      new ivm.Reference(async (payload: string): Promise<string> => {
        let envelope: FetchEnvelope;
        try {
          envelope = { ok: true, value: await bridge.fetch(JSON.parse(payload)) };
        } catch (error) {
          envelope = { ok: false, error: serializeError(toSandboxError(error, 'FetchTransportError')) };
        }
        return JSON.stringify(envelope);
      }),
    );

    await context.eval(BOOTSTRAP, { timeout: this.timeout });
  }

  private async compile(isolate: ivm.Isolate, source: string): Promise<void> {
    let script: ivm.Script;
    try {
      script = await isolate.compileScript(source, { filename: GUEST_FILENAME });
    } catch (error) {
      const location = findLocation(error, new RegExp(`${GUEST_FILENAME.replace('.', '\\.')}:(\\d+):(\\d+)`));
      throw new GuestSyntaxError(errorMessage(error), location ?? undefined);
    }
    script.release();
  }

  private toFailure(error: unknown, signal: AbortSignal): SandboxError {
    if (error instanceof SandboxError) {
      return error;
    }

    const message = errorMessage(error);
    if (signal.aborted || TIMEOUT_PATTERN.test(message)) {
      return this.timeoutError();
    }
    if (MEMORY_PATTERN.test(message)) {
      return new ResourceLimitExceededError(
        `Script exceeded the ${this.memoryLimit} MB isolate memory limit`,
        { memoryLimitMb: this.memoryLimit },
      );
    }

    const details: ErrorDetails = {};
    if (error instanceof Error) {
      details.name = error.name;
      if (error.stack) {
        details.stack = error.stack;
      }
    }
    const location = findLocation(error, /<anonymous>:(\d+):(\d+)/);
    if (location) {
      Object.assign(details, location);
    }
    return new GuestRuntimeError(message, details);
  }

  private timeoutError(): ExecutionTimeoutError {
    return new ExecutionTimeoutError(`Script exceeded the ${this.timeout}ms execution budget`, {
      timeoutMs: this.timeout,
    });
  }

  private dispose(isolate: ivm.Isolate): void {
    if (isolate.isDisposed) {
      return;
    }
    try {
      isolate.dispose();
    } catch (error) {
      this.options.logger?.warn('Failed to dispose script isolate', { error: errorMessage(error) });
    }
  }
}

/**
 * Best-effort line/column from an engine error, taken from the first eval
 * frame when there is one.
 */
function findLocation(error: unknown, pattern: RegExp): { line: number; column: number } | null {
  if (!(error instanceof Error)) {
    return null;
  }
  const lines = `${error.message}\n${error.stack ?? ''}`.split('\n');
  const evalFrame = lines.find((line) => line.includes('eval at') && pattern.test(line));
  const candidate = evalFrame ?? lines.find((line) => pattern.test(line));
  if (!candidate) {
    return null;
  }

  const matches = [...candidate.matchAll(new RegExp(pattern.source, 'g'))];
  const last = matches[matches.length - 1];
  if (!last) {
    return null;
  }
  return { line: Number(last[1]), column: Number(last[2]) };
}
