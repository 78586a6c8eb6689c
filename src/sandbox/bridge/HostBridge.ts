import type { Logger } from 'winston';
import { z } from 'zod';
import {
  FetchPolicyViolationError,
  FetchTransportError,
  SandboxError,
  errorMessage,
} from '../../execution/ErrorHandling.js';
import type { CaptureSink, OutputStream } from '../capture/CaptureSink.js';
import type { FetchPolicy } from './FetchPolicy.js';
import { fetchPinned } from './pinnedFetch.js';
import type { GuestFetch } from './pinnedFetch.js';

export const FetchRequestSchema = z.object({
  url: z.string().min(1),
  method: z.string().min(1).default('GET'),
  headers: z.record(z.string()).default({}),
  body: z.string().optional(),
});

export type FetchRequest = z.infer<typeof FetchRequestSchema>;

export interface FetchReply {
  status: number;
  headers: Record<string, string>;
  body: string;
  truncated: boolean;
}

/**
 * Everything a capability call may touch during one execution.
 */
export interface HostCallContext {
  readonly sink: CaptureSink;
  readonly fetchPolicy: FetchPolicy;
}

export interface HostBridgeDeps {
  fetchImpl?: GuestFetch;
  /** Milliseconds since the epoch. */
  clock?: () => number;
  logger?: Logger;
}

const STDERR_LEVELS = new Set(['WARN', 'WARNING', 'ERROR', 'FATAL', 'CRITICAL']);

/**
 * Host capabilities shared by both sandbox kinds. Adapters only marshal
 * arguments; policy and capture behaviour live here.
 */
export class HostBridge {
  private readonly fetchImpl: GuestFetch;
  private readonly clock: () => number;
  private readonly logger?: Logger;
  private readonly notices: string[] = [];

  constructor(
    private readonly context: HostCallContext,
    deps: HostBridgeDeps = {},
  ) {
    this.fetchImpl = deps.fetchImpl ?? fetchPinned;
    this.clock = deps.clock ?? Date.now;
    this.logger = deps.logger;
  }

  get warnings(): string[] {
    return [...this.notices];
  }

  /**
   * Append `[LEVEL] message` to the stream the level belongs to.
   */
  public log(level: string, message: string): void {
    const normalized = level.trim().toUpperCase() || 'INFO';
    const stream: OutputStream = STDERR_LEVELS.has(normalized) ? 'stderr' : 'stdout';
    this.context.sink.write(stream, `[${normalized}] ${message}\n`);
  }

  public capture(stream: OutputStream, data: Uint8Array | string): void {
    this.context.sink.write(stream, data);
  }

  public currentUnixTime(): number {
    return Math.floor(this.clock() / 1000);
  }

  public async fetch(input: unknown): Promise<FetchReply> {
    const parsed = FetchRequestSchema.safeParse(input);
    if (!parsed.success) {
      throw new FetchPolicyViolationError('Malformed fetch request', {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`),
      });
    }
    const request = parsed.data;
    const policy = this.context.fetchPolicy;

    const url = policy.checkUrl(request.url);
    policy.checkRequestBody(request.body);

    // one deadline covers resolution, connection and headers
    const signal = AbortSignal.timeout(policy.timeoutMs);
    let response: Response;
    try {
      const address = await policy.checkDestination(url, signal);
      this.logger?.debug('Guest fetch', { method: request.method, url: url.toString(), address });
      response = await this.fetchImpl(url, {
        method: request.method.toUpperCase(),
        headers: request.headers,
        body: request.body,
        redirect: 'manual',
        signal,
        address,
      });
    } catch (error) {
      throw this.transportError(error, url);
    }

    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key] = value;
    });

    const { bytes, truncated } = await this.readBody(response, policy.maxResponseBodyBytes, url);
    if (truncated) {
      this.notices.push(
        `fetch response from ${url.host} truncated at ${policy.maxResponseBodyBytes} bytes`,
      );
    }

    return {
      status: response.status,
      headers,
      body: bytes.toString('utf-8'),
      truncated,
    };
  }

  private async readBody(
    response: Response,
    limit: number,
    url: URL,
  ): Promise<{ bytes: Buffer; truncated: boolean }> {
    if (!response.body) {
      return { bytes: Buffer.alloc(0), truncated: false };
    }

    const reader = response.body.getReader();
    const chunks: Uint8Array[] = [];
    let size = 0;
    let truncated = false;

    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) {
          break;
        }
        const remaining = limit - size;
        if (value.length > remaining) {
          chunks.push(value.subarray(0, remaining));
          size += remaining;
          truncated = true;
          await reader.cancel();
          break;
        }
        chunks.push(value);
        size += value.length;
      }
    } catch (error) {
      throw this.transportError(error, url);
    }

    return { bytes: Buffer.concat(chunks, size), truncated };
  }

  private transportError(error: unknown, url: URL): SandboxError {
    if (error instanceof SandboxError) {
      return error;
    }
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      return new FetchTransportError(
        `Fetch to ${url.host} timed out after ${this.context.fetchPolicy.timeoutMs}ms`,
        { url: url.toString(), timeoutMs: this.context.fetchPolicy.timeoutMs },
      );
    }
    return new FetchTransportError(`Fetch to ${url.host} failed: ${errorMessage(error)}`, {
      url: url.toString(),
    });
  }
}
