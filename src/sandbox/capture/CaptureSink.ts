export type OutputStream = 'stdout' | 'stderr';

export interface CaptureLimits {
  stdout: number;
  stderr: number;
}

interface StreamBuffer {
  readonly limit: number;
  chunks: Uint8Array[];
  size: number;
  truncated: boolean;
}

const encoder = new TextEncoder();

/**
 * Request-scoped stdout/stderr capture with a hard byte cap per stream.
 *
 * Single-writer: all writes arrive on the orchestrator's event-loop thread
 * (isolate callbacks run there, worker output is delivered there as messages),
 * so the buffers are never touched concurrently and carry no lock.
 */
export class CaptureSink {
  private readonly streams: Record<OutputStream, StreamBuffer>;

  constructor(limits: CaptureLimits) {
    this.streams = {
      stdout: { limit: limits.stdout, chunks: [], size: 0, truncated: false },
      stderr: { limit: limits.stderr, chunks: [], size: 0, truncated: false },
    };
  }

  /**
   * Append bytes up to the remaining capacity. Returns the number of bytes kept.
   */
  public write(stream: OutputStream, data: Uint8Array | string): number {
    const buffer = this.streams[stream];
    const bytes = typeof data === 'string' ? encoder.encode(data) : data;
    if (bytes.length === 0) {
      return 0;
    }

    const remaining = buffer.limit - buffer.size;
    if (remaining <= 0) {
      buffer.truncated = true;
      return 0;
    }

    const accepted = bytes.length > remaining ? bytes.slice(0, remaining) : bytes.slice();
    if (accepted.length < bytes.length) {
      buffer.truncated = true;
    }
    buffer.chunks.push(accepted);
    buffer.size += accepted.length;
    return accepted.length;
  }

  /**
   * Accumulated text of a stream. Invalid UTF-8 becomes U+FFFD.
   */
  public drain(stream: OutputStream): string {
    const buffer = this.streams[stream];
    return Buffer.concat(buffer.chunks, buffer.size).toString('utf-8');
  }

  public size(stream: OutputStream): number {
    return this.streams[stream].size;
  }

  public isTruncated(stream: OutputStream): boolean {
    return this.streams[stream].truncated;
  }

  /**
   * Non-fatal notices about dropped output.
   */
  public warnings(): string[] {
    return (['stdout', 'stderr'] as const)
      .filter((stream) => this.streams[stream].truncated)
      .map((stream) => `${stream} truncated at ${this.streams[stream].limit} bytes`);
  }
}
