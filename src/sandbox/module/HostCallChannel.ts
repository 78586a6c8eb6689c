import { receiveMessageOnPort } from 'node:worker_threads';
import type { MessagePort } from 'node:worker_threads';
import { TrapError } from '../../execution/ErrorHandling.js';
import type { OutputStream } from '../capture/CaptureSink.js';
import type { GuestHost } from './moduleImports.js';
import { HostReplySchema } from './protocol.js';
import type { HostReply, WorkerMessage } from './protocol.js';

const WAIT_SLICE_MS = 50;

/**
 * Worker-side GuestHost. Output and log calls are fire-and-forget messages;
 * calls that need an answer block the worker on the shared flag until the
 * host has posted a reply, then take it off the port synchronously.
 */
export class HostCallChannel implements GuestHost {
  private readonly flag: Int32Array;

  constructor(
    private readonly port: MessagePort,
    signal: SharedArrayBuffer,
  ) {
    this.flag = new Int32Array(signal);
  }

  public log(level: string, message: string): void {
    this.post({ type: 'log', level, message });
  }

  public capture(stream: OutputStream, data: Uint8Array): void {
    this.post({ type: 'capture', stream, data });
  }

  public currentUnixTime(): number {
    const reply = this.call({ type: 'time' });
    if (reply.op !== 'time') {
      throw new TrapError(`Unexpected host reply for time: ${reply.op}`);
    }
    return reply.value;
  }

  public fetch(request: string): string {
    const reply = this.call({ type: 'fetch', request });
    if (reply.op !== 'fetch') {
      throw new TrapError(`Unexpected host reply for fetch: ${reply.op}`);
    }
    return reply.value;
  }

  public post(message: WorkerMessage): void {
    this.port.postMessage(message);
  }

  private call(message: WorkerMessage): HostReply {
    Atomics.store(this.flag, 0, 0);
    this.post(message);

    for (;;) {
      // The flag only shortens the wait; the port is the source of truth
      Atomics.wait(this.flag, 0, 0, WAIT_SLICE_MS);
      const received = receiveMessageOnPort(this.port);
      if (received) {
        const parsed = HostReplySchema.safeParse(received.message);
        if (!parsed.success) {
          throw new TrapError('Malformed host reply');
        }
        return parsed.data;
      }
    }
  }
}
