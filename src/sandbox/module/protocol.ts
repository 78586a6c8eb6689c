import type { MessagePort } from 'node:worker_threads';
import { z } from 'zod';
import { createSandboxError, isErrorKind, serializeError } from '../../execution/ErrorHandling.js';
import type { ErrorKind } from '../../execution/ErrorHandling.js';
import type { AdapterResult } from '../types.js';

/**
 * Messages exchanged between the module worker and the adapter over the
 * worker's MessagePort. Values are structured-cloned, so byte arrays may
 * arrive from another realm; they are recognised by tag, not by instanceof.
 */

const bytes = z.custom<Uint8Array>(
  (value) => Object.prototype.toString.call(value) === '[object Uint8Array]',
  'Expected Uint8Array',
);

const SerializedErrorSchema = z.object({
  code: z.custom<ErrorKind>(isErrorKind, 'Unknown error kind'),
  message: z.string(),
  details: z.record(z.unknown()).nullable(),
});

export const WireResultSchema = z.discriminatedUnion('ok', [
  z.object({ ok: z.literal(true), returnValue: z.string().nullable() }),
  z.object({ ok: z.literal(false), error: SerializedErrorSchema }),
]);

export type WireResult = z.infer<typeof WireResultSchema>;

export const WorkerMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('capture'), stream: z.enum(['stdout', 'stderr']), data: bytes }),
  z.object({ type: z.literal('log'), level: z.string(), message: z.string() }),
  z.object({ type: z.literal('time') }),
  z.object({ type: z.literal('fetch'), request: z.string() }),
  z.object({ type: z.literal('done'), result: WireResultSchema }),
]);

export type WorkerMessage = z.infer<typeof WorkerMessageSchema>;

export const HostReplySchema = z.discriminatedUnion('op', [
  z.object({ op: z.literal('time'), value: z.number() }),
  z.object({ op: z.literal('fetch'), value: z.string() }),
]);

export type HostReply = z.infer<typeof HostReplySchema>;

export interface ModuleWorkerData {
  module: WebAssembly.Module;
  entryPoint: string;
  maxMemoryBytes: number;
  /** One Int32 slot, set to 1 by the host once a reply has been posted. */
  signal: SharedArrayBuffer;
  port: MessagePort;
}

export function toWireResult(result: AdapterResult): WireResult {
  if (result.ok) {
    return { ok: true, returnValue: result.returnValue };
  }
  return { ok: false, error: serializeError(result.error) };
}

export function fromWireResult(result: WireResult): AdapterResult {
  if (result.ok) {
    return { ok: true, returnValue: result.returnValue };
  }
  return {
    ok: false,
    error: createSandboxError(result.error.code, result.error.message, result.error.details),
  };
}
