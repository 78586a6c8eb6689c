import { MessagePort, workerData } from 'node:worker_threads';
import { z } from 'zod';
import { HostCallChannel } from './HostCallChannel.js';
import { runModule } from './ModuleRunner.js';
import { toWireResult } from './protocol.js';
import type { ModuleWorkerData } from './protocol.js';

/**
 * Worker entry: runs one module and reports a single `done` message.
 */
const WorkerDataSchema: z.ZodType<ModuleWorkerData> = z.object({
  module: z.instanceof(WebAssembly.Module),
  entryPoint: z.string().min(1),
  maxMemoryBytes: z.number().int().positive(),
  signal: z.instanceof(SharedArrayBuffer),
  port: z.instanceof(MessagePort),
});

const data = WorkerDataSchema.parse(workerData);
const channel = new HostCallChannel(data.port, data.signal);
const result = runModule(data.module, channel, {
  entryPoint: data.entryPoint,
  maxMemoryBytes: data.maxMemoryBytes,
});
channel.post({ type: 'done', result: toWireResult(result) });
