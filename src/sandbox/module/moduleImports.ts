import type { OutputStream } from '../capture/CaptureSink.js';
import type { GuestMemory } from './GuestMemory.js';

/**
 * Synchronous view of the host capabilities as seen from inside a module.
 * `fetch` takes the guest's JSON options text and returns the JSON reply text.
 */
export interface GuestHost {
  log(level: string, message: string): void;
  capture(stream: OutputStream, data: Uint8Array): void;
  currentUnixTime(): number;
  fetch(request: string): string;
}

export const IMPORT_NAMESPACE = 'env';

export const HOST_IMPORT_NAMES = [
  'app_log',
  'get_unixtime',
  'fetch',
  'capture_stdout',
  'capture_stderr',
] as const;

export type HostImportName = (typeof HOST_IMPORT_NAMES)[number];

export function isHostImportName(name: string): name is HostImportName {
  return HOST_IMPORT_NAMES.some((candidate) => candidate === name);
}

export interface ModuleImportContext {
  host: GuestHost;
  /** Live memory accessor; throws until the instance exports one. */
  memory: () => GuestMemory;
  /** Throws ResourceLimitExceeded when guest memory has grown past its cap. */
  checkLimits: () => void;
}

const encoder = new TextEncoder();

/**
 * Build the `env` import object. Pointer and length arguments arrive as
 * signed i32 and are reinterpreted as unsigned before any bounds check.
 */
export function createModuleImports({ host, memory, checkLimits }: ModuleImportContext): WebAssembly.Imports {
  // Reply kept for a guest that retries with a larger buffer
  let pendingFetch: { request: string; reply: Uint8Array } | null = null;

  const enter = (): GuestMemory => {
    checkLimits();
    return memory();
  };

  const env: Record<HostImportName, (...args: number[]) => number | bigint | void> = {
    app_log: (levelPtr, levelLen, msgPtr, msgLen) => {
      const guest = enter();
      const level = guest.readText(levelPtr >>> 0, levelLen >>> 0);
      const message = guest.readText(msgPtr >>> 0, msgLen >>> 0);
      host.log(level, message);
    },

    get_unixtime: () => {
      checkLimits();
      return BigInt(host.currentUnixTime());
    },

    fetch: (optsPtr, optsLen, bufPtr, bufMax) => {
      const guest = enter();
      const request = guest.readText(optsPtr >>> 0, optsLen >>> 0);
      guest.check(bufPtr >>> 0, bufMax >>> 0);

      const reply =
        pendingFetch && pendingFetch.request === request
          ? pendingFetch.reply
          : encoder.encode(host.fetch(request));

      const written = guest.writeBounded(bufPtr >>> 0, bufMax >>> 0, reply);
      pendingFetch = written < 0 ? { request, reply } : null;
      return written;
    },

    capture_stdout: (ptr, len) => {
      host.capture('stdout', enter().read(ptr >>> 0, len >>> 0));
    },

    capture_stderr: (ptr, len) => {
      host.capture('stderr', enter().read(ptr >>> 0, len >>> 0));
    },
  };

  return { [IMPORT_NAMESPACE]: env };
}
