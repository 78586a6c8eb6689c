import {
  InstantiationError,
  ResourceLimitExceededError,
  SandboxError,
  TrapError,
  errorMessage,
} from '../../execution/ErrorHandling.js';
import type { AdapterResult } from '../types.js';
import { GuestMemory } from './GuestMemory.js';
import { IMPORT_NAMESPACE, createModuleImports, isHostImportName } from './moduleImports.js';
import type { GuestHost } from './moduleImports.js';

export interface ModuleRunOptions {
  entryPoint: string;
  maxMemoryBytes: number;
}

/**
 * Reject modules the host cannot serve before any guest code runs: a missing
 * `memory` export, or imports the `env` namespace does not provide.
 */
export function validateLinkage(module: WebAssembly.Module): void {
  const exported = WebAssembly.Module.exports(module);
  if (!exported.some((entry) => entry.name === 'memory' && entry.kind === 'memory')) {
    throw new InstantiationError('Module does not export a linear memory named "memory"');
  }

  for (const entry of WebAssembly.Module.imports(module)) {
    if (entry.module !== IMPORT_NAMESPACE || entry.kind !== 'function' || !isHostImportName(entry.name)) {
      throw new InstantiationError(`Unresolved import ${entry.module}.${entry.name} (${entry.kind})`, {
        module: entry.module,
        name: entry.name,
        kind: entry.kind,
      });
    }
  }
}

function classifyFault(error: unknown, phase: 'instantiate' | 'execute'): SandboxError {
  if (error instanceof SandboxError) {
    return error;
  }
  const message = errorMessage(error);
  if (error instanceof WebAssembly.LinkError || error instanceof WebAssembly.CompileError) {
    return new InstantiationError(message);
  }
  if (error instanceof WebAssembly.RuntimeError) {
    return new TrapError(`WebAssembly trap: ${message}`, { phase });
  }
  return new TrapError(message, {
    phase,
    name: error instanceof Error ? error.name : typeof error,
  });
}

/**
 * Instantiate and run a compiled module against `host`. Runs synchronously on
 * the calling thread; the caller decides how to bound its wall-clock time.
 */
export function runModule(
  module: WebAssembly.Module,
  host: GuestHost,
  { entryPoint, maxMemoryBytes }: ModuleRunOptions,
): AdapterResult {
  let guestMemory: GuestMemory | null = null;

  const memory = (): GuestMemory => {
    if (!guestMemory) {
      throw new InstantiationError('Host function called before guest memory was available');
    }
    return guestMemory;
  };

  const checkLimits = (): void => {
    if (guestMemory && guestMemory.byteLength > maxMemoryBytes) {
      throw new ResourceLimitExceededError(
        `Guest memory of ${guestMemory.byteLength} bytes exceeds limit of ${maxMemoryBytes} bytes`,
        { memorySize: guestMemory.byteLength, limit: maxMemoryBytes },
      );
    }
  };

  let instance: WebAssembly.Instance;
  try {
    validateLinkage(module);
    instance = new WebAssembly.Instance(module, createModuleImports({ host, memory, checkLimits }));
    const exported = instance.exports.memory;
    if (!(exported instanceof WebAssembly.Memory)) {
      throw new InstantiationError('Module does not export a linear memory named "memory"');
    }
    guestMemory = new GuestMemory(exported);
    checkLimits();
  } catch (error) {
    return { ok: false, error: classifyFault(error, 'instantiate') };
  }

  const entry = instance.exports[entryPoint];
  if (typeof entry !== 'function') {
    return { ok: true, returnValue: `Module instantiated (no ${entryPoint} export found)` };
  }

  try {
    entry();
    checkLimits();
  } catch (error) {
    return { ok: false, error: classifyFault(error, 'execute') };
  }

  return { ok: true, returnValue: `Module executed (${entryPoint})` };
}
