import type { Logger } from 'winston';
import type { SandboxError } from '../execution/ErrorHandling.js';
import type { CodeKind, FetchedResource } from '../execution/types.js';
import type { SandboxConfig } from '../utils/SandboxConfig.js';
import type { HostBridge } from './bridge/HostBridge.js';

export type AdapterResult =
  | { ok: true; returnValue: string | null }
  | { ok: false; error: SandboxError };

export interface SandboxOptions {
  config: SandboxConfig;
  logger?: Logger;
}

/**
 * One execution engine behind the uniform execution contract. An adapter is
 * created per request and runs at most one guest.
 */
export interface SandboxAdapter {
  readonly kind: CodeKind;
  /**
   * Run the guest to completion. Guest faults are reported in the result;
   * aborting `signal` tears the engine down and yields a Timeout failure.
   */
  execute(resource: FetchedResource, bridge: HostBridge, signal: AbortSignal): Promise<AdapterResult>;
}
