import type { CodeKind } from '../execution/types.js';
import { ModuleSandboxAdapter } from './module/ModuleSandboxAdapter.js';
import { ScriptSandboxAdapter } from './script/ScriptSandboxAdapter.js';
import type { SandboxAdapter, SandboxOptions } from './types.js';

export function createSandboxAdapter(kind: CodeKind, options: SandboxOptions): SandboxAdapter {
  switch (kind) {
    case 'script':
      return new ScriptSandboxAdapter(options);
    case 'module':
      return new ModuleSandboxAdapter(options);
  }
}
