import type { DetectedKind, ScriptDialect } from '../execution/types.js';

const WASM_MAGIC = [0x00, 0x61, 0x73, 0x6d];

const SCRIPT_EXTENSIONS = ['.js', '.mjs', '.cjs', '.ts', '.mts', '.cts'];
const TYPESCRIPT_EXTENSIONS = ['.ts', '.mts', '.cts'];

function extensionOf(url: string): string {
  let pathname = url;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url.split(/[?#]/)[0] ?? url;
  }
  const match = /\.[a-z0-9]+$/i.exec(pathname);
  return match ? match[0].toLowerCase() : '';
}

export function hasWasmMagic(bytes: Uint8Array): boolean {
  return WASM_MAGIC.every((byte, index) => bytes[index] === byte);
}

/**
 * Resolve the code kind from the module magic number, falling back to the
 * URL's file extension.
 */
export function detectCodeKind(url: string, bytes: Uint8Array): DetectedKind {
  if (hasWasmMagic(bytes)) {
    return 'module';
  }

  const extension = extensionOf(url);
  if (extension === '.wasm') {
    return 'module';
  }
  if (SCRIPT_EXTENSIONS.includes(extension)) {
    return 'script';
  }
  return 'unknown';
}

export function detectScriptDialect(url: string): ScriptDialect {
  return TYPESCRIPT_EXTENSIONS.includes(extensionOf(url)) ? 'typescript' : 'javascript';
}
