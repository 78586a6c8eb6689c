import { InstantiationError, ResourceLimitExceededError } from '../../execution/ErrorHandling.js';

export const WASM_PAGE_BYTES = 65536;

const HEADER = [0x00, 0x61, 0x73, 0x6d, 0x01, 0x00, 0x00, 0x00];
const MEMORY_SECTION = 5;
const FLAG_HAS_MAXIMUM = 0x01;
const FLAG_MEMORY64 = 0x04;

class ModuleBytesReader {
  constructor(
    private readonly bytes: Uint8Array,
    public offset: number,
  ) {}

  get done(): boolean {
    return this.offset >= this.bytes.length;
  }

  byte(): number {
    if (this.offset >= this.bytes.length) {
      throw new InstantiationError('Invalid WebAssembly module: unexpected end of section');
    }
    return this.bytes[this.offset++];
  }

  u32(): number {
    let result = 0;
    let multiplier = 1;
    for (let i = 0; i < 5; i++) {
      const byte = this.byte();
      result += (byte & 0x7f) * multiplier;
      if ((byte & 0x80) === 0) {
        return result;
      }
      multiplier *= 128;
    }
    throw new InstantiationError('Invalid WebAssembly module: malformed LEB128 integer');
  }
}

function uleb(value: number): number[] {
  const out: number[] = [];
  let rest = value;
  do {
    let byte = rest % 128;
    rest = Math.floor(rest / 128);
    if (rest !== 0) {
      byte |= 0x80;
    }
    out.push(byte);
  } while (rest !== 0);
  return out;
}

function hasModuleHeader(bytes: Uint8Array): boolean {
  return bytes.length >= HEADER.length && HEADER.every((value, index) => bytes[index] === value);
}

function cappedMemorySection(content: Uint8Array, maxMemoryBytes: number): number[] {
  const maxPages = Math.floor(maxMemoryBytes / WASM_PAGE_BYTES);
  const reader = new ModuleBytesReader(content, 0);
  const count = reader.u32();
  const out = uleb(count);

  for (let i = 0; i < count; i++) {
    const flags = reader.byte();
    if (flags & FLAG_MEMORY64) {
      throw new InstantiationError('64-bit linear memories are not supported');
    }
    const initial = reader.u32();
    const declaredMaximum = flags & FLAG_HAS_MAXIMUM ? reader.u32() : undefined;

    if (initial > maxPages) {
      const memorySize = initial * WASM_PAGE_BYTES;
      throw new ResourceLimitExceededError(
        `Guest memory of ${memorySize} bytes exceeds limit of ${maxMemoryBytes} bytes`,
        { memorySize, limit: maxMemoryBytes },
      );
    }
    const maximum = Math.min(declaredMaximum ?? maxPages, maxPages);
    out.push(flags | FLAG_HAS_MAXIMUM, ...uleb(initial), ...uleb(maximum));
  }

  if (!reader.done) {
    throw new InstantiationError('Invalid WebAssembly module: trailing bytes in memory section');
  }
  return out;
}

/**
 * Rewrite the declared maximum of every memory the module defines so it never
 * exceeds `maxMemoryBytes`; `memory.grow` past it then returns -1 inside the
 * guest. Bytes without a module header are returned untouched for the
 * compiler to reject.
 */
export function limitModuleMemory(bytes: Uint8Array, maxMemoryBytes: number): Uint8Array {
  if (!hasModuleHeader(bytes)) {
    return bytes;
  }

  const parts: Uint8Array[] = [bytes.subarray(0, HEADER.length)];
  const reader = new ModuleBytesReader(bytes, HEADER.length);
  while (!reader.done) {
    const sectionStart = reader.offset;
    const id = reader.byte();
    const size = reader.u32();
    const end = reader.offset + size;
    if (end > bytes.length) {
      throw new InstantiationError(`Invalid WebAssembly module: section ${id} overruns the module`);
    }

    if (id === MEMORY_SECTION) {
      const rewritten = cappedMemorySection(bytes.subarray(reader.offset, end), maxMemoryBytes);
      parts.push(Uint8Array.from([id, ...uleb(rewritten.length), ...rewritten]));
    } else {
      parts.push(bytes.subarray(sectionStart, end));
    }
    reader.offset = end;
  }
  return new Uint8Array(Buffer.concat(parts));
}
