import { InvalidMemoryAccessError } from '../../execution/ErrorHandling.js';

/**
 * Bounds-checked view over a module's exported linear memory. Every host
 * import goes through this class; views are rebuilt on each access because
 * `memory.grow` detaches the previous buffer.
 */
export class GuestMemory {
  constructor(private readonly memory: WebAssembly.Memory) {}

  get byteLength(): number {
    return this.memory.buffer.byteLength;
  }

  /**
   * Throw unless `[ptr, ptr + len)` lies inside the current memory.
   */
  public check(ptr: number, len: number): void {
    const size = this.byteLength;
    if (!Number.isInteger(ptr) || !Number.isInteger(len) || ptr < 0 || len < 0 || ptr + len > size) {
      throw new InvalidMemoryAccessError(
        `Guest memory access out of bounds: ptr=${ptr} len=${len} memory=${size}`,
        { ptr, len, memorySize: size },
      );
    }
  }

  /** Copy of the guest bytes at `[ptr, ptr + len)`. */
  public read(ptr: number, len: number): Uint8Array {
    this.check(ptr, len);
    return new Uint8Array(this.memory.buffer, ptr, len).slice();
  }

  /** UTF-8 text at `[ptr, ptr + len)`; invalid sequences become U+FFFD. */
  public readText(ptr: number, len: number): string {
    return Buffer.from(this.read(ptr, len)).toString('utf-8');
  }

  /**
   * Write `bytes` into the caller-supplied buffer `[ptr, ptr + capacity)`.
   * Returns the byte count written, or the negated required size when the
   * buffer is too small (nothing is written in that case).
   */
  public writeBounded(ptr: number, capacity: number, bytes: Uint8Array): number {
    this.check(ptr, capacity);
    if (bytes.length > capacity) {
      return -bytes.length;
    }
    new Uint8Array(this.memory.buffer, ptr, bytes.length).set(bytes);
    return bytes.length;
  }
}
