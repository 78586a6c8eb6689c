import { InvalidMemoryAccessError } from '../../src/execution/ErrorHandling.js';
import { GuestMemory } from '../../src/sandbox/module/GuestMemory.js';

const PAGE = 65536;

describe('GuestMemory', () => {
  let raw: WebAssembly.Memory;
  let memory: GuestMemory;

  beforeEach(() => {
    raw = new WebAssembly.Memory({ initial: 1, maximum: 4 });
    memory = new GuestMemory(raw);
  });

  it('reads a copy of guest bytes', () => {
    new Uint8Array(raw.buffer).set([1, 2, 3, 4], 10);

    const bytes = memory.read(10, 4);
    expect(Array.from(bytes)).toEqual([1, 2, 3, 4]);

    bytes[0] = 99;
    expect(new Uint8Array(raw.buffer)[10]).toBe(1);
  });

  it('decodes text with replacement characters for invalid UTF-8', () => {
    new Uint8Array(raw.buffer).set([0x68, 0x69, 0xff], 0);
    expect(memory.readText(0, 3)).toBe('hi\uFFFD');
  });

  it('accepts a range ending exactly at the memory boundary', () => {
    expect(memory.read(PAGE - 2, 2)).toHaveLength(2);
    expect(memory.read(PAGE, 0)).toHaveLength(0);
  });

  it('rejects ranges that run past the end of memory', () => {
    expect(() => memory.read(PAGE - 2, 3)).toThrow(InvalidMemoryAccessError);
    expect(() => memory.read(PAGE + 1, 0)).toThrow(InvalidMemoryAccessError);
    expect(() => memory.read(-1, 1)).toThrow(InvalidMemoryAccessError);
  });

  it('reports pointer, length and memory size on failure', () => {
    try {
      memory.read(PAGE, 8);
      throw new Error('expected read to fail');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidMemoryAccessError);
      const failure = error as InvalidMemoryAccessError;
      expect(failure.kind).toBe('InvalidMemoryAccess');
      expect(failure.details).toEqual({ ptr: PAGE, len: 8, memorySize: PAGE });
    }
  });

  it('sees memory growth', () => {
    expect(() => memory.read(PAGE, 8)).toThrow(InvalidMemoryAccessError);
    raw.grow(1);
    expect(memory.byteLength).toBe(2 * PAGE);
    expect(memory.read(PAGE, 8)).toHaveLength(8);
  });

  describe('writeBounded', () => {
    it('writes bytes that fit and returns the count', () => {
      const written = memory.writeBounded(100, 8, new Uint8Array([7, 8, 9]));
      expect(written).toBe(3);
      expect(Array.from(new Uint8Array(raw.buffer, 100, 4))).toEqual([7, 8, 9, 0]);
    });

    it('returns the negated required size and writes nothing when the buffer is too small', () => {
      const written = memory.writeBounded(100, 2, new Uint8Array([7, 8, 9]));
      expect(written).toBe(-3);
      expect(Array.from(new Uint8Array(raw.buffer, 100, 3))).toEqual([0, 0, 0]);
    });

    it('checks the whole declared buffer, not just the bytes written', () => {
      expect(() => memory.writeBounded(PAGE - 4, 16, new Uint8Array([1]))).toThrow(
        InvalidMemoryAccessError,
      );
    });
  });
});
