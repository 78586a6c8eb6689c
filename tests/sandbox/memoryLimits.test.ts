import { InstantiationError, ResourceLimitExceededError } from '../../src/execution/ErrorHandling.js';
import { runModule } from '../../src/sandbox/module/ModuleRunner.js';
import { WASM_PAGE_BYTES, limitModuleMemory } from '../../src/sandbox/module/memoryLimits.js';
import { VOID, buildModule, op } from '../helpers/wasmBuilder.js';

function exportedMemory(bytes: Uint8Array): WebAssembly.Memory {
  const instance = new WebAssembly.Instance(new WebAssembly.Module(new Uint8Array(bytes)), {});
  const { memory } = instance.exports;
  if (!(memory instanceof WebAssembly.Memory)) {
    throw new Error('memory export missing');
  }
  return memory;
}

describe('limitModuleMemory', () => {
  it('adds the cap as the maximum of an unbounded memory', () => {
    const memory = exportedMemory(limitModuleMemory(buildModule({ memory: { initial: 1 } }), 2 * WASM_PAGE_BYTES));

    expect(memory.grow(1)).toBe(1);
    expect(() => memory.grow(1)).toThrow(RangeError);
    expect(memory.buffer.byteLength).toBe(2 * WASM_PAGE_BYTES);
  });

  it('lowers a declared maximum above the cap', () => {
    const bytes = buildModule({ memory: { initial: 1, maximum: 100 } });
    const memory = exportedMemory(limitModuleMemory(bytes, WASM_PAGE_BYTES));

    expect(() => memory.grow(1)).toThrow(RangeError);
  });

  it('keeps a declared maximum below the cap', () => {
    const bytes = buildModule({ memory: { initial: 1, maximum: 2 } });
    const memory = exportedMemory(limitModuleMemory(bytes, 8 * WASM_PAGE_BYTES));

    expect(memory.grow(1)).toBe(1);
    expect(() => memory.grow(1)).toThrow(RangeError);
  });

  it('rejects an initial memory larger than the cap', () => {
    const bytes = buildModule({ memory: { initial: 3 } });

    expect(() => limitModuleMemory(bytes, 2 * WASM_PAGE_BYTES)).toThrow(ResourceLimitExceededError);
    expect(() => limitModuleMemory(bytes, 2 * WASM_PAGE_BYTES)).toThrow(
      `Guest memory of ${3 * WASM_PAGE_BYTES} bytes exceeds limit of ${2 * WASM_PAGE_BYTES} bytes`,
    );
  });

  it('leaves modules without a memory section unchanged', () => {
    const bytes = buildModule({ functions: [{ type: VOID, body: [], exportAs: '_start' }] });

    expect(limitModuleMemory(bytes, WASM_PAGE_BYTES)).toEqual(bytes);
  });

  it('returns bytes without a module header untouched', () => {
    const bytes = new Uint8Array([0x00, 0x61, 0x73, 0x6d, 0xff]);

    expect(limitModuleMemory(bytes, WASM_PAGE_BYTES)).toBe(bytes);
  });

  it('rejects a section that runs past the end of the module', () => {
    const bytes = new Uint8Array([0x00, 0x61, 0x73, 0x6d, 0x01, 0x00, 0x00, 0x00, 0x05, 0x10, 0x01]);

    expect(() => limitModuleMemory(bytes, WASM_PAGE_BYTES)).toThrow(InstantiationError);
  });

  it('makes memory.grow past the cap fail inside the guest', () => {
    // traps unless memory.grow reports failure with -1
    const bytes = buildModule({
      memory: { initial: 1 },
      functions: [
        {
          type: VOID,
          body: [...op.i32Const(1024), ...op.memoryGrow, ...op.i32Const(-1), ...op.i32Ne, ...op.ifThen(op.unreachable)],
          exportAs: '_start',
        },
      ],
    });
    const module = new WebAssembly.Module(new Uint8Array(limitModuleMemory(bytes, WASM_PAGE_BYTES)));
    const host = { log: jest.fn(), capture: jest.fn(), currentUnixTime: jest.fn(() => 0), fetch: jest.fn(() => '{}') };

    const result = runModule(module, host, { entryPoint: '_start', maxMemoryBytes: WASM_PAGE_BYTES });

    expect(result).toEqual({ ok: true, returnValue: 'Module executed (_start)' });
  });
});
