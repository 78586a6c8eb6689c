import { InstantiationError } from '../../src/execution/ErrorHandling.js';
import { runModule, validateLinkage } from '../../src/sandbox/module/ModuleRunner.js';
import type { GuestHost } from '../../src/sandbox/module/moduleImports.js';
import { VOID, buildModule, envImport, op } from '../helpers/wasmBuilder.js';

const PAGE = 65536;
const OPTIONS = { entryPoint: '_start', maxMemoryBytes: 4 * PAGE };

function compile(bytes: Uint8Array): WebAssembly.Module {
  return new WebAssembly.Module(bytes);
}

function createHost(): jest.Mocked<GuestHost> {
  return {
    log: jest.fn(),
    capture: jest.fn(),
    currentUnixTime: jest.fn(() => 42),
    fetch: jest.fn<string, [request: string]>(() => '{}'),
  };
}

describe('validateLinkage', () => {
  it('rejects a module without a memory export', () => {
    const module = compile(buildModule({ functions: [{ type: VOID, body: [], exportAs: '_start' }] }));
    expect(() => validateLinkage(module)).toThrow(InstantiationError);
  });

  it('rejects a module whose memory is not exported as "memory"', () => {
    const module = compile(buildModule({ memory: { initial: 1, exportAs: 'heap' } }));
    expect(() => validateLinkage(module)).toThrow('Module does not export a linear memory named "memory"');
  });

  it('rejects imports outside the env namespace', () => {
    const module = compile(
      buildModule({
        imports: [{ module: 'wasi_snapshot_preview1', name: 'fd_write', type: VOID }],
        memory: { initial: 1 },
      }),
    );
    expect(() => validateLinkage(module)).toThrow('Unresolved import wasi_snapshot_preview1.fd_write (function)');
  });

  it('rejects unknown env imports', () => {
    const module = compile(
      buildModule({
        imports: [{ module: 'env', name: 'open_socket', type: VOID }],
        memory: { initial: 1 },
      }),
    );
    expect(() => validateLinkage(module)).toThrow(InstantiationError);
  });

  it('accepts every host import', () => {
    const module = compile(
      buildModule({
        imports: [
          envImport('app_log'),
          envImport('get_unixtime'),
          envImport('fetch'),
          envImport('capture_stdout'),
          envImport('capture_stderr'),
        ],
        memory: { initial: 1 },
      }),
    );
    expect(() => validateLinkage(module)).not.toThrow();
  });
});

describe('runModule', () => {
  it('runs _start and routes app_log through the host', () => {
    const host = createHost();
    const module = compile(
      buildModule({
        imports: [envImport('app_log')],
        memory: { initial: 1 },
        data: [
          { offset: 0, text: 'INFO' },
          { offset: 16, text: 'hello' },
        ],
        functions: [
          {
            type: VOID,
            body: [...op.i32Const(0), ...op.i32Const(4), ...op.i32Const(16), ...op.i32Const(5), ...op.call(0)],
            exportAs: '_start',
          },
        ],
      }),
    );

    const result = runModule(module, host, OPTIONS);

    expect(result).toEqual({ ok: true, returnValue: 'Module executed (_start)' });
    expect(host.log).toHaveBeenCalledWith('INFO', 'hello');
  });

  it('captures raw output bytes', () => {
    const host = createHost();
    const module = compile(
      buildModule({
        imports: [envImport('capture_stdout'), envImport('capture_stderr')],
        memory: { initial: 1 },
        data: [{ offset: 8, text: 'out\nerr\n' }],
        functions: [
          {
            type: VOID,
            body: [
              ...op.i32Const(8),
              ...op.i32Const(4),
              ...op.call(0),
              ...op.i32Const(12),
              ...op.i32Const(4),
              ...op.call(1),
            ],
            exportAs: '_start',
          },
        ],
      }),
    );

    expect(runModule(module, host, OPTIONS).ok).toBe(true);
    expect(host.capture).toHaveBeenNthCalledWith(1, 'stdout', new Uint8Array(Buffer.from('out\n')));
    expect(host.capture).toHaveBeenNthCalledWith(2, 'stderr', new Uint8Array(Buffer.from('err\n')));
  });

  it('calls get_unixtime on the host', () => {
    const host = createHost();
    const module = compile(
      buildModule({
        imports: [envImport('get_unixtime')],
        memory: { initial: 1 },
        functions: [{ type: VOID, body: [...op.call(0), ...op.drop], exportAs: '_start' }],
      }),
    );

    expect(runModule(module, host, OPTIONS).ok).toBe(true);
    expect(host.currentUnixTime).toHaveBeenCalledTimes(1);
  });

  it('reports instantiation without an entry point', () => {
    const module = compile(buildModule({ memory: { initial: 1 } }));

    expect(runModule(module, createHost(), OPTIONS)).toEqual({
      ok: true,
      returnValue: 'Module instantiated (no _start export found)',
    });
  });

  it('uses a configured entry point', () => {
    const module = compile(
      buildModule({
        memory: { initial: 1 },
        functions: [{ type: VOID, body: [], exportAs: 'main' }],
      }),
    );

    expect(runModule(module, createHost(), { ...OPTIONS, entryPoint: 'main' })).toEqual({
      ok: true,
      returnValue: 'Module executed (main)',
    });
  });

  it('converts an unreachable instruction into a Trap', () => {
    const module = compile(
      buildModule({
        memory: { initial: 1 },
        functions: [{ type: VOID, body: op.unreachable, exportAs: '_start' }],
      }),
    );

    const result = runModule(module, createHost(), OPTIONS);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('Trap');
      expect(result.error.details).toMatchObject({ phase: 'execute' });
    }
  });

  it('fails with InvalidMemoryAccess for out-of-bounds host arguments', () => {
    const host = createHost();
    const module = compile(
      buildModule({
        imports: [envImport('capture_stdout')],
        memory: { initial: 1 },
        functions: [
          {
            type: VOID,
            body: [...op.i32Const(PAGE - 4), ...op.i32Const(100), ...op.call(0)],
            exportAs: '_start',
          },
        ],
      }),
    );

    const result = runModule(module, host, OPTIONS);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('InvalidMemoryAccess');
    }
    expect(host.capture).not.toHaveBeenCalled();
  });

  it('fails with ResourceLimitExceeded when initial memory is over the cap', () => {
    const module = compile(buildModule({ memory: { initial: 2 } }));

    const result = runModule(module, createHost(), { ...OPTIONS, maxMemoryBytes: PAGE });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('ResourceLimitExceeded');
    }
  });

  it('fails with ResourceLimitExceeded when memory grows past the cap', () => {
    const module = compile(
      buildModule({
        memory: { initial: 1 },
        functions: [
          { type: VOID, body: [...op.i32Const(1), ...op.memoryGrow, ...op.drop], exportAs: '_start' },
        ],
      }),
    );

    const result = runModule(module, createHost(), { ...OPTIONS, maxMemoryBytes: PAGE });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('ResourceLimitExceeded');
      expect(result.error.details).toEqual({ memorySize: 2 * PAGE, limit: PAGE });
    }
  });

  it('never runs a module that fails linkage', () => {
    const module = compile(buildModule({ functions: [{ type: VOID, body: op.unreachable, exportAs: '_start' }] }));

    const result = runModule(module, createHost(), OPTIONS);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('InstantiationError');
    }
  });
});
