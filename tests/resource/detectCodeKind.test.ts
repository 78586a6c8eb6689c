import { detectCodeKind, detectScriptDialect, hasWasmMagic } from '../../src/resource/detectCodeKind.js';

const WASM_HEADER = new Uint8Array([0x00, 0x61, 0x73, 0x6d, 0x01, 0x00, 0x00, 0x00]);
const TEXT = new Uint8Array(Buffer.from('console.log(1)'));

describe('detectCodeKind', () => {
  it('prefers the module magic number over the extension', () => {
    expect(detectCodeKind('https://example.com/app.js', WASM_HEADER)).toBe('module');
    expect(detectCodeKind('https://example.com/download', WASM_HEADER)).toBe('module');
  });

  it('falls back to the file extension', () => {
    expect(detectCodeKind('https://example.com/lib/app.wasm', TEXT)).toBe('module');
    expect(detectCodeKind('https://example.com/app.js', TEXT)).toBe('script');
    expect(detectCodeKind('https://example.com/app.MJS', TEXT)).toBe('script');
    expect(detectCodeKind('https://example.com/app.ts', TEXT)).toBe('script');
  });

  it('ignores query strings and fragments', () => {
    expect(detectCodeKind('https://example.com/app.js?version=2#top', TEXT)).toBe('script');
    expect(detectCodeKind('https://example.com/run?file=app.js', TEXT)).toBe('unknown');
  });

  it('returns unknown when nothing matches', () => {
    expect(detectCodeKind('https://example.com/readme.txt', TEXT)).toBe('unknown');
    expect(detectCodeKind('https://example.com/', new Uint8Array(0))).toBe('unknown');
  });
});

describe('hasWasmMagic', () => {
  it('needs all four header bytes', () => {
    expect(hasWasmMagic(WASM_HEADER)).toBe(true);
    expect(hasWasmMagic(new Uint8Array([0x00, 0x61, 0x73]))).toBe(false);
  });
});

describe('detectScriptDialect', () => {
  it('recognises TypeScript extensions', () => {
    expect(detectScriptDialect('https://example.com/job.ts')).toBe('typescript');
    expect(detectScriptDialect('https://example.com/job.mts?x=1')).toBe('typescript');
    expect(detectScriptDialect('https://example.com/job.js')).toBe('javascript');
    expect(detectScriptDialect('https://example.com/job')).toBe('javascript');
  });
});
