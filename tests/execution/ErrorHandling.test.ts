import {
  DownloadError,
  ExecutionTimeoutError,
  GuestRuntimeError,
  InvalidRequestError,
  SandboxError,
  TrapError,
  UnsupportedCodeKindError,
  createSandboxError,
  errorMessage,
  isErrorKind,
  serializeError,
  toSandboxError,
} from '../../src/execution/ErrorHandling.js';

describe('ErrorHandling', () => {
  describe('error classes', () => {
    it('carry kind, status code and details', () => {
      const error = new DownloadError('unreachable', { url: 'https://example.com/x.js' });

      expect(error).toBeInstanceOf(DownloadError);
      expect(error).toBeInstanceOf(SandboxError);
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('DownloadError');
      expect(error.kind).toBe('DownloadError');
      expect(error.code).toBe('DownloadError');
      expect(error.statusCode).toBe(502);
      expect(error.details).toEqual({ url: 'https://example.com/x.js' });
      expect(error.timestamp).toBeInstanceOf(Date);
    });

    it('use 400 for request errors and 500 for execution errors', () => {
      expect(new InvalidRequestError('bad').statusCode).toBe(400);
      expect(new UnsupportedCodeKindError('what').statusCode).toBe(400);
      expect(new TrapError('trap').statusCode).toBe(500);
      expect(new ExecutionTimeoutError('slow').statusCode).toBe(500);
    });

    it('default details to null', () => {
      expect(new TrapError('trap').details).toBeNull();
    });
  });

  describe('isErrorKind', () => {
    it('accepts known kinds only', () => {
      expect(isErrorKind('Trap')).toBe(true);
      expect(isErrorKind('FetchPolicyViolation')).toBe(true);
      expect(isErrorKind('toString')).toBe(false);
      expect(isErrorKind(42)).toBe(false);
    });
  });

  describe('createSandboxError', () => {
    it('rebuilds the matching class from its wire form', () => {
      const error = createSandboxError('Timeout', 'too slow', { timeoutMs: 10 });

      expect(error).toBeInstanceOf(ExecutionTimeoutError);
      expect(error.message).toBe('too slow');
      expect(error.details).toEqual({ timeoutMs: 10 });
    });

    it('treats null details as absent', () => {
      expect(createSandboxError('Trap', 'x', null).details).toBeNull();
    });
  });

  describe('toSandboxError', () => {
    it('returns sandbox errors unchanged', () => {
      const original = new TrapError('trap');
      expect(toSandboxError(original)).toBe(original);
    });

    it('wraps plain errors with their name and stack', () => {
      const wrapped = toSandboxError(new TypeError('nope'));

      expect(wrapped).toBeInstanceOf(GuestRuntimeError);
      expect(wrapped.message).toBe('nope');
      expect(wrapped.details).toMatchObject({ name: 'TypeError' });
      expect(wrapped.details?.stack).toEqual(expect.stringContaining('nope'));
    });

    it('uses the requested fallback kind', () => {
      expect(toSandboxError('boom', 'FetchTransportError').kind).toBe('FetchTransportError');
    });
  });

  it('serializes to code, message and details', () => {
    expect(serializeError(new TrapError('trap', { phase: 'execute' }))).toEqual({
      code: 'Trap',
      message: 'trap',
      details: { phase: 'execute' },
    });
  });

  it('extracts messages from any thrown value', () => {
    expect(errorMessage(new Error('a'))).toBe('a');
    expect(errorMessage('b')).toBe('b');
    expect(errorMessage(3)).toBe('3');
  });
});
