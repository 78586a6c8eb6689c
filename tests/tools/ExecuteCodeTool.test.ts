import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { ExecutionService } from '../../src/execution/ExecutionService.js';
import type { ExecuteHttpResult } from '../../src/execution/types.js';
import { ExecuteCodeTool } from '../../src/tools/ExecuteCodeTool.js';
import { parseSandboxConfig } from '../../src/utils/SandboxConfig.js';

function payload(result: CallToolResult): Record<string, unknown> {
  const [block] = result.content;
  if (block?.type !== 'text') {
    throw new Error('expected a text content block');
  }
  return JSON.parse(block.text);
}

function httpResult(statusCode: number, output: string | null): ExecuteHttpResult {
  return {
    statusCode,
    body: {
      status: statusCode === 200 ? 'success' : 'error',
      output,
      stdout: '',
      stderr: '',
      error: statusCode === 200 ? null : { code: 'Trap', message: 'trapped', details: null },
      metadata: {
        executionTimeMs: 3,
        codeType: 'webassembly',
        timestamp: '2024-01-01T00:00:00.000Z',
        resourceSize: 10,
        warnings: [],
      },
    },
  };
}

describe('ExecuteCodeTool', () => {
  let service: ExecutionService;
  let tool: ExecuteCodeTool;

  beforeEach(() => {
    service = new ExecutionService(parseSandboxConfig({}));
    tool = new ExecuteCodeTool(service);
  });

  it('defines the execute and execute_source tools', () => {
    expect(tool.executeTool.name).toBe('execute');
    expect(tool.executeTool.inputSchema.required).toEqual(['url']);
    expect(tool.executeSourceTool.name).toBe('execute_source');
    expect(tool.executeSourceTool.inputSchema.required).toEqual(['source', 'kind']);
    expect(tool.executeSourceTool.description).toContain('get_unixtime()');
  });

  describe('execute', () => {
    it('passes the URL to the service and wraps the response', async () => {
      const executeUrl = jest.spyOn(service, 'executeUrl').mockResolvedValue(httpResult(200, 'done'));

      const result = await tool.execute({ url: 'https://example.com/job.wasm' });

      expect(executeUrl).toHaveBeenCalledWith('https://example.com/job.wasm');
      expect(result.isError).toBeUndefined();
      expect(payload(result)).toMatchObject({ httpStatus: 200, status: 'success', output: 'done' });
    });

    it('flags failed executions as tool errors', async () => {
      jest.spyOn(service, 'executeUrl').mockResolvedValue(httpResult(500, null));

      const result = await tool.execute({ url: 'https://example.com/job.wasm' });

      expect(result.isError).toBe(true);
      expect(payload(result)).toMatchObject({
        httpStatus: 500,
        status: 'error',
        error: { code: 'Trap', message: 'trapped', details: null },
      });
    });

    it('rejects arguments without a valid URL', async () => {
      const executeUrl = jest.spyOn(service, 'executeUrl');

      const result = await tool.execute({ url: 'not a url' });

      expect(result.isError).toBe(true);
      expect(payload(result)).toMatchObject({
        httpStatus: 400,
        status: 'error',
        error: { code: 'InvalidRequest', message: 'Invalid tool arguments' },
      });
      expect(executeUrl).not.toHaveBeenCalled();
    });
  });

  describe('execute_source', () => {
    it('forwards source, kind and encoding', async () => {
      const executeSource = jest.spyOn(service, 'executeSource').mockResolvedValue(httpResult(200, null));

      await tool.executeSource({ source: 'AGFzbQEAAAA=', kind: 'webassembly', encoding: 'base64' });

      expect(executeSource).toHaveBeenCalledWith('AGFzbQEAAAA=', 'webassembly', 'base64');
    });

    it('rejects an unknown kind', async () => {
      const result = await tool.executeSource({ source: 'print(1)', kind: 'python' });

      expect(result.isError).toBe(true);
      expect(payload(result)).toMatchObject({ httpStatus: 400 });
    });

    it('runs inline JavaScript end to end', async () => {
      const result = await tool.executeSource({ source: 'console.log("x");\n6 * 7', kind: 'javascript' });

      expect(result.isError).toBeUndefined();
      expect(payload(result)).toMatchObject({
        httpStatus: 200,
        status: 'success',
        output: '42',
        stdout: 'x\n',
        metadata: { codeType: 'javascript', resourceSize: 23 },
      });
    });
  });
});
