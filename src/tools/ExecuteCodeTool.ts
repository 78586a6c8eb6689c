import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ExecutionService } from '../execution/ExecutionService.js';
import type { ExecuteHttpResult } from '../execution/types.js';
import { InvalidRequestError, serializeError } from '../execution/ErrorHandling.js';
import { toMcpToolResult } from '../utils/McpToolResult.js';

const executeInputSchema = z.object({
  url: z.string().url().describe('HTTP(S) URL of a .js/.ts script or a .wasm module'),
});

const executeSourceInputSchema = z.object({
  source: z.string().min(1).describe('Inline program text, or base64 for WebAssembly'),
  kind: z.enum(['javascript', 'typescript', 'webassembly']),
  encoding: z.enum(['utf8', 'base64']).optional(),
});

type ExecuteInput = z.infer<typeof executeInputSchema>;
type ExecuteSourceInput = z.infer<typeof executeSourceInputSchema>;

const RUNTIME_NOTES = [
  'Scripts run in a fresh V8 isolate; the value of the last expression is returned as `output`.',
  'Globals: console.*, app_log(level, message), get_unixtime(), fetch({ url, method, headers, body }) (synchronous).',
  'WebAssembly modules must export `memory` and may import env.app_log, env.get_unixtime, env.fetch, env.capture_stdout, env.capture_stderr.',
  'Outbound fetch is limited to the configured allow-list and never reaches private networks.',
].join('\n');

/**
 * Exposes the sandbox as two MCP tools: `execute` (by URL) and
 * `execute_source` (inline code).
 */
export class ExecuteCodeTool {
  public readonly executeTool: Tool;
  public readonly executeSourceTool: Tool;

  constructor(private readonly service: ExecutionService) {
    const [executeTool, executeSourceTool] = this.createToolDefinitions();
    this.executeTool = executeTool;
    this.executeSourceTool = executeSourceTool;
  }

  private createToolDefinitions(): [Tool, Tool] {
    return [
      {
        name: 'execute',
        description: `Download code from a URL and run it in an isolated sandbox.\n\n${RUNTIME_NOTES}`,
        inputSchema: {
          type: 'object',
          properties: {
            url: {
              type: 'string',
              description: 'HTTP(S) URL of a .js/.ts script or a .wasm module',
            },
          },
          required: ['url'],
        },
      },
      {
        name: 'execute_source',
        description: `Run inline JavaScript, TypeScript or base64-encoded WebAssembly in an isolated sandbox.\n\n${RUNTIME_NOTES}`,
        inputSchema: {
          type: 'object',
          properties: {
            source: {
              type: 'string',
              description: 'Program text; base64 for WebAssembly unless encoding says otherwise',
            },
            kind: {
              type: 'string',
              enum: ['javascript', 'typescript', 'webassembly'],
            },
            encoding: {
              type: 'string',
              enum: ['utf8', 'base64'],
              description: 'Defaults to base64 for webassembly and utf8 otherwise',
            },
          },
          required: ['source', 'kind'],
        },
      },
    ];
  }

  async execute(rawParams: unknown): Promise<CallToolResult> {
    const params = executeInputSchema.safeParse(rawParams);
    if (!params.success) {
      return this.invalid(params.error);
    }
    const input: ExecuteInput = params.data;
    return this.buildResponse(await this.service.executeUrl(input.url));
  }

  async executeSource(rawParams: unknown): Promise<CallToolResult> {
    const params = executeSourceInputSchema.safeParse(rawParams);
    if (!params.success) {
      return this.invalid(params.error);
    }
    const input: ExecuteSourceInput = params.data;
    return this.buildResponse(
      await this.service.executeSource(input.source, input.kind, input.encoding),
    );
  }

  private invalid(error: z.ZodError): CallToolResult {
    const failure = new InvalidRequestError('Invalid tool arguments', {
      issues: error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`),
    });
    return toMcpToolResult(
      { httpStatus: failure.statusCode, status: 'error', error: serializeError(failure) },
      true,
    );
  }

  private buildResponse({ statusCode, body }: ExecuteHttpResult): CallToolResult {
    return toMcpToolResult({ httpStatus: statusCode, ...body }, statusCode !== 200);
  }
}
