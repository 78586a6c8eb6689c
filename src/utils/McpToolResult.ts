import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

export function isMcpToolResult(value: unknown): value is CallToolResult {
  if (!value || typeof value !== 'object' || !('content' in value)) return false;
  return CallToolResultSchema.safeParse(value).success;
}

/**
 * Wrap an arbitrary handler result as a single JSON text block, unless it is
 * already a tool result.
 */
export function toMcpToolResult(value: unknown, isError = false): CallToolResult {
  if (isMcpToolResult(value)) return value;
  const text =
    typeof value === 'string'
      ? value
      : value === undefined
        ? 'undefined'
        : JSON.stringify(value, null, 2);
  const result: CallToolResult = {
    content: [
      {
        type: 'text',
        text,
      },
    ],
  };
  if (isError) {
    result.isError = true;
  }
  return result;
}
