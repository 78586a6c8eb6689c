/**
 * Sandbox execution MCP server
 * Main entry point for the Model Context Protocol server
 *
 * Tools:
 * - execute: download a script or WebAssembly module by URL and run it
 * - execute_source: run inline JavaScript, TypeScript or base64 WebAssembly
 */

import { ExecutionService } from './execution/ExecutionService.js';
import { MCPServer } from './server/MCPServer.js';
import { ExecuteCodeTool } from './tools/ExecuteCodeTool.js';
import { loadSandboxConfig } from './utils/SandboxConfig.js';

export { VERSION } from './version.js';
export { ExecutionService } from './execution/ExecutionService.js';
export { ExecutionOrchestrator } from './execution/ExecutionOrchestrator.js';
export { loadSandboxConfig, parseSandboxConfig } from './utils/SandboxConfig.js';
export type { SandboxConfig, SandboxConfigInput } from './utils/SandboxConfig.js';
export type { ExecuteResponse, ExecuteHttpResult, ExecutionReport } from './execution/types.js';

/**
 * Wire the sandbox tools into a server. Split from `main` so tests can build
 * the same server without a transport.
 */
export function registerSandboxTools(server: MCPServer, service: ExecutionService): ExecuteCodeTool {
  const tool = new ExecuteCodeTool(service);
  server.registerTool(tool.executeTool, (params) => tool.execute(params));
  server.registerTool(tool.executeSourceTool, (params) => tool.executeSource(params));
  return tool;
}

export async function main(): Promise<void> {
  console.error(`Sandbox Execution MCP Server - Starting...`);

  try {
    const config = loadSandboxConfig();
    const server = new MCPServer();
    const service = new ExecutionService(config, { logger: server.getLogger() });
    registerSandboxTools(server, service);

    await server.start();
    console.error(`Sandbox Execution MCP Server is running. Waiting for connections...`);
  } catch (error) {
    console.error('Failed to start MCP server:', error);
    process.exit(1);
  }
}
