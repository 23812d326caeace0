import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';
import { errorResult, textResult } from './results.js';

/** MCP Tool: buildmux_build_cancel */
export function registerBuildCancelTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'buildmux_build_cancel',
    'Cancel a running build session',
    {
      sessionId: z.string().describe('Build session ID'),
    },
    async ({ sessionId }) => {
      try {
        const cancelled = deps.dispatcher.cancel(sessionId);
        return textResult(cancelled
          ? `Cancellation requested for ${sessionId}`
          : `Session ${sessionId} has already finished`);
      } catch (err) {
        return errorResult('Build cancel', err);
      }
    },
  );
}
