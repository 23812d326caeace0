import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';
import { eventLines, textResult } from './results.js';

/**
 * MCP Tool: buildmux_build_status
 * 回傳 session 狀態與最後 N 個事件。
 */
export function registerBuildStatusTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'buildmux_build_status',
    'Show the status and recent events of a build session',
    {
      sessionId: z.string().describe('Build session ID'),
      lastEvents: z.number().int().positive().optional().default(50)
        .describe('Number of most recent events to include'),
    },
    async ({ sessionId, lastEvents }) => {
      const session = deps.dispatcher.get(sessionId);
      if (!session) {
        return textResult(`Build session not found: ${sessionId}`);
      }

      const lines = [
        `Session ${session.id}: ${session.status}`,
        `  Project: ${session.projectPath}`,
        `  Backend: ${session.backendType}`,
        `  Operation: ${session.operation.type}`,
        '',
        ...eventLines(session.events.slice(-lastEvents)),
      ];
      return textResult(lines.join('\n'));
    },
  );
}
