import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';
import { errorResult, textResult } from './results.js';

/** MCP Tool: buildmux_terminal_close（可選擇先存 transcript） */
export function registerTerminalCloseTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'buildmux_terminal_close',
    'Close a terminal session, optionally saving its transcript first',
    {
      sessionId: z.string().describe('Terminal session ID'),
      saveTranscript: z.boolean().optional().default(false)
        .describe('Write the session output to the terminal log directory before closing'),
    },
    async ({ sessionId, saveTranscript }) => {
      try {
        const lines: string[] = [];
        if (saveTranscript && deps.terminals.get(sessionId)) {
          const filePath = await deps.terminals.saveTranscript(sessionId);
          lines.push(`Terminal output saved to: ${filePath}`);
        }
        const closed = deps.terminals.close(sessionId);
        lines.push(closed ? `Terminal session closed: ${sessionId}` : `Terminal session not found: ${sessionId}`);
        return textResult(lines.join('\n'));
      } catch (err) {
        return errorResult('Terminal close', err);
      }
    },
  );
}
