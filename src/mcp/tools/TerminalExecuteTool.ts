import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';
import { collect } from '../../shared/AsyncChannel.js';
import { errorResult, eventLines, textResult } from './results.js';

/**
 * MCP Tool: buildmux_terminal_execute
 * 執行一行指令並等到結束；內建指令（cd / clear / help）同樣適用。
 */
export function registerTerminalExecuteTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'buildmux_terminal_execute',
    'Run a command in a terminal session and return its classified output',
    {
      sessionId: z.string().describe('Terminal session ID'),
      command: z.string().min(1).describe('Command line to run'),
    },
    async ({ sessionId, command }) => {
      try {
        const events = await collect(deps.terminals.execute(sessionId, command));
        const outcome = await deps.terminals.whenIdle(sessionId);
        const session = deps.terminals.get(sessionId);
        return textResult([
          ...eventLines(events),
          '',
          `[${outcome ?? 'DONE'}] cwd: ${session?.workingDirectory ?? 'unknown'}`,
        ].join('\n'));
      } catch (err) {
        return errorResult('Terminal execute', err);
      }
    },
  );
}
