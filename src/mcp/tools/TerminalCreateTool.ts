import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';
import { errorResult, textResult } from './results.js';

/** MCP Tool: buildmux_terminal_create */
export function registerTerminalCreateTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'buildmux_terminal_create',
    'Create a terminal session with its own working directory and history',
    {
      workingDirectory: z.string().optional()
        .describe('Initial working directory (defaults to the repository root)'),
      environment: z.record(z.string()).optional()
        .describe('Extra environment variables for commands in this session'),
    },
    async ({ workingDirectory, environment }) => {
      try {
        const session = deps.terminals.create({
          workingDirectory: workingDirectory ?? deps.repoRoot,
          environment,
        });
        return textResult(`Terminal session created: ${session.id} (cwd ${session.workingDirectory})`);
      } catch (err) {
        return errorResult('Terminal create', err);
      }
    },
  );
}
