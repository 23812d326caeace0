import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { McpDependencies } from '../McpServer.js';
import { textResult } from './results.js';

/** MCP Tool: buildmux_build_list */
export function registerBuildListTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'buildmux_build_list',
    'List build sessions known to this server',
    async () => {
      const sessions = deps.dispatcher.list();
      const lines = [`Found ${sessions.length} build session(s)`];
      for (const s of sessions) {
        lines.push(`- ${s.id}  ${s.status}  ${s.backendType}  ${s.operation.type}  ${s.projectPath}`);
      }
      return textResult(lines.join('\n'));
    },
  );
}
