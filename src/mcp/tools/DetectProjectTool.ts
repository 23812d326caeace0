import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';
import { textResult } from './results.js';

/** MCP Tool: buildmux_detect_project */
export function registerDetectProjectTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'buildmux_detect_project',
    'Detect which build backend a project uses from its build files',
    {
      projectPath: z.string().optional().describe('Project directory (defaults to the repository root)'),
    },
    async ({ projectPath }) => {
      const detection = deps.detector.detect(projectPath ?? deps.repoRoot);
      return textResult([
        `Project: ${detection.projectPath}`,
        `Backend: ${detection.backendType ?? 'unknown'}`,
        `Build files: ${detection.markers.length > 0 ? detection.markers.join(', ') : 'none'}`,
      ].join('\n'));
    },
  );
}
