import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';
import { BACKEND_TYPES } from '../../domain/value-objects/BackendType.js';
import { errorResult, eventLines, textResult } from './results.js';

export const buildOperationSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('build'),
    release: z.boolean().optional(),
    extraArgs: z.array(z.string()).optional(),
  }),
  z.object({ type: z.literal('clean') }),
  z.object({
    type: z.literal('test'),
    release: z.boolean().optional(),
    extraArgs: z.array(z.string()).optional(),
  }),
  z.object({
    type: z.literal('addDependency'),
    name: z.string(),
    version: z.string().optional(),
    features: z.array(z.string()).optional(),
  }),
  z.object({ type: z.literal('removeDependency'), name: z.string() }),
  z.object({
    type: z.literal('crossTargetBuild'),
    target: z.string(),
    release: z.boolean().optional(),
  }),
]);

/**
 * MCP Tool: buildmux_build_start
 * 啟動 build session；wait=true 時等到結束並回傳全部事件。
 */
export function registerBuildStartTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'buildmux_build_start',
    'Start a build, clean, test or dependency operation for a project',
    {
      projectPath: z.string().optional()
        .describe('Project directory (defaults to the repository root)'),
      backendType: z.enum(BACKEND_TYPES).optional()
        .describe('Backend to use; detected from the project files when omitted'),
      operation: buildOperationSchema.describe('Operation to run'),
      wait: z.boolean().optional().default(false)
        .describe('Wait for the session to finish and return its events'),
    },
    async ({ projectPath, backendType, operation, wait }) => {
      try {
        const project = projectPath ?? deps.repoRoot;
        const backend = backendType ?? deps.detector.detect(project).backendType;
        if (!backend) {
          return errorResult('Build start', `No build files found in ${project}`);
        }

        const session = deps.dispatcher.start({ projectPath: project, backendType: backend, operation });
        if (!wait) {
          return textResult(`Build session started: ${session.id} (${backend}, status ${session.status})`);
        }

        const finished = await deps.dispatcher.waitFor(session.id);
        return textResult([
          `Session ${finished.id}: ${finished.status}`,
          ...eventLines(finished.events),
        ].join('\n'));
      } catch (err) {
        return errorResult('Build start', err);
      }
    },
  );
}
