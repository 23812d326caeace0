import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';
import { errorResult, textResult } from './results.js';

/** MCP Tool: buildmux_bookmark_add */
export function registerBookmarkAddTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'buildmux_bookmark_add',
    'Bookmark a command for later reuse',
    {
      command: z.string().min(1).describe('Command line to bookmark'),
      description: z.string().optional().default('').describe('What the command does'),
      tags: z.array(z.string()).optional().default([]).describe('Tags for filtering'),
      isFavorite: z.boolean().optional().default(false).describe('Pin to the top of the list'),
    },
    async ({ command, description, tags, isFavorite }) => {
      try {
        const bookmark = deps.store.addBookmark({ command: command.trim(), description, tags, isFavorite });
        return textResult([
          `Command bookmarked: ${bookmark.command}`,
          `  ID: ${bookmark.id}`,
        ].join('\n'));
      } catch (err) {
        return errorResult('Bookmark add', err);
      }
    },
  );
}
