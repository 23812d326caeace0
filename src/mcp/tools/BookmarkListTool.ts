import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';
import { textResult } from './results.js';

/** MCP Tool: buildmux_bookmark_list */
export function registerBookmarkListTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'buildmux_bookmark_list',
    'List bookmarked commands, favorites and most used first',
    {
      favoritesOnly: z.boolean().optional().describe('Only favorites'),
      tag: z.string().optional().describe('Only bookmarks with this tag'),
    },
    async ({ favoritesOnly, tag }) => {
      const bookmarks = deps.store.listBookmarks({ favoritesOnly, tag });
      const lines = [`Found ${bookmarks.length} bookmark(s)`];
      for (const b of bookmarks) {
        const star = b.isFavorite ? '★ ' : '';
        const tags = b.tags.length > 0 ? `  [${b.tags.join(', ')}]` : '';
        lines.push(`- ${star}${b.id}  ${b.command}  (used ${b.useCount}x)${tags}`);
        if (b.description) lines.push(`    ${b.description}`);
      }
      return textResult(lines.join('\n'));
    },
  );
}
