import type { Command } from 'commander';
import { createMcpServer } from '../../mcp/McpServer.js';
import { startStdioTransport } from '../../mcp/transports/StdioTransport.js';
import { createRuntime } from '../runtime.js';

/**
 * 註冊 mcp 指令
 *
 * 用法：
 *   buildmux mcp [--repo-root .]
 */
export function registerMcpCommand(program: Command): void {
  program
    .command('mcp')
    .description('Start MCP server (stdio) for LLM tool integration')
    .option('--repo-root <path>', 'Repository root directory', '.')
    .action(async (opts: { repoRoot: string }) => {
      const runtime = createRuntime(opts.repoRoot);

      const server = createMcpServer({
        dispatcher: runtime.dispatcher,
        terminals: runtime.terminals,
        store: runtime.store,
        detector: runtime.detector,
        repoRoot: runtime.rootDir,
      });

      // stdio 模式：持續執行直到 stdin 關閉
      await startStdioTransport(server);
      runtime.logger.info('MCP server listening on stdio', { repoRoot: runtime.rootDir });

      const shutdown = () => {
        runtime.close();
        process.exit(0);
      };
      process.on('SIGINT', shutdown);
      process.on('SIGTERM', shutdown);
    });
}
