import { McpServer as SDKMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { BuildDispatcher } from '../application/BuildDispatcher.js';
import type { ProjectDetector } from '../application/ProjectDetector.js';
import type { TerminalSessionManager } from '../application/TerminalSessionManager.js';
import type { CommandStorePort } from '../domain/ports/CommandStorePort.js';
import { PACKAGE_VERSION } from '../shared/version.js';
import { registerBuildStartTool } from './tools/BuildStartTool.js';
import { registerBuildStatusTool } from './tools/BuildStatusTool.js';
import { registerBuildCancelTool } from './tools/BuildCancelTool.js';
import { registerBuildListTool } from './tools/BuildListTool.js';
import { registerTerminalCreateTool } from './tools/TerminalCreateTool.js';
import { registerTerminalExecuteTool } from './tools/TerminalExecuteTool.js';
import { registerTerminalCloseTool } from './tools/TerminalCloseTool.js';
import { registerBookmarkAddTool } from './tools/BookmarkAddTool.js';
import { registerBookmarkListTool } from './tools/BookmarkListTool.js';
import { registerDetectProjectTool } from './tools/DetectProjectTool.js';


/**
 * MCP Server Factory
 *
 * 建立 MCP server 實例並註冊所有工具；工具與 CLI 指令一一對應。
 */
export interface McpDependencies {
  dispatcher: BuildDispatcher;
  terminals: TerminalSessionManager;
  store: CommandStorePort;
  detector: ProjectDetector;
  repoRoot: string;
}

export function createMcpServer(deps: McpDependencies): SDKMcpServer {
  const server = new SDKMcpServer(
    { name: 'buildmux', version: PACKAGE_VERSION },
    { instructions: buildInstructions(deps.repoRoot) },
  );

  // === Build sessions ===
  registerBuildStartTool(server, deps);
  registerBuildStatusTool(server, deps);
  registerBuildCancelTool(server, deps);
  registerBuildListTool(server, deps);
  registerDetectProjectTool(server, deps);

  // === Terminal sessions ===
  registerTerminalCreateTool(server, deps);
  registerTerminalExecuteTool(server, deps);
  registerTerminalCloseTool(server, deps);

  // === Bookmarks ===
  registerBookmarkAddTool(server, deps);
  registerBookmarkListTool(server, deps);

  return server;
}

/** 建構 MCP server 的 instructions 文字 */
export function buildInstructions(repoRoot: string): string {
  return [
    'buildmux: build orchestration and terminal sessions for Gradle-, Cargo- and native-driver projects.',
    '',
    'Available tools:',
    '',
    '## Builds',
    '- buildmux_detect_project: Detect the backend from build files',
    '- buildmux_build_start: Start build / clean / test / dependency operations',
    '- buildmux_build_status: Session status and recent classified events',
    '- buildmux_build_cancel: Cancel a running session',
    '- buildmux_build_list: List sessions',
    '',
    '## Terminal',
    '- buildmux_terminal_create: Create a session (own cwd, env and history)',
    '- buildmux_terminal_execute: Run a command; cd / clear / help are built in',
    '- buildmux_terminal_close: Close a session, optionally saving its transcript',
    '',
    '## Bookmarks',
    '- buildmux_bookmark_add: Save a command for reuse',
    '- buildmux_bookmark_list: List saved commands',
    '',
    'Event lines have the form "<KIND>: <message>" where KIND is one of',
    'INFO, ERROR, WARNING, SUCCESS, TASK, ARTIFACT or CLEAR.',
    'A project path allows one running build session at a time.',
    '',
    `Repository root: ${repoRoot}`,
  ].join('\n');
}
