#!/usr/bin/env node

import { Command } from 'commander';
import { errorMessage } from '../domain/errors/DomainErrors.js';
import { PACKAGE_VERSION } from '../shared/version.js';
import { registerBuildCommands } from './commands/build.js';
import { registerDetectCommand } from './commands/detect.js';
import { registerExecCommand } from './commands/exec.js';
import { registerBookmarkCommand } from './commands/bookmark.js';
import { registerHistoryCommand } from './commands/history.js';
import { registerMcpCommand } from './commands/mcp.js';

const program = new Command();

program
  .name('buildmux')
  .description('Build orchestration and terminal sessions for Gradle-, Cargo- and native-driver projects')
  .version(PACKAGE_VERSION);

registerBuildCommands(program);
registerDetectCommand(program);
registerExecCommand(program);
registerBookmarkCommand(program);
registerHistoryCommand(program);
registerMcpCommand(program);

/** 全域錯誤處理 */
program.exitOverride();

function commanderCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    const code = commanderCode(err);
    if (code === 'commander.helpDisplayed' || code === 'commander.version') {
      process.exit(0);
    }
    // commander 自己的錯誤訊息已經印過
    if (code?.startsWith('commander.')) {
      process.exit(1);
    }
    process.stderr.write(`Error: ${errorMessage(err)}\n`);
    process.exit(1);
  }
}

void main();
