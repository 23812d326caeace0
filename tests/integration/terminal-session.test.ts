import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { createRuntime, type Runtime } from '../../src/cli/runtime.js';
import { collect } from '../../src/shared/AsyncChannel.js';
import { joinCommandWords } from '../../src/shared/text.js';

/**
 * Feature: 以真實 process 執行終端機指令
 *
 * shell 設成目前的 node 執行檔（shellArgs = ['-e']），指令文字就是一段 script。
 */
describe('TerminalSessionManager with real processes', () => {
  let rootDir: string;
  let runtime: Runtime;

  beforeEach(() => {
    rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'buildmux-shell-'));
    fs.mkdirSync(path.join(rootDir, 'sub'));
    runtime = createRuntime(rootDir, {
      persistent: false,
      overrides: {
        process: { shell: process.execPath, shellArgs: ['-e'] },
        terminal: { homeDir: rootDir },
        logging: { level: 'silent' },
      },
    });
  });

  afterEach(() => {
    runtime.close();
    fs.rmSync(rootDir, { recursive: true, force: true });
  });

  /**
   * Scenario: cd 之後的指令在新目錄執行
   * Given session 在 root
   * When 執行 "cd sub" 之後印出 process.cwd()
   * Then 輸出是 sub 的實際路徑
   */
  it('should run commands in the directory chosen by cd', async () => {
    const { id } = runtime.terminals.create();

    await collect(runtime.terminals.execute(id, 'cd sub'));
    const events = await collect(runtime.terminals.execute(id, 'console.log(process.cwd())'));

    expect(events.map((e) => `${e.kind}: ${e.message}`)).toEqual([
      `INFO: ${fs.realpathSync(path.join(rootDir, 'sub'))}`,
    ]);
    expect(await runtime.terminals.whenIdle(id)).toBe('SUCCEEDED');
  });

  it('should report a silent failure by exit code', async () => {
    const { id } = runtime.terminals.create();

    const events = await collect(runtime.terminals.execute(id, 'process.exit(4)'));

    expect(events.map((e) => e.message)).toEqual(['Command failed with exit code: 4']);
    expect(await runtime.terminals.whenIdle(id)).toBe('FAILED');
  });

  it('should save the transcript under the configured log directory', async () => {
    const { id } = runtime.terminals.create();

    await collect(runtime.terminals.execute(id, "console.error('fatal: not a repository')"));
    await collect(runtime.terminals.execute(id, 'clear'));
    const filePath = await runtime.terminals.saveTranscript(id);

    expect(path.dirname(filePath)).toBe(path.join(rootDir, '.buildmux', 'terminal_logs'));
    expect(path.basename(filePath)).toMatch(/^terminal_\d{8}_\d{6}\.txt$/);
    expect(fs.readFileSync(filePath, 'utf-8')).toBe('ERROR: fatal: not a repository\nCLEAR: ');
  });
});

describe('TerminalSessionManager with /bin/sh', () => {
  let rootDir: string;
  let runtime: Runtime;

  beforeEach(() => {
    rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'buildmux-sh-'));
    runtime = createRuntime(rootDir, {
      persistent: false,
      overrides: { terminal: { homeDir: rootDir }, logging: { level: 'silent' } },
    });
  });

  afterEach(() => {
    runtime.close();
    fs.rmSync(rootDir, { recursive: true, force: true });
  });

  /**
   * Scenario: exec 收到已拆開的參數
   * Given 參數中含有空白、單引號與 shell 符號
   * When 組回指令列交給 sh 執行
   * Then 每個參數仍是原本的一個字
   */
  it('should keep argument boundaries when joining command words', async () => {
    const { id } = runtime.terminals.create();
    const command = joinCommandWords(['printf', '%s|', 'a b', "it's", '$HOME']);

    const events = await collect(runtime.terminals.execute(id, command));

    expect(events.map((e) => `${e.kind}: ${e.message}`)).toEqual(["INFO: a b|it's|$HOME|"]);
    expect(await runtime.terminals.whenIdle(id)).toBe('SUCCEEDED');
  });
});
