import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { InvalidOperationError } from '../../src/domain/errors/DomainErrors.js';
import type { ProcessHandle, RawLine } from '../../src/domain/ports/ProcessExecutorPort.js';
import { ChildProcessExecutor } from '../../src/infrastructure/process/ChildProcessExecutor.js';
import { collect } from '../../src/shared/AsyncChannel.js';

/**
 * Feature: Process Executor
 *
 * 作為 build dispatcher，我需要啟動外部程式、逐行取得輸出並知道它如何結束。
 * 測試以目前的 node 執行檔當作子程序。
 */
describe('ChildProcessExecutor', () => {
  let workDir: string;
  const executor = new ChildProcessExecutor({ idleTimeoutMs: 0, killGraceMs: 500 });

  const node = (script: string) => [process.execPath, '-e', script];
  const run = async (handle: ProcessHandle) => {
    const lines = await collect(handle.lines);
    return { lines, exit: await handle.exit };
  };
  const texts = (lines: RawLine[], source: RawLine['source']) =>
    lines.filter((l) => l.source === source).map((l) => l.text);

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'buildmux-exec-'));
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it('should deliver stdout lines in order and tag stderr', async () => {
    const handle = executor.spawn({
      cwd: workDir,
      argv: node("for (let i = 1; i <= 5; i++) console.log('line ' + i); console.error('warning: careful');"),
    });

    const { lines, exit } = await run(handle);

    expect(texts(lines, 'stdout')).toEqual(['line 1', 'line 2', 'line 3', 'line 4', 'line 5']);
    expect(texts(lines, 'stderr')).toEqual(['warning: careful']);
    expect(exit).toEqual({ kind: 'exited', code: 0, signal: null, timedOut: false, killed: false });
    expect(handle.alive).toBe(false);
  });

  it('should flush a final line without newline', async () => {
    const { lines } = await run(executor.spawn({ cwd: workDir, argv: node("process.stdout.write('no newline')") }));
    expect(lines).toEqual([{ source: 'stdout', text: 'no newline' }]);
  });

  it('should report the exit code', async () => {
    const { exit } = await run(executor.spawn({ cwd: workDir, argv: node('process.exit(3)') }));
    expect(exit).toMatchObject({ kind: 'exited', code: 3 });
  });

  it('should run in the requested directory with extra environment', async () => {
    const { lines } = await run(executor.spawn({
      cwd: workDir,
      argv: node('console.log(process.cwd()); console.log(process.env.BUILDMUX_TEST_VALUE)'),
      env: { BUILDMUX_TEST_VALUE: 'test-value' },
    }));

    expect(texts(lines, 'stdout')).toEqual([fs.realpathSync(workDir), 'test-value']);
  });

  /**
   * Scenario: idle timeout
   * Given 一個不再輸出的程式
   * When 超過 idle timeout
   * Then process 被終止，結果標記 timedOut
   */
  it('should kill a silent process after the idle timeout', async () => {
    const handle = executor.spawn({
      cwd: workDir,
      argv: node("console.log('started'); setTimeout(() => {}, 30000)"),
      idleTimeoutMs: 1500,
    });

    const { lines, exit } = await run(handle);

    expect(texts(lines, 'stdout')).toEqual(['started']);
    expect(exit).toMatchObject({ kind: 'exited', timedOut: true, killed: true, signal: 'SIGTERM' });
  });

  it('should deliver a partial line when the idle timeout fires', async () => {
    const handle = executor.spawn({
      cwd: workDir,
      argv: node("process.stdout.write('downloading 50%'); setTimeout(() => {}, 30000)"),
      idleTimeoutMs: 1500,
    });

    const { lines, exit } = await run(handle);

    expect(lines).toEqual([{ source: 'stdout', text: 'downloading 50%' }]);
    expect(exit).toMatchObject({ kind: 'exited', timedOut: true, killed: true });
  });

  /**
   * Scenario: kill 時仍有未換行的輸出
   * Given 程式已輸出一行完整內容與一段沒有換行的進度
   * When 在收到完整那一行後 kill
   * Then 那段進度仍會在串流結束前送出
   */
  it('should deliver a partial line received before kill', async () => {
    const handle = executor.spawn({
      cwd: workDir,
      argv: node("process.stdout.write('ready\\ndownloading 50%'); setTimeout(() => {}, 30000)"),
    });
    const iterator = handle.lines[Symbol.asyncIterator]();

    expect(await iterator.next()).toEqual({ value: { source: 'stdout', text: 'ready' }, done: false });
    expect(handle.kill()).toBe(true);

    const rest: RawLine[] = [];
    for (let result = await iterator.next(); !result.done; result = await iterator.next()) {
      rest.push(result.value);
    }
    expect(rest).toEqual([{ source: 'stdout', text: 'downloading 50%' }]);
    expect(await handle.exit).toMatchObject({ kind: 'exited', killed: true, timedOut: false });
  });

  it('should make kill idempotent', async () => {
    const handle = executor.spawn({ cwd: workDir, argv: node('setTimeout(() => {}, 30000)') });

    expect(handle.kill()).toBe(true);
    expect(handle.kill()).toBe(false);
    const { exit } = await run(handle);

    expect(exit).toMatchObject({ kind: 'exited', killed: true, timedOut: false });
    expect(handle.kill()).toBe(false);
  });

  it('should resolve a missing executable as a spawn failure', async () => {
    const handle = executor.spawn({ cwd: workDir, argv: ['buildmux-no-such-binary'] });

    const { lines, exit } = await run(handle);

    expect(lines).toEqual([]);
    expect(exit.kind).toBe('spawnFailed');
    if (exit.kind === 'spawnFailed') {
      expect(exit.error.code).toBe('SPAWN_FAILED');
      expect(exit.error.message).toBe('Failed to start "buildmux-no-such-binary": spawn buildmux-no-such-binary ENOENT');
    }
  });

  it('should reject a missing working directory before spawning', () => {
    expect(() => executor.spawn({ cwd: path.join(workDir, 'missing'), argv: node('') }))
      .toThrow(InvalidOperationError);
    expect(() => executor.spawn({ cwd: workDir, argv: [] }))
      .toThrow('Cannot spawn a process with an empty argument vector');
  });
});
