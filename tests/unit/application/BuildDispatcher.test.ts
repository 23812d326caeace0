import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { BuildDispatcher } from '../../../src/application/BuildDispatcher.js';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import type { OutputEvent } from '../../../src/domain/entities/OutputEvent.js';
import {
  InvalidOperationError,
  SessionBusyError,
  SessionNotFoundError,
} from '../../../src/domain/errors/DomainErrors.js';
import type { ArtifactLocatorPort, LocatedArtifact } from '../../../src/domain/ports/ArtifactLocatorPort.js';
import { BackendRegistry } from '../../../src/infrastructure/backends/BackendRegistry.js';
import { ManagedBuildToolAdapter } from '../../../src/infrastructure/backends/ManagedBuildToolAdapter.js';
import { NativeDriverAdapter } from '../../../src/infrastructure/backends/NativeDriverAdapter.js';
import { PackageManagerAdapter } from '../../../src/infrastructure/backends/PackageManagerAdapter.js';
import { OutputClassifier } from '../../../src/infrastructure/classification/OutputClassifier.js';
import { collect } from '../../../src/shared/AsyncChannel.js';
import { FakeProcessExecutor, err, out } from '../../helpers/FakeProcessExecutor.js';

/**
 * Feature: Build Dispatcher
 *
 * 作為 IDE 的建置面板，我需要啟動、追蹤與取消 build session，
 * 並取得依工具鏈分類過的輸出事件。
 */

function createLocator(artifacts: LocatedArtifact[] = []): ArtifactLocatorPort & { calls: string[][] } {
  const calls: string[][] = [];
  return {
    calls,
    locate: vi.fn((dirs: readonly string[]) => {
      calls.push([...dirs]);
      return artifacts;
    }),
  };
}

const summaryOf = (events: readonly OutputEvent[]) => events.map((e) => `${e.kind}: ${e.message}`);

describe('BuildDispatcher', () => {
  let projectDir: string;
  let executor: FakeProcessExecutor;
  let managed: ManagedBuildToolAdapter;
  let native: NativeDriverAdapter;
  let locator: ReturnType<typeof createLocator>;
  let dispatcher: BuildDispatcher;

  function createDispatcher(artifacts: LocatedArtifact[] = []): BuildDispatcher {
    let counter = 0;
    locator = createLocator(artifacts);
    return new BuildDispatcher(
      executor,
      new BackendRegistry({
        managed,
        packageManager: new PackageManagerAdapter(DEFAULT_CONFIG.backends.packageManager),
        native,
      }),
      new OutputClassifier(),
      locator,
      { idleTimeoutMs: 1000, idGenerator: () => `build-${++counter}` },
    );
  }

  beforeEach(() => {
    projectDir = fs.mkdtempSync(path.join(os.tmpdir(), 'buildmux-dispatch-'));
    executor = new FakeProcessExecutor();
    managed = new ManagedBuildToolAdapter(DEFAULT_CONFIG.backends.managed);
    native = new NativeDriverAdapter(DEFAULT_CONFIG.backends.native);
    dispatcher = createDispatcher();
  });

  afterEach(() => {
    fs.rmSync(projectDir, { recursive: true, force: true });
  });

  describe('managed build tool', () => {
    /**
     * Scenario: 建置成功
     * Given 工具鏈最後一行輸出 "BUILD SUCCESSFUL in 2s" 且 exit code 0
     * When 以 MANAGED_BUILD_TOOL 執行 build
     * Then session 為 SUCCEEDED，且該行恰好產生一個 SUCCESS 事件
     */
    it('should succeed with exactly one SUCCESS event for the success line', async () => {
      executor.enqueue({
        lines: [out('> Task :app:compileDebugKotlin'), out('BUILD SUCCESSFUL in 2s')],
        exitCode: 0,
      });

      const started = dispatcher.start({
        projectPath: projectDir,
        backendType: 'MANAGED_BUILD_TOOL',
        operation: { type: 'build' },
      });
      expect(started.status).toBe('RUNNING');

      const session = await dispatcher.waitFor(started.id);

      expect(session.status).toBe('SUCCEEDED');
      expect(session.completedAt).toBeTypeOf('number');
      expect(session.events.filter((e) => e.kind === 'SUCCESS')).toHaveLength(1);
      expect(summaryOf(session.events)).toEqual([
        'INFO: Running: gradle assembleDebug --console=plain',
        'TASK: > Task :app:compileDebugKotlin',
        'SUCCESS: BUILD SUCCESSFUL in 2s',
        'INFO: BUILD SUCCEEDED',
      ]);
      const task = session.events[1];
      expect(task.kind === 'TASK' ? task.taskName : undefined).toBe(':app:compileDebugKotlin');
    });

    /**
     * Scenario: exit code 0 但有分類出的錯誤
     * Given 工具鏈輸出 Kotlin 編譯錯誤但 exit code 為 0
     * Then session 為 FAILED，最終事件帶有彙整的 structuredErrors
     */
    it('should fail when an ERROR event was classified despite exit code 0', async () => {
      executor.enqueue({
        lines: [out('e: file:///src/Main.kt:3:5 Unresolved reference: foo')],
        exitCode: 0,
      });

      const { id } = dispatcher.start({
        projectPath: projectDir,
        backendType: 'MANAGED_BUILD_TOOL',
        operation: { type: 'build' },
      });
      const session = await dispatcher.waitFor(id);

      expect(session.status).toBe('FAILED');
      const last = session.events[session.events.length - 1];
      expect(last.kind).toBe('ERROR');
      expect(last.message).toBe('BUILD FAILED');
      expect(last.structuredErrors).toEqual(['Error in /src/Main.kt at line 3: Unresolved reference: foo']);
    });

    it('should emit ARTIFACT events for located outputs after success', async () => {
      dispatcher = createDispatcher([{ path: '/out/app-debug.apk', sizeBytes: 1536 }]);
      executor.enqueue({ lines: [out('BUILD SUCCESSFUL in 1s')], exitCode: 0 });

      const { id } = dispatcher.start({
        projectPath: projectDir,
        backendType: 'MANAGED_BUILD_TOOL',
        operation: { type: 'build' },
      });
      const session = await dispatcher.waitFor(id);

      const artifact = session.events.find((e) => e.kind === 'ARTIFACT');
      expect(artifact?.message).toBe('Generated: app-debug.apk (1.5 KB)');
      expect(artifact?.kind === 'ARTIFACT' ? artifact.path : undefined).toBe('/out/app-debug.apk');
      expect(locator.calls).toEqual([managed.artifactDirs(projectDir, { type: 'build' })]);
    });

    it('should not look for artifacts after clean', async () => {
      executor.enqueue({ lines: [out('BUILD SUCCESSFUL in 1s')], exitCode: 0 });

      const { id } = dispatcher.start({
        projectPath: projectDir,
        backendType: 'MANAGED_BUILD_TOOL',
        operation: { type: 'clean' },
      });
      await dispatcher.waitFor(id);

      expect(locator.calls).toEqual([]);
    });
  });

  describe('package manager', () => {
    /**
     * Scenario: 編譯錯誤
     * Given 工具鏈輸出 "error[E0001]: mismatched types" 後以非零結束
     * Then session 為 FAILED，且至少一個 ERROR 事件包含該錯誤文字
     */
    it('should fail with the compiler error as an ERROR event', async () => {
      executor.enqueue({
        lines: [err('   Compiling demo v0.1.0 (/tmp/demo)'), err('error[E0001]: mismatched types')],
        exitCode: 101,
      });

      const { id } = dispatcher.start({
        projectPath: projectDir,
        backendType: 'PACKAGE_MANAGER',
        operation: { type: 'build' },
      });
      const session = await dispatcher.waitFor(id);

      expect(session.status).toBe('FAILED');
      expect(session.events.some((e) => e.kind === 'ERROR' && e.message.includes('error[E0001]: mismatched types')))
        .toBe(true);
      expect(summaryOf(session.events).slice(-2)).toEqual([
        'ERROR: Package manager exited with code 101',
        'ERROR: BUILD FAILED',
      ]);
    });

    it('should pass adapter and request environment to the process', async () => {
      const { id } = dispatcher.start({
        projectPath: projectDir,
        backendType: 'PACKAGE_MANAGER',
        operation: { type: 'addDependency', name: 'serde', version: '1.0' },
        env: { CARGO_HOME: '/opt/cargo' },
      });
      await dispatcher.waitFor(id);

      expect(executor.requests[0].argv).toEqual(['cargo', 'add', 'serde@1.0']);
      expect(executor.requests[0].env).toEqual({ CARGO_TERM_COLOR: 'never', CARGO_HOME: '/opt/cargo' });
      expect(executor.requests[0].idleTimeoutMs).toBe(1000);
    });
  });

  describe('failures', () => {
    it('should report an idle timeout as FAILED with a timeout message', async () => {
      executor.enqueue({ lines: [out('Compiling')], hold: true });

      const { id } = dispatcher.start({
        projectPath: projectDir,
        backendType: 'MANAGED_BUILD_TOOL',
        operation: { type: 'build' },
      });
      executor.lastHandle().exitWith(null, { timedOut: true, signal: 'SIGTERM' });
      const session = await dispatcher.waitFor(id);

      expect(session.status).toBe('FAILED');
      expect(summaryOf(session.events)).toContain('ERROR: Process timed out after 1000ms without output');
    });

    it('should report a spawn failure as FAILED', async () => {
      executor.enqueue({ spawnError: 'spawn gradle ENOENT' });

      const { id } = dispatcher.start({
        projectPath: projectDir,
        backendType: 'MANAGED_BUILD_TOOL',
        operation: { type: 'build' },
      });
      const session = await dispatcher.waitFor(id);

      expect(session.status).toBe('FAILED');
      expect(summaryOf(session.events)).toContain('ERROR: Failed to start "gradle": spawn gradle ENOENT');
    });

    it('should reject unsupported operations before spawning', () => {
      expect(() => dispatcher.start({
        projectPath: projectDir,
        backendType: 'MANAGED_BUILD_TOOL',
        operation: { type: 'addDependency', name: 'okhttp' },
      })).toThrow(InvalidOperationError);

      expect(() => dispatcher.start({
        projectPath: projectDir,
        backendType: 'HYBRID',
        operation: { type: 'crossTargetBuild', target: 'aarch64-linux-android' },
      })).toThrow(InvalidOperationError);

      expect(executor.spawnCount).toBe(0);
      expect(dispatcher.list()).toEqual([]);
    });

    it('should reject a missing project directory', () => {
      expect(() => dispatcher.start({
        projectPath: path.join(projectDir, 'missing'),
        backendType: 'PACKAGE_MANAGER',
        operation: { type: 'build' },
      })).toThrow('Project directory does not exist');
    });
  });

  describe('HYBRID', () => {
    /**
     * Scenario: 第一階段失敗
     * Given native driver 階段以非零結束
     * Then managed build tool 階段從未被規劃或啟動
     */
    it('should never plan or spawn stage two when stage one fails', async () => {
      const planSpy = vi.spyOn(managed, 'plan');
      executor.enqueue({ lines: [err('error: linker failed')], exitCode: 1 });

      const { id } = dispatcher.start({
        projectPath: projectDir,
        backendType: 'HYBRID',
        operation: { type: 'build' },
      });
      const session = await dispatcher.waitFor(id);

      expect(session.status).toBe('FAILED');
      expect(executor.spawnCount).toBe(1);
      expect(planSpy).not.toHaveBeenCalled();
      expect(summaryOf(session.events)).toEqual([
        'TASK: Stage 1/2: Native driver',
        'INFO: Running: native-build build debug',
        'ERROR: error: linker failed',
        'ERROR: Native driver exited with code 1',
        'ERROR: Stage "Native driver" failed; skipping stage "Managed build tool"',
        'ERROR: BUILD FAILED',
      ]);
    });

    it('should run the managed stage after the native stage succeeds', async () => {
      executor.enqueue(
        { lines: [out('Build succeeded')], exitCode: 0 },
        { lines: [out('BUILD SUCCESSFUL in 3s')], exitCode: 0 },
      );

      const { id } = dispatcher.start({
        projectPath: projectDir,
        backendType: 'HYBRID',
        operation: { type: 'build', release: true },
      });
      const session = await dispatcher.waitFor(id);

      expect(session.status).toBe('SUCCEEDED');
      expect(executor.requests.map((r) => r.argv)).toEqual([
        ['native-build', 'build', 'release'],
        ['gradle', 'assembleRelease', '--console=plain'],
      ]);
      expect(summaryOf(session.events)).toContain('TASK: Stage 2/2: Managed build tool');
    });
  });

  describe('cancellation', () => {
    /**
     * Scenario: 取消執行中的 build
     * Given 一個 RUNNING 的 session，已有兩行緩衝輸出
     * When cancel 之後 process 又輸出一行
     * Then 狀態為 CANCELLED，只有緩衝的行被分類
     */
    it('should end CANCELLED and classify nothing produced after the kill', async () => {
      executor.enqueue({ hold: true });
      const { id } = dispatcher.start({
        projectPath: projectDir,
        backendType: 'PACKAGE_MANAGER',
        operation: { type: 'build' },
      });
      const handle = executor.lastHandle();

      handle.emit(err('   Compiling alpha v0.1.0'), err('   Compiling beta v0.1.0'));
      expect(dispatcher.cancel(id)).toBe(true);
      handle.emit(err('   Compiling gamma v0.1.0'));

      const session = await dispatcher.waitFor(id);

      expect(session.status).toBe('CANCELLED');
      expect(summaryOf(session.events)).toEqual([
        'INFO: Running: cargo build',
        'TASK:    Compiling alpha v0.1.0',
        'TASK:    Compiling beta v0.1.0',
        'INFO: BUILD CANCELLED',
      ]);
      expect(handle.killCount).toBe(1);
    });

    it('should discard the queued second HYBRID stage', async () => {
      executor.enqueue({ hold: true });
      const { id } = dispatcher.start({
        projectPath: projectDir,
        backendType: 'HYBRID',
        operation: { type: 'build' },
      });

      dispatcher.cancel(id);
      const session = await dispatcher.waitFor(id);

      expect(session.status).toBe('CANCELLED');
      expect(executor.spawnCount).toBe(1);
    });

    it('should return false when cancelling a finished session', async () => {
      const { id } = dispatcher.start({
        projectPath: projectDir,
        backendType: 'PACKAGE_MANAGER',
        operation: { type: 'clean' },
      });
      await dispatcher.waitFor(id);

      expect(dispatcher.cancel(id)).toBe(false);
      expect(dispatcher.get(id)?.status).toBe('SUCCEEDED');
    });

    it('should throw SessionNotFoundError for unknown ids', () => {
      expect(() => dispatcher.cancel('nope')).toThrow(SessionNotFoundError);
    });
  });

  describe('one live session per project', () => {
    it('should reject concurrent starts for the same project path', async () => {
      executor.enqueue({ hold: true });
      const attempts = Array.from({ length: 5 }, () => {
        try {
          return dispatcher.start({
            projectPath: projectDir,
            backendType: 'PACKAGE_MANAGER',
            operation: { type: 'build' },
          });
        } catch (e) {
          return e;
        }
      });

      expect(attempts.filter((a) => a instanceof SessionBusyError)).toHaveLength(4);
      expect(executor.spawnCount).toBe(1);

      executor.lastHandle().exitWith(0);
      await dispatcher.waitFor('build-1');

      const next = dispatcher.start({
        projectPath: projectDir,
        backendType: 'PACKAGE_MANAGER',
        operation: { type: 'build' },
      });
      expect(next.id).toBe('build-2');
    });

    it('should only clear finished sessions', async () => {
      executor.enqueue({ hold: true });
      const { id } = dispatcher.start({
        projectPath: projectDir,
        backendType: 'PACKAGE_MANAGER',
        operation: { type: 'build' },
      });

      expect(() => dispatcher.clear(id)).toThrow(SessionBusyError);

      executor.lastHandle().exitWith(0);
      await dispatcher.waitFor(id);

      expect(dispatcher.clear(id)).toBe(true);
      expect(dispatcher.get(id)).toBeUndefined();
    });
  });

  describe('events()', () => {
    it('should replay recorded events and follow live ones until the session ends', async () => {
      executor.enqueue({ hold: true });
      const { id } = dispatcher.start({
        projectPath: projectDir,
        backendType: 'PACKAGE_MANAGER',
        operation: { type: 'test' },
      });

      const collected = collect(dispatcher.events(id));
      const handle = executor.lastHandle();
      handle.emit(out('test result: ok. 3 passed; 0 failed'));
      handle.exitWith(0);

      const events = await collected;
      const session = await dispatcher.waitFor(id);
      expect(events).toEqual(session.events);
      expect(summaryOf(events)).toEqual([
        'INFO: Running: cargo test',
        'SUCCESS: test result: ok. 3 passed; 0 failed',
        'INFO: BUILD SUCCEEDED',
      ]);
    });

    it('should stop following when the signal aborts', async () => {
      executor.enqueue({ hold: true });
      const { id } = dispatcher.start({
        projectPath: projectDir,
        backendType: 'PACKAGE_MANAGER',
        operation: { type: 'build' },
      });
      const controller = new AbortController();

      const collected = collect(dispatcher.events(id, controller.signal));
      controller.abort();

      expect(summaryOf(await collected)).toEqual(['INFO: Running: cargo build']);
      expect(dispatcher.get(id)?.status).toBe('RUNNING');

      executor.lastHandle().exitWith(0);
      await dispatcher.waitFor(id);
    });

    /**
     * Scenario: 同一個 AbortSignal 跨多次 build 重複使用
     * Given 以 signal 訂閱的 session 正常結束，或 consumer 提前 break
     * When 訂閱結束
     * Then signal 上的 abort listener 被移除
     */
    it('should remove its abort listener when following ends', async () => {
      const controller = new AbortController();
      const added = vi.spyOn(controller.signal, 'addEventListener');
      const removed = vi.spyOn(controller.signal, 'removeEventListener');

      executor.enqueue({ hold: true });
      const first = dispatcher.start({
        projectPath: projectDir,
        backendType: 'PACKAGE_MANAGER',
        operation: { type: 'build' },
      });
      const collected = collect(dispatcher.events(first.id, controller.signal));
      executor.lastHandle().exitWith(0);
      await collected;

      executor.enqueue({ hold: true });
      const second = dispatcher.start({
        projectPath: projectDir,
        backendType: 'PACKAGE_MANAGER',
        operation: { type: 'build' },
      });
      for await (const event of dispatcher.events(second.id, controller.signal)) {
        if (event.kind === 'INFO') break;
      }
      executor.lastHandle().exitWith(0);
      await dispatcher.waitFor(second.id);

      expect(added).toHaveBeenCalledTimes(2);
      expect(removed).toHaveBeenCalledTimes(2);
      expect(removed.mock.calls.map((call) => call[0])).toEqual(['abort', 'abort']);
      expect(removed.mock.calls.map((call) => call[1])).toEqual(added.mock.calls.map((call) => call[1]));
    });

    it('should replay everything for a finished session', async () => {
      const { id } = dispatcher.start({
        projectPath: projectDir,
        backendType: 'PACKAGE_MANAGER',
        operation: { type: 'clean' },
      });
      const session = await dispatcher.waitFor(id);

      expect(await collect(dispatcher.events(id))).toEqual(session.events);
    });
  });
});
