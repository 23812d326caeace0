import { randomUUID } from 'node:crypto';
import path from 'node:path';
import {
  artifactEvent,
  messageEvent,
  taskEvent,
  type OutputEvent,
} from '../domain/entities/OutputEvent.js';
import { isTerminalStatus, type BuildSession, type BuildStatus } from '../domain/entities/BuildSession.js';
import {
  errorMessage,
  HybridStageFailure,
  InvalidOperationError,
  SessionBusyError,
  SessionNotFoundError,
  TimeoutError,
} from '../domain/errors/DomainErrors.js';
import type { ArtifactLocatorPort } from '../domain/ports/ArtifactLocatorPort.js';
import type { BackendAdapter, Invocation } from '../domain/ports/BackendAdapterPort.js';
import type { ProcessExecutorPort, ProcessHandle } from '../domain/ports/ProcessExecutorPort.js';
import type { BackendType } from '../domain/value-objects/BackendType.js';
import { describeOperation, type BuildOperation } from '../domain/value-objects/BuildOperation.js';
import type { BackendRegistry } from '../infrastructure/backends/BackendRegistry.js';
import type { OutputClassifier } from '../infrastructure/classification/OutputClassifier.js';
import { StreamClassifier } from '../infrastructure/classification/StreamClassifier.js';
import { AsyncChannel } from '../shared/AsyncChannel.js';
import { createDeferred } from '../shared/Deferred.js';
import { silentLogger, type Logger } from '../shared/Logger.js';
import { isDirectory } from '../shared/paths.js';
import { formatBytes } from '../shared/text.js';

export interface StartBuildRequest {
  projectPath: string;
  backendType: BackendType;
  operation: BuildOperation;
  /** 附加在 adapter 環境變數之上 */
  env?: Readonly<Record<string, string>>;
}

export interface BuildDispatcherOptions {
  idleTimeoutMs: number;
  logger?: Logger;
  idGenerator?: () => string;
}

type StageResult = 'succeeded' | 'failed' | 'cancelled';

interface BuildSessionState {
  session: Omit<BuildSession, 'events'>;
  events: OutputEvent[];
  errors: string[];
  warnings: string[];
  /** 訂閱者與其清除函式（移除 AbortSignal listener） */
  subscribers: Map<AsyncChannel<OutputEvent>, () => void>;
  handle?: ProcessHandle;
  cancelRequested: boolean;
  done: Promise<BuildSession>;
}

/**
 * Build Dispatcher：build session 的登錄處與狀態機
 *
 * IDLE → RUNNING（spawn）→ SUCCEEDED | FAILED | CANCELLED。
 * 同一個專案路徑同時最多一個未結束的 session。
 * process 層級的失敗不會以例外拋出，而是轉成 ERROR 事件加上 FAILED。
 */
export class BuildDispatcher {
  private readonly sessions = new Map<string, BuildSessionState>();
  private readonly logger: Logger;
  private readonly nextId: () => string;

  constructor(
    private readonly executor: ProcessExecutorPort,
    private readonly registry: BackendRegistry,
    private readonly classifier: OutputClassifier,
    private readonly artifacts: ArtifactLocatorPort,
    private readonly options: BuildDispatcherOptions,
  ) {
    this.logger = options.logger ?? silentLogger;
    this.nextId = options.idGenerator ?? randomUUID;
  }

  /**
   * 驗證並啟動 session；第一個 process 在回傳前已 spawn
   *
   * 不支援的操作拋出 InvalidOperationError，
   * 同專案已有執行中的 session 時拋出 SessionBusyError，兩者都不會 spawn。
   */
  start(request: StartBuildRequest): BuildSession {
    const projectPath = path.resolve(request.projectPath);
    if (!isDirectory(projectPath)) {
      throw new InvalidOperationError(`Project directory does not exist: ${projectPath}`);
    }

    const stages = this.registry.resolve(request.backendType, request.operation.type);
    const firstInvocation = stages[0].plan(projectPath, request.operation);

    const live = this.findLive(projectPath);
    if (live) throw new SessionBusyError(live.session.id);

    const deferred = createDeferred<BuildSession>();
    const state: BuildSessionState = {
      session: {
        id: this.nextId(),
        projectPath,
        backendType: request.backendType,
        operation: request.operation,
        status: 'IDLE',
        startedAt: Date.now(),
      },
      events: [],
      errors: [],
      warnings: [],
      subscribers: new Map(),
      cancelRequested: false,
      done: deferred.promise,
    };
    this.sessions.set(state.session.id, state);

    this.logger.info('Build session started', {
      sessionId: state.session.id,
      projectPath,
      backendType: request.backendType,
      operation: describeOperation(request.operation),
    });

    void this.run(state, stages, firstInvocation, request.env ?? {}).then(deferred.resolve, (err: unknown) => {
      this.logger.error('Build session crashed', { sessionId: state.session.id, error: errorMessage(err) });
      deferred.resolve(this.snapshot(state));
    });
    return this.snapshot(state);
  }

  get(sessionId: string): BuildSession | undefined {
    const state = this.sessions.get(sessionId);
    return state ? this.snapshot(state) : undefined;
  }

  list(): BuildSession[] {
    return [...this.sessions.values()].map((state) => this.snapshot(state));
  }

  /** 等到 session 進入終態 */
  waitFor(sessionId: string): Promise<BuildSession> {
    return this.require(sessionId).done;
  }

  /**
   * 取消執行中的 session
   *
   * 已結束的 session 回傳 false；HYBRID 尚未開始的第二階段會被丟棄。
   */
  cancel(sessionId: string): boolean {
    const state = this.require(sessionId);
    if (isTerminalStatus(state.session.status) || state.cancelRequested) return false;

    state.cancelRequested = true;
    state.handle?.kill();
    this.logger.info('Build session cancel requested', { sessionId });
    return true;
  }

  cancelAll(): void {
    for (const state of this.sessions.values()) {
      if (!isTerminalStatus(state.session.status)) this.cancel(state.session.id);
    }
  }

  /** 只能清除已結束的 session */
  clear(sessionId: string): boolean {
    const state = this.require(sessionId);
    if (!isTerminalStatus(state.session.status)) {
      throw new SessionBusyError(sessionId);
    }
    return this.sessions.delete(sessionId);
  }

  /**
   * 事件串流：先重播已記錄的事件，再跟隨新事件直到 session 結束
   *
   * 可用 break / return() 或 AbortSignal 提前停止，不影響 session 本身。
   */
  events(sessionId: string, signal?: AbortSignal): AsyncIterable<OutputEvent> {
    const state = this.require(sessionId);
    const channel: AsyncChannel<OutputEvent> = new AsyncChannel({
      onReturn: () => this.unsubscribe(state, channel),
    });

    for (const event of state.events) channel.push(event);
    if (isTerminalStatus(state.session.status) || signal?.aborted) {
      channel.close();
      return channel;
    }

    const stop = () => {
      this.unsubscribe(state, channel);
      channel.close();
    };
    signal?.addEventListener('abort', stop, { once: true });
    state.subscribers.set(channel, () => signal?.removeEventListener('abort', stop));
    return channel;
  }

  private unsubscribe(state: BuildSessionState, channel: AsyncChannel<OutputEvent>): void {
    state.subscribers.get(channel)?.();
    state.subscribers.delete(channel);
  }

  // --- 執行 ---

  private async run(
    state: BuildSessionState,
    stages: BackendAdapter[],
    firstInvocation: Invocation,
    env: Readonly<Record<string, string>>,
  ): Promise<BuildSession> {
    const { projectPath, operation } = state.session;
    try {
      for (let i = 0; i < stages.length; i++) {
        const adapter = stages[i];
        if (state.cancelRequested) return this.finish(state, 'CANCELLED');

        // 第二階段在第一階段成功後才規劃
        const invocation = i === 0 ? firstInvocation : adapter.plan(projectPath, operation);
        if (stages.length > 1) {
          this.emit(state, taskEvent(`Stage ${i + 1}/${stages.length}: ${adapter.displayName}`, adapter.displayName));
        }

        const result = await this.runStage(state, adapter, invocation, env);
        if (result === 'cancelled') return this.finish(state, 'CANCELLED');
        if (result === 'failed') {
          const skipped = stages[i + 1];
          if (skipped) {
            this.emit(state, messageEvent('ERROR', new HybridStageFailure(adapter.displayName, skipped.displayName).message));
          }
          return this.finish(state, 'FAILED');
        }
      }

      if (state.cancelRequested) return this.finish(state, 'CANCELLED');
      this.emitArtifacts(state, stages[stages.length - 1]);
      return this.finish(state, 'SUCCEEDED');
    } catch (err) {
      this.logger.error('Build session crashed', { sessionId: state.session.id, error: errorMessage(err) });
      this.emit(state, messageEvent('ERROR', errorMessage(err)));
      return this.finish(state, 'FAILED');
    }
  }

  private async runStage(
    state: BuildSessionState,
    adapter: BackendAdapter,
    invocation: Invocation,
    env: Readonly<Record<string, string>>,
  ): Promise<StageResult> {
    const handle = this.executor.spawn({
      cwd: invocation.cwd,
      argv: invocation.argv,
      env: { ...invocation.env, ...env },
      idleTimeoutMs: this.options.idleTimeoutMs,
    });
    state.handle = handle;
    this.setStatus(state, 'RUNNING');
    this.emit(state, messageEvent('INFO', `Running: ${invocation.argv.join(' ')}`));

    const stream = new StreamClassifier(this.classifier, adapter.family);
    for await (const line of handle.lines) {
      this.emit(state, stream.next(line));
    }
    const exit = await handle.exit;
    state.handle = undefined;

    if (exit.kind === 'spawnFailed') {
      this.emit(state, messageEvent('ERROR', exit.error.message));
      return 'failed';
    }
    if (state.cancelRequested) return 'cancelled';
    if (exit.timedOut) {
      this.emit(state, messageEvent('ERROR', new TimeoutError(this.options.idleTimeoutMs).message));
      return 'failed';
    }
    if (exit.code !== 0) {
      const reason = exit.code === null ? `signal ${exit.signal ?? 'unknown'}` : `code ${exit.code}`;
      this.emit(state, messageEvent('ERROR', `${adapter.displayName} exited with ${reason}`));
      return 'failed';
    }
    return stream.errorCount > 0 ? 'failed' : 'succeeded';
  }

  private emitArtifacts(state: BuildSessionState, adapter: BackendAdapter): void {
    const { operation, projectPath } = state.session;
    if (operation.type !== 'build' && operation.type !== 'crossTargetBuild') return;

    for (const artifact of this.artifacts.locate(adapter.artifactDirs(projectPath, operation))) {
      const name = path.basename(artifact.path);
      this.emit(
        state,
        artifactEvent(`Generated: ${name} (${formatBytes(artifact.sizeBytes)})`, artifact.path, artifact.sizeBytes),
      );
    }
  }

  private finish(state: BuildSessionState, status: BuildStatus): BuildSession {
    const summary = { structuredErrors: state.errors, structuredWarnings: state.warnings };
    const finalEvent = status === 'FAILED'
      ? messageEvent('ERROR', 'BUILD FAILED', summary)
      : messageEvent('INFO', `BUILD ${status}`, summary);
    this.append(state, finalEvent);

    state.session.completedAt = Date.now();
    this.setStatus(state, status);
    for (const [channel, detach] of state.subscribers) {
      detach();
      channel.close();
    }
    state.subscribers.clear();

    this.logger.info('Build session finished', {
      sessionId: state.session.id,
      status,
      errors: state.errors.length,
      warnings: state.warnings.length,
      durationMs: state.session.completedAt - state.session.startedAt,
    });
    return this.snapshot(state);
  }

  private emit(state: BuildSessionState, event: OutputEvent): void {
    state.errors.push(...event.structuredErrors);
    state.warnings.push(...event.structuredWarnings);
    this.append(state, event);
  }

  private append(state: BuildSessionState, event: OutputEvent): void {
    state.events.push(event);
    for (const channel of state.subscribers.keys()) channel.push(event);
  }

  private setStatus(state: BuildSessionState, status: BuildStatus): void {
    if (state.session.status === status) return;
    this.logger.debug('Build session status', { sessionId: state.session.id, from: state.session.status, to: status });
    state.session.status = status;
  }

  private findLive(projectPath: string): BuildSessionState | undefined {
    for (const state of this.sessions.values()) {
      if (state.session.projectPath === projectPath && !isTerminalStatus(state.session.status)) return state;
    }
    return undefined;
  }

  private require(sessionId: string): BuildSessionState {
    const state = this.sessions.get(sessionId);
    if (!state) throw new SessionNotFoundError(sessionId);
    return state;
  }

  private snapshot(state: BuildSessionState): BuildSession {
    return { ...state.session, events: [...state.events] };
  }
}
