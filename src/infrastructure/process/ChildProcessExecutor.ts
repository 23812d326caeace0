import { spawn as nodeSpawn, type ChildProcess, type SpawnOptions } from 'node:child_process';
import { AsyncChannel } from '../../shared/AsyncChannel.js';
import { createDeferred } from '../../shared/Deferred.js';
import { LineAssembler } from '../../shared/LineAssembler.js';
import { isDirectory } from '../../shared/paths.js';
import { Logger, silentLogger } from '../../shared/Logger.js';
import { InvalidOperationError, SpawnError } from '../../domain/errors/DomainErrors.js';
import type {
  LineSource,
  ProcessExecutorPort,
  ProcessExit,
  ProcessHandle,
  RawLine,
  SpawnRequest,
} from '../../domain/ports/ProcessExecutorPort.js';

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcess;

export interface ChildProcessExecutorOptions {
  /** 預設 idle timeout（毫秒），0 表示停用 */
  idleTimeoutMs: number;
  /** SIGTERM 之後升級為 SIGKILL 的等待時間 */
  killGraceMs: number;
  spawnFn?: SpawnFn;
  logger?: Logger;
}

/**
 * 以 node:child_process 實作的 Process Executor
 *
 * - stdout / stderr 以 UTF-8 解碼、組成行，依到達順序放進同一個 channel
 * - 任何輸出都會重設 idle timer；逾時即 kill 並標記 timedOut
 * - kill() 之後到達的 chunk 直接丟棄，已緩衝的行照常交付
 */
export class ChildProcessExecutor implements ProcessExecutorPort {
  private readonly spawnFn: SpawnFn;
  private readonly logger: Logger;

  constructor(private readonly options: ChildProcessExecutorOptions) {
    this.spawnFn = options.spawnFn ?? nodeSpawn;
    this.logger = options.logger ?? silentLogger;
  }

  spawn(request: SpawnRequest): ProcessHandle {
    if (request.argv.length === 0 || request.argv[0].trim() === '') {
      throw new InvalidOperationError('Cannot spawn a process with an empty argument vector');
    }
    if (!isDirectory(request.cwd)) {
      throw new InvalidOperationError(`Working directory does not exist: ${request.cwd}`);
    }

    return new ChildProcessHandle(
      request,
      this.spawnFn,
      request.idleTimeoutMs ?? this.options.idleTimeoutMs,
      this.options.killGraceMs,
      this.logger,
    );
  }
}

class ChildProcessHandle implements ProcessHandle {
  readonly startedAt = Date.now();
  readonly cwd: string;
  readonly argv: readonly string[];

  private readonly channel = new AsyncChannel<RawLine>();
  private readonly assemblers: Record<LineSource, LineAssembler> = {
    stdout: new LineAssembler(),
    stderr: new LineAssembler(),
  };
  private readonly child: ChildProcess;
  private readonly outcome = createDeferred<ProcessExit>();
  private spawned = false;
  private exited = false;
  private killRequested = false;
  private timedOut = false;
  private idleTimer: NodeJS.Timeout | undefined;
  private escalateTimer: NodeJS.Timeout | undefined;

  constructor(
    request: SpawnRequest,
    spawnFn: SpawnFn,
    private readonly idleTimeoutMs: number,
    private readonly killGraceMs: number,
    private readonly logger: Logger,
  ) {
    this.cwd = request.cwd;
    this.argv = [...request.argv];

    const [command, ...args] = this.argv;
    this.child = spawnFn(command, args, {
      cwd: request.cwd,
      env: { ...process.env, ...request.env },
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    this.child.once('spawn', () => {
      this.spawned = true;
      this.logger.debug('Process spawned', { pid: this.child.pid, argv: this.argv, cwd: this.cwd });
    });
    this.child.once('error', (err) => this.onError(command, err));
    this.child.once('close', (code, signal) => this.onClose(code, signal));

    this.attach('stdout');
    this.attach('stderr');
    this.armIdleTimer();
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get alive(): boolean {
    return this.spawned && !this.exited;
  }

  get exit(): Promise<ProcessExit> {
    return this.outcome.promise;
  }

  get lines(): AsyncIterable<RawLine> {
    return this.channel;
  }

  kill(): boolean {
    if (this.exited || this.killRequested) return false;
    this.killRequested = true;
    this.clearIdleTimer();

    this.logger.debug('Killing process', { pid: this.child.pid, timedOut: this.timedOut });
    this.child.kill('SIGTERM');

    if (this.killGraceMs > 0) {
      this.escalateTimer = setTimeout(() => {
        if (!this.exited) this.child.kill('SIGKILL');
      }, this.killGraceMs);
      this.escalateTimer.unref();
    }
    return true;
  }

  private attach(source: LineSource): void {
    const stream = this.child[source];
    if (!stream) return;
    stream.setEncoding('utf8');
    stream.on('data', (chunk: string) => {
      if (this.killRequested) return;
      this.armIdleTimer();
      for (const text of this.assemblers[source].push(chunk)) {
        this.channel.push({ source, text });
      }
    });
  }

  private armIdleTimer(): void {
    if (this.idleTimeoutMs <= 0 || this.exited) return;
    this.clearIdleTimer();
    this.idleTimer = setTimeout(() => {
      this.timedOut = true;
      this.logger.warn('Process idle timeout', { pid: this.child.pid, idleTimeoutMs: this.idleTimeoutMs });
      this.kill();
    }, this.idleTimeoutMs);
  }

  private clearIdleTimer(): void {
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
      this.idleTimer = undefined;
    }
  }

  private onError(command: string, err: Error): void {
    if (this.spawned) {
      // process 已啟動後的錯誤（例如 kill 失敗），close 事件仍會到
      this.logger.warn('Child process error', { pid: this.child.pid, error: err.message });
      return;
    }
    this.settle({ kind: 'spawnFailed', error: new SpawnError(command, err.message, { cause: err }) });
  }

  private onClose(code: number | null, signal: NodeJS.Signals | null): void {
    // kill 前已收到的未換行輸出仍要送出
    for (const source of ['stdout', 'stderr'] as const) {
      for (const text of this.assemblers[source].flush()) {
        this.channel.push({ source, text });
      }
    }
    if (!this.spawned) return; // spawn 失敗已由 error 事件處理

    this.settle({
      kind: 'exited',
      code,
      signal,
      timedOut: this.timedOut,
      killed: this.killRequested,
    });
  }

  private settle(exit: ProcessExit): void {
    if (this.exited) return;
    this.exited = true;
    this.clearIdleTimer();
    if (this.escalateTimer) clearTimeout(this.escalateTimer);
    this.channel.close();
    this.logger.debug('Process finished', { pid: this.child.pid, exit: exit.kind });
    this.outcome.resolve(exit);
  }
}
