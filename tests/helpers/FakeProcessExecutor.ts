import { AsyncChannel } from '../../src/shared/AsyncChannel.js';
import { createDeferred } from '../../src/shared/Deferred.js';
import { SpawnError } from '../../src/domain/errors/DomainErrors.js';
import type {
  ProcessExecutorPort,
  ProcessExit,
  ProcessHandle,
  RawLine,
  SpawnRequest,
} from '../../src/domain/ports/ProcessExecutorPort.js';

/** 預先寫好的 process 行為；hold=true 時由測試手動 emit / exitWith */
export interface ProcessScript {
  lines?: RawLine[];
  exitCode?: number;
  timedOut?: boolean;
  spawnError?: string;
  hold?: boolean;
}

export const out = (text: string): RawLine => ({ source: 'stdout', text });
export const err = (text: string): RawLine => ({ source: 'stderr', text });

/** 行為對齊 ChildProcessExecutor：kill 之後新輸出被丟棄，已緩衝的行照常交付 */
export class FakeProcessHandle implements ProcessHandle {
  readonly pid = 4242;
  readonly startedAt = Date.now();
  readonly cwd: string;
  readonly argv: readonly string[];
  killCount = 0;

  private readonly channel = new AsyncChannel<RawLine>();
  private readonly outcome = createDeferred<ProcessExit>();
  private exited = false;
  private killed = false;

  constructor(request: SpawnRequest) {
    this.cwd = request.cwd;
    this.argv = request.argv;
  }

  get alive(): boolean {
    return !this.exited;
  }

  get lines(): AsyncIterable<RawLine> {
    return this.channel;
  }

  get exit(): Promise<ProcessExit> {
    return this.outcome.promise;
  }

  emit(...lines: RawLine[]): void {
    if (this.killed) return;
    for (const line of lines) this.channel.push(line);
  }

  exitWith(code: number | null, extra: { timedOut?: boolean; signal?: NodeJS.Signals } = {}): void {
    this.settle({
      kind: 'exited',
      code,
      signal: extra.signal ?? null,
      timedOut: extra.timedOut ?? false,
      killed: this.killed || (extra.timedOut ?? false),
    });
  }

  failSpawn(reason: string): void {
    this.settle({ kind: 'spawnFailed', error: new SpawnError(this.argv[0], reason) });
  }

  kill(): boolean {
    this.killCount++;
    if (this.exited || this.killed) return false;
    this.killed = true;
    this.exitWith(null, { signal: 'SIGTERM' });
    return true;
  }

  private settle(exit: ProcessExit): void {
    if (this.exited) return;
    this.exited = true;
    this.channel.close();
    this.outcome.resolve(exit);
  }
}

export class FakeProcessExecutor implements ProcessExecutorPort {
  readonly requests: SpawnRequest[] = [];
  readonly handles: FakeProcessHandle[] = [];
  private readonly scripts: ProcessScript[] = [];

  /** 依 spawn 順序套用；沒有排入的 spawn 視為立即成功結束 */
  enqueue(...scripts: ProcessScript[]): this {
    this.scripts.push(...scripts);
    return this;
  }

  get spawnCount(): number {
    return this.requests.length;
  }

  lastHandle(): FakeProcessHandle {
    const handle = this.handles[this.handles.length - 1];
    if (!handle) throw new Error('No process spawned');
    return handle;
  }

  spawn(request: SpawnRequest): ProcessHandle {
    this.requests.push(request);
    const handle = new FakeProcessHandle(request);
    this.handles.push(handle);

    const script = this.scripts.shift() ?? {};
    if (script.spawnError !== undefined) {
      handle.failSpawn(script.spawnError);
      return handle;
    }
    handle.emit(...(script.lines ?? []));
    if (!script.hold) {
      handle.exitWith(script.exitCode ?? 0, { timedOut: script.timedOut });
    }
    return handle;
  }
}
