import type { SpawnError } from '../errors/DomainErrors.js';

export type LineSource = 'stdout' | 'stderr';

/** 一行原始輸出，保留來源 */
export interface RawLine {
  source: LineSource;
  text: string;
}

export interface SpawnRequest {
  cwd: string;
  argv: readonly string[];
  /** 覆蓋 host 環境變數；未列出的沿用 host 值 */
  env?: Readonly<Record<string, string>>;
  /** 無輸出超過此毫秒數即 kill；0 表示停用，未指定時使用 executor 預設值 */
  idleTimeoutMs?: number;
}

/** process 結束結果 */
export type ProcessExit =
  | {
    kind: 'exited';
    code: number | null;
    signal: NodeJS.Signals | null;
    /** 因 idle timeout 被 kill */
    timedOut: boolean;
    /** 呼叫過 kill() */
    killed: boolean;
  }
  | { kind: 'spawnFailed'; error: SpawnError };

/**
 * ProcessHandle：一個 OS process 的不透明參照
 *
 * lines 依 process 實際輸出順序合併 stdout/stderr；
 * kill() 為冪等操作，對已結束的 process 是 no-op。
 */
export interface ProcessHandle {
  readonly pid: number | undefined;
  readonly startedAt: number;
  readonly cwd: string;
  readonly argv: readonly string[];
  readonly alive: boolean;
  readonly lines: AsyncIterable<RawLine>;
  readonly exit: Promise<ProcessExit>;
  /** 回傳 true 表示這次呼叫實際送出 signal */
  kill(): boolean;
}

export interface ProcessExecutorPort {
  /** cwd 不存在或 argv 為空時同步拋出 InvalidOperationError */
  spawn(request: SpawnRequest): ProcessHandle;
}
