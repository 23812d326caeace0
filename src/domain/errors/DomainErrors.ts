/**
 * 錯誤分類
 * - operation：請求本身不合法，在任何 process spawn 之前拒絕
 * - session：session 狀態不允許此操作（忙碌、不存在、已關閉）
 * - process：process 層級失敗，轉成 terminal status + ERROR 事件，不跨越 session 邊界拋出
 */
export type ErrorClassification = 'operation' | 'session' | 'process';

/** 所有 buildmux domain 錯誤的基底類別 */
export abstract class BuildmuxError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

// --- Process ---

export class SpawnError extends BuildmuxError {
  readonly classification = 'process' as const;
  readonly code = 'SPAWN_FAILED';

  constructor(
    public readonly executable: string,
    public readonly reason: string,
    options?: ErrorOptions,
  ) {
    super(`Failed to start "${executable}": ${reason}`, options);
  }
}

export class TimeoutError extends BuildmuxError {
  readonly classification = 'process' as const;
  readonly code = 'IDLE_TIMEOUT';

  constructor(public readonly idleTimeoutMs: number, options?: ErrorOptions) {
    super(`Process timed out after ${idleTimeoutMs}ms without output`, options);
  }
}

export class HybridStageFailure extends BuildmuxError {
  readonly classification = 'process' as const;
  readonly code = 'HYBRID_STAGE_FAILED';

  constructor(
    public readonly failedStage: string,
    public readonly skippedStage: string,
    options?: ErrorOptions,
  ) {
    super(`Stage "${failedStage}" failed; skipping stage "${skippedStage}"`, options);
  }
}

// --- Operation ---

export class InvalidOperationError extends BuildmuxError {
  readonly classification = 'operation' as const;
  readonly code = 'INVALID_OPERATION';
}

export class BookmarkNotFoundError extends BuildmuxError {
  readonly classification = 'operation' as const;
  readonly code = 'BOOKMARK_NOT_FOUND';

  constructor(public readonly bookmarkId: string, options?: ErrorOptions) {
    super(`Bookmark not found: ${bookmarkId}`, options);
  }
}

// --- Session ---

export class SessionBusyError extends BuildmuxError {
  readonly classification = 'session' as const;
  readonly code = 'SESSION_BUSY';

  constructor(public readonly sessionId: string, options?: ErrorOptions) {
    super(`Session ${sessionId} already has a running process`, options);
  }
}

export class SessionNotFoundError extends BuildmuxError {
  readonly classification = 'session' as const;
  readonly code = 'SESSION_NOT_FOUND';

  constructor(public readonly sessionId: string, options?: ErrorOptions) {
    super(`Session not found: ${sessionId}`, options);
  }
}

export class SessionClosedError extends BuildmuxError {
  readonly classification = 'session' as const;
  readonly code = 'SESSION_CLOSED';

  constructor(public readonly sessionId: string, options?: ErrorOptions) {
    super(`Session is closed: ${sessionId}`, options);
  }
}

/** 取出任意 throw 值的訊息 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
