import type { BackendType } from '../value-objects/BackendType.js';
import type { BuildOperation } from '../value-objects/BuildOperation.js';
import type { OutputEvent } from './OutputEvent.js';

export type BuildStatus = 'IDLE' | 'RUNNING' | 'SUCCEEDED' | 'FAILED' | 'CANCELLED';

export const TERMINAL_BUILD_STATUSES: readonly BuildStatus[] = ['SUCCEEDED', 'FAILED', 'CANCELLED'];

/**
 * 一次 build / clean / test 請求的紀錄
 *
 * IDLE → RUNNING（process spawn 時）→ SUCCEEDED | FAILED | CANCELLED
 * 保留到 UI 明確 clear 為止。
 */
export interface BuildSession {
  id: string;
  projectPath: string;
  backendType: BackendType;
  operation: BuildOperation;
  status: BuildStatus;
  startedAt: number;
  completedAt?: number;
  events: readonly OutputEvent[];
}

export function isTerminalStatus(status: BuildStatus): boolean {
  return TERMINAL_BUILD_STATUSES.includes(status);
}
