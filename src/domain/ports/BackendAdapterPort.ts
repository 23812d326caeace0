import type { BackendFamily } from '../value-objects/BackendType.js';
import type { BuildOperation, BuildOperationType } from '../value-objects/BuildOperation.js';

/** adapter 組出的一次工具鏈呼叫 */
export interface Invocation {
  family: BackendFamily;
  argv: readonly string[];
  cwd: string;
  env: Readonly<Record<string, string>>;
  description: string;
}

/**
 * BackendAdapter：每個工具鏈家族一個實作
 *
 * 只負責組參數，不自己 spawn process。
 * 不支援的操作在 plan() 拋出 InvalidOperationError。
 */
export interface BackendAdapter {
  readonly family: BackendFamily;
  readonly displayName: string;
  supports(operation: BuildOperationType): boolean;
  plan(projectPath: string, operation: BuildOperation): Invocation;
  /** 成功後要掃描產出物的目錄 */
  artifactDirs(projectPath: string, operation: BuildOperation): string[];
}
