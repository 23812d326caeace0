import path from 'node:path';
import { InvalidOperationError } from '../../domain/errors/DomainErrors.js';
import type { BackendAdapter, Invocation } from '../../domain/ports/BackendAdapterPort.js';
import type { BackendFamily } from '../../domain/value-objects/BackendType.js';
import {
  describeOperation,
  type BuildOperation,
  type BuildOperationType,
} from '../../domain/value-objects/BuildOperation.js';

const DEPENDENCY_NAME = /^[A-Za-z0-9_-]+$/;
const TARGET_TRIPLE = /^[A-Za-z0-9_.-]+$/;

/**
 * adapter 共用骨架
 *
 * 子類別只需宣告支援的操作並實作 buildArgs()；
 * 不支援的操作一律在 plan() 拒絕，不會產生任何 Invocation。
 */
export abstract class BaseBackendAdapter implements BackendAdapter {
  abstract readonly family: BackendFamily;
  abstract readonly displayName: string;
  protected abstract readonly supportedOperations: ReadonlySet<BuildOperationType>;

  supports(operation: BuildOperationType): boolean {
    return this.supportedOperations.has(operation);
  }

  plan(projectPath: string, operation: BuildOperation): Invocation {
    if (!this.supports(operation.type)) {
      throw new InvalidOperationError(
        `${this.displayName} does not support operation: ${operation.type}`,
      );
    }
    this.validate(operation);

    const cwd = path.resolve(projectPath);
    return {
      family: this.family,
      argv: [this.executable(cwd), ...this.buildArgs(operation)],
      cwd,
      env: this.environment(),
      description: `${this.displayName} ${describeOperation(operation)}`,
    };
  }

  abstract artifactDirs(projectPath: string, operation: BuildOperation): string[];

  protected abstract executable(projectPath: string): string;
  protected abstract buildArgs(operation: BuildOperation): string[];

  protected environment(): Record<string, string> {
    return {};
  }

  /** 名稱與 target triple 進入 argv 前先驗證 */
  protected validate(operation: BuildOperation): void {
    if (operation.type === 'addDependency' || operation.type === 'removeDependency') {
      if (!DEPENDENCY_NAME.test(operation.name)) {
        throw new InvalidOperationError(`Invalid dependency name: ${operation.name}`);
      }
    }
    if (operation.type === 'crossTargetBuild' && !TARGET_TRIPLE.test(operation.target)) {
      throw new InvalidOperationError(`Invalid target triple: ${operation.target}`);
    }
  }
}

/** 以 <root>/target/... 為產出目錄的工具鏈共用 */
export function targetDirs(projectPath: string, operation: BuildOperation, profile: string): string[] {
  const root = path.resolve(projectPath, 'target');
  if (operation.type === 'crossTargetBuild') {
    return [path.join(root, operation.target, profile)];
  }
  return [path.join(root, profile)];
}
