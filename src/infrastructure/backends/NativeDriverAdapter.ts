import type { NativeBackendConfig } from '../../config/types.js';
import { InvalidOperationError } from '../../domain/errors/DomainErrors.js';
import {
  profileOf,
  type BuildOperation,
  type BuildOperationType,
} from '../../domain/value-objects/BuildOperation.js';
import { BaseBackendAdapter, targetDirs } from './BaseBackendAdapter.js';

/** 實驗性 native build driver：沒有相依套件管理 */
export class NativeDriverAdapter extends BaseBackendAdapter {
  readonly family = 'native' as const;
  readonly displayName = 'Native driver';
  protected readonly supportedOperations: ReadonlySet<BuildOperationType> = new Set([
    'build',
    'clean',
    'test',
    'crossTargetBuild',
  ]);

  constructor(private readonly config: NativeBackendConfig) {
    super();
  }

  protected executable(): string {
    return this.config.executable;
  }

  protected buildArgs(operation: BuildOperation): string[] {
    switch (operation.type) {
      case 'build':
        return ['build', profileOf(operation), ...(operation.extraArgs ?? [])];
      case 'clean':
        return ['clean'];
      case 'test':
        return ['test', profileOf(operation), ...(operation.extraArgs ?? [])];
      case 'crossTargetBuild':
        return ['build', profileOf(operation), '--target', operation.target];
      default:
        throw new InvalidOperationError(`${this.displayName} does not support operation: ${operation.type}`);
    }
  }

  artifactDirs(projectPath: string, operation: BuildOperation): string[] {
    return targetDirs(projectPath, operation, profileOf(operation));
  }
}
