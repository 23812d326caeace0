import type { PackageManagerBackendConfig } from '../../config/types.js';
import {
  profileOf,
  type BuildOperation,
  type BuildOperationType,
} from '../../domain/value-objects/BuildOperation.js';
import { BaseBackendAdapter, targetDirs } from './BaseBackendAdapter.js';

/** Cargo 類 package manager：支援全部操作 */
export class PackageManagerAdapter extends BaseBackendAdapter {
  readonly family = 'packageManager' as const;
  readonly displayName = 'Package manager';
  protected readonly supportedOperations: ReadonlySet<BuildOperationType> = new Set([
    'build',
    'clean',
    'test',
    'addDependency',
    'removeDependency',
    'crossTargetBuild',
  ]);

  constructor(private readonly config: PackageManagerBackendConfig) {
    super();
  }

  protected executable(): string {
    return this.config.executable;
  }

  protected environment(): Record<string, string> {
    // 讓輸出不含色碼，分類規則才能直接比對
    return { CARGO_TERM_COLOR: 'never' };
  }

  protected buildArgs(operation: BuildOperation): string[] {
    switch (operation.type) {
      case 'build':
        return ['build', ...releaseFlag(operation.release), ...(operation.extraArgs ?? [])];
      case 'clean':
        return ['clean'];
      case 'test':
        return ['test', ...releaseFlag(operation.release), ...(operation.extraArgs ?? [])];
      case 'addDependency': {
        const spec = operation.version ? `${operation.name}@${operation.version}` : operation.name;
        const features = operation.features && operation.features.length > 0
          ? ['--features', operation.features.join(',')]
          : [];
        return ['add', spec, ...features];
      }
      case 'removeDependency':
        return ['remove', operation.name];
      case 'crossTargetBuild':
        return ['build', '--target', operation.target, ...releaseFlag(operation.release)];
    }
  }

  artifactDirs(projectPath: string, operation: BuildOperation): string[] {
    return targetDirs(projectPath, operation, profileOf(operation));
  }
}

function releaseFlag(release: boolean | undefined): string[] {
  return release ? ['--release'] : [];
}
