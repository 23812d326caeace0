import fs from 'node:fs';
import path from 'node:path';
import type { ManagedBackendConfig } from '../../config/types.js';
import { InvalidOperationError } from '../../domain/errors/DomainErrors.js';
import {
  profileOf,
  type BuildOperation,
  type BuildOperationType,
} from '../../domain/value-objects/BuildOperation.js';
import { BaseBackendAdapter } from './BaseBackendAdapter.js';

/**
 * Gradle 類 managed build tool
 *
 * 專案內有 wrapper（gradlew）時用 wrapper，否則用設定的 executable。
 */
export class ManagedBuildToolAdapter extends BaseBackendAdapter {
  readonly family = 'managed' as const;
  readonly displayName = 'Managed build tool';
  protected readonly supportedOperations: ReadonlySet<BuildOperationType> = new Set(['build', 'clean', 'test']);

  constructor(private readonly config: ManagedBackendConfig) {
    super();
  }

  protected executable(projectPath: string): string {
    for (const name of this.config.wrapperNames) {
      const wrapper = path.join(projectPath, name);
      if (fs.existsSync(wrapper)) return wrapper;
    }
    return this.config.executable;
  }

  protected buildArgs(operation: BuildOperation): string[] {
    switch (operation.type) {
      case 'build':
        return [
          operation.release ? 'assembleRelease' : 'assembleDebug',
          ...this.config.defaultArgs,
          ...(operation.extraArgs ?? []),
        ];
      case 'clean':
        return ['clean', ...this.config.defaultArgs];
      case 'test':
        return ['test', ...this.config.defaultArgs, ...(operation.extraArgs ?? [])];
      default:
        throw new InvalidOperationError(`${this.displayName} does not support operation: ${operation.type}`);
    }
  }

  artifactDirs(projectPath: string, operation: BuildOperation): string[] {
    const root = path.resolve(projectPath);
    const profile = profileOf(operation);
    return [
      path.join(root, 'app', 'build', 'outputs', 'apk', profile),
      path.join(root, 'app', 'build', 'outputs', 'bundle', profile),
      path.join(root, 'build', 'libs'),
    ];
  }
}
