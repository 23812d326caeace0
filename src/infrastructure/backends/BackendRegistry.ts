import type { BackendsConfig } from '../../config/types.js';
import { InvalidOperationError } from '../../domain/errors/DomainErrors.js';
import type { BackendAdapter } from '../../domain/ports/BackendAdapterPort.js';
import type { BackendType } from '../../domain/value-objects/BackendType.js';
import type { BuildOperationType } from '../../domain/value-objects/BuildOperation.js';
import { ManagedBuildToolAdapter } from './ManagedBuildToolAdapter.js';
import { NativeDriverAdapter } from './NativeDriverAdapter.js';
import { PackageManagerAdapter } from './PackageManagerAdapter.js';

/** HYBRID 只做這些；跨平台建置與相依管理要指定單一後端 */
const HYBRID_OPERATIONS: ReadonlySet<BuildOperationType> = new Set(['build', 'clean', 'test']);

export interface BackendAdapters {
  managed: BackendAdapter;
  packageManager: BackendAdapter;
  native: BackendAdapter;
}

/**
 * BackendType → 依序執行的 adapter 階段
 *
 * HYBRID = native driver 先建置原生程式庫，再交給 managed build tool 打包。
 */
export class BackendRegistry {
  constructor(private readonly adapters: BackendAdapters) {}

  static fromConfig(config: BackendsConfig): BackendRegistry {
    return new BackendRegistry({
      managed: new ManagedBuildToolAdapter(config.managed),
      packageManager: new PackageManagerAdapter(config.packageManager),
      native: new NativeDriverAdapter(config.native),
    });
  }

  stages(backendType: BackendType): BackendAdapter[] {
    switch (backendType) {
      case 'MANAGED_BUILD_TOOL':
        return [this.adapters.managed];
      case 'PACKAGE_MANAGER':
        return [this.adapters.packageManager];
      case 'NATIVE_DRIVER_EXPERIMENTAL':
        return [this.adapters.native];
      case 'HYBRID':
        return [this.adapters.native, this.adapters.managed];
    }
  }

  /** 所有階段都支援才算支援 */
  supports(backendType: BackendType, operation: BuildOperationType): boolean {
    if (backendType === 'HYBRID' && !HYBRID_OPERATIONS.has(operation)) return false;
    return this.stages(backendType).every((adapter) => adapter.supports(operation));
  }

  /** 不支援時拋出 InvalidOperationError */
  resolve(backendType: BackendType, operation: BuildOperationType): BackendAdapter[] {
    if (!this.supports(backendType, operation)) {
      throw new InvalidOperationError(`${backendType} does not support operation: ${operation}`);
    }
    return this.stages(backendType);
  }
}
