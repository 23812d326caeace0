import fs from 'node:fs';
import path from 'node:path';
import type { BackendType } from '../domain/value-objects/BackendType.js';

const MANAGED_MARKERS = ['build.gradle', 'build.gradle.kts', 'settings.gradle', 'settings.gradle.kts'];
const PACKAGE_MANAGER_MARKERS = ['Cargo.toml', path.join('rust-lib', 'Cargo.toml')];

export interface ProjectDetection {
  projectPath: string;
  /** 找不到任何建置檔時為 undefined */
  backendType?: BackendType;
  /** 找到的建置檔（相對路徑） */
  markers: string[];
}

/**
 * 依專案根目錄的建置檔推斷後端
 *
 * 原生 manifest 或 Cargo.toml 與 Gradle 建置檔並存 → HYBRID。
 */
export class ProjectDetector {
  constructor(private readonly nativeManifestName: string) {}

  detect(projectPath: string): ProjectDetection {
    const root = path.resolve(projectPath);
    const present = (candidates: string[]) =>
      candidates.filter((name) => fs.existsSync(path.join(root, name)));

    const managed = present(MANAGED_MARKERS);
    const packageManager = present(PACKAGE_MANAGER_MARKERS);
    const native = present([this.nativeManifestName]);
    const markers = [...managed, ...packageManager, ...native];

    return { projectPath: root, backendType: decide(managed, packageManager, native), markers };
  }
}

function decide(managed: string[], packageManager: string[], native: string[]): BackendType | undefined {
  const hasManaged = managed.length > 0;
  const hasNative = packageManager.length > 0 || native.length > 0;
  if (hasManaged && hasNative) return 'HYBRID';
  if (packageManager.length > 0) return 'PACKAGE_MANAGER';
  if (hasManaged) return 'MANAGED_BUILD_TOOL';
  if (native.length > 0) return 'NATIVE_DRIVER_EXPERIMENTAL';
  return undefined;
}
