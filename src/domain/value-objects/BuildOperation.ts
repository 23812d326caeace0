/**
 * 建置操作（tagged union）
 *
 * adapter 依 type 組出參數；不支援的 type 在 spawn 之前就被拒絕。
 */
export type BuildOperation =
  | { type: 'build'; release?: boolean; extraArgs?: readonly string[] }
  | { type: 'clean' }
  | { type: 'test'; release?: boolean; extraArgs?: readonly string[] }
  | { type: 'addDependency'; name: string; version?: string; features?: readonly string[] }
  | { type: 'removeDependency'; name: string }
  | { type: 'crossTargetBuild'; target: string; release?: boolean };

export type BuildOperationType = BuildOperation['type'];

export const BUILD_OPERATION_TYPES: readonly BuildOperationType[] = [
  'build',
  'clean',
  'test',
  'addDependency',
  'removeDependency',
  'crossTargetBuild',
];

/** 建置 profile 名稱（debug / release） */
export function profileOf(operation: BuildOperation): 'debug' | 'release' {
  if (operation.type === 'build' || operation.type === 'test' || operation.type === 'crossTargetBuild') {
    return operation.release ? 'release' : 'debug';
  }
  return 'debug';
}

/** 人類可讀的操作描述，用於 log 與 transcript */
export function describeOperation(operation: BuildOperation): string {
  switch (operation.type) {
    case 'build':
      return operation.release ? 'build (release)' : 'build';
    case 'clean':
      return 'clean';
    case 'test':
      return operation.release ? 'test (release)' : 'test';
    case 'addDependency':
      return `add dependency ${operation.name}`;
    case 'removeDependency':
      return `remove dependency ${operation.name}`;
    case 'crossTargetBuild':
      return `build for ${operation.target}`;
  }
}
