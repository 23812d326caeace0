/** 專案可選的建置後端 */
export const BACKEND_TYPES = [
  'MANAGED_BUILD_TOOL',
  'PACKAGE_MANAGER',
  'HYBRID',
  'NATIVE_DRIVER_EXPERIMENTAL',
] as const;

export type BackendType = (typeof BACKEND_TYPES)[number];

/**
 * 工具鏈家族：決定 adapter 與分類規則表
 * shell 只用於終端機 session，不對應任何 BackendType
 */
export type BackendFamily = 'managed' | 'packageManager' | 'native' | 'shell';

export function isBackendType(value: string): value is BackendType {
  return (BACKEND_TYPES as readonly string[]).includes(value);
}
