import type { LogLevel } from '../shared/Logger.js';

/** process 執行設定 */
export interface ProcessConfig {
  /** 無輸出超過此毫秒數即 kill 並回報 FAILED；0 表示停用 */
  idleTimeoutMs: number;
  /** SIGTERM 之後多久升級為 SIGKILL */
  killGraceMs: number;
  /** 終端機非內建指令使用的 shell */
  shell: string;
  shellArgs: string[];
}

/** Gradle 類 managed build tool */
export interface ManagedBackendConfig {
  executable: string;
  /** 專案內存在時優先使用的 wrapper 檔名 */
  wrapperNames: string[];
  defaultArgs: string[];
}

/** Cargo 類 package manager */
export interface PackageManagerBackendConfig {
  executable: string;
}

/** 實驗性 native build driver */
export interface NativeBackendConfig {
  executable: string;
  /** 用於專案偵測的 manifest 檔名 */
  manifestName: string;
}

export interface BackendsConfig {
  managed: ManagedBackendConfig;
  packageManager: PackageManagerBackendConfig;
  native: NativeBackendConfig;
}

/** 終端機 session 設定 */
export interface TerminalConfig {
  /** transcript 輸出目錄（相對於 root） */
  logDir: string;
  /** 每個 session 的記憶體歷史上限 */
  historyLimit: number;
  /** cd 無參數或 ~ 時的目標；未設定時為 host home */
  homeDir?: string;
}

/** 指令歷史與書籤資料庫 */
export interface StoreConfig {
  dbPath: string;
}

export interface LoggingConfig {
  level: LogLevel;
}

/** 完整設定 */
export interface BuildmuxConfig {
  version: number;
  process: ProcessConfig;
  backends: BackendsConfig;
  terminal: TerminalConfig;
  store: StoreConfig;
  logging: LoggingConfig;
}

/** 部分設定（用於 merge）；陣列整個覆蓋 */
export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends unknown[]
    ? T[K]
    : T[K] extends object
      ? DeepPartial<T[K]>
      : T[K];
};

export type PartialConfig = DeepPartial<BuildmuxConfig>;
