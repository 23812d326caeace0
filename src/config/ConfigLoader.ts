import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { CONFIG_FILE_NAME, DEFAULT_CONFIG } from './defaults.js';
import type { BuildmuxConfig, PartialConfig } from './types.js';

export type { BuildmuxConfig, PartialConfig } from './types.js';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

const configSchema = z.object({
  version: z.number(),
  process: z.object({
    idleTimeoutMs: z.number(),
    killGraceMs: z.number(),
    shell: z.string(),
    shellArgs: z.array(z.string()),
  }),
  backends: z.object({
    managed: z.object({
      executable: z.string(),
      wrapperNames: z.array(z.string()),
      defaultArgs: z.array(z.string()),
    }),
    packageManager: z.object({
      executable: z.string(),
    }),
    native: z.object({
      executable: z.string(),
      manifestName: z.string(),
    }),
  }),
  terminal: z.object({
    logDir: z.string(),
    historyLimit: z.number(),
    homeDir: z.string().optional(),
  }),
  store: z.object({
    dbPath: z.string(),
  }),
  logging: z.object({
    level: z.enum(LOG_LEVELS),
  }),
});

/** 設定檔允許只寫部分欄位 */
const fileSchema = configSchema.deepPartial();

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** 深層合併：partial 覆蓋 base，陣列整個取代 */
function deepMerge(base: unknown, partial: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(partial)) {
    return partial === undefined ? base : partial;
  }
  const result: Record<string, unknown> = { ...base };
  for (const [key, val] of Object.entries(partial)) {
    if (val === undefined) continue;
    result[key] = isPlainObject(val) && isPlainObject(result[key])
      ? deepMerge(result[key], val)
      : val;
  }
  return result;
}

/** 讀取整數型環境變數；非數字時拋錯以免靜默使用預設值 */
function readIntEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * 環境變數覆蓋 config：
 * BUILDMUX_IDLE_TIMEOUT_MS / BUILDMUX_SHELL / BUILDMUX_LOG_LEVEL /
 * BUILDMUX_GRADLE / BUILDMUX_CARGO / BUILDMUX_NATIVE_DRIVER
 */
function applyEnvOverrides(config: BuildmuxConfig): void {
  const idleTimeout = readIntEnv('BUILDMUX_IDLE_TIMEOUT_MS');
  if (idleTimeout !== undefined) config.process.idleTimeoutMs = idleTimeout;

  const shell = process.env.BUILDMUX_SHELL;
  if (shell) config.process.shell = shell;

  const level = process.env.BUILDMUX_LOG_LEVEL;
  if (level) config.logging.level = z.enum(LOG_LEVELS).parse(level);

  const gradle = process.env.BUILDMUX_GRADLE;
  if (gradle) config.backends.managed.executable = gradle;

  const cargo = process.env.BUILDMUX_CARGO;
  if (cargo) config.backends.packageManager.executable = cargo;

  const native = process.env.BUILDMUX_NATIVE_DRIVER;
  if (native) config.backends.native.executable = native;
}

function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

/** 驗證設定值的合法性 */
function validate(config: BuildmuxConfig): void {
  if (!isNonNegativeInteger(config.process.idleTimeoutMs)) {
    throw new Error('idleTimeoutMs must be a non-negative integer');
  }
  if (!isNonNegativeInteger(config.process.killGraceMs)) {
    throw new Error('killGraceMs must be a non-negative integer');
  }
  if (!Number.isInteger(config.terminal.historyLimit) || config.terminal.historyLimit <= 0) {
    throw new Error('historyLimit must be a positive integer');
  }

  const executables: Array<[string, string]> = [
    ['process.shell', config.process.shell],
    ['backends.managed.executable', config.backends.managed.executable],
    ['backends.packageManager.executable', config.backends.packageManager.executable],
    ['backends.native.executable', config.backends.native.executable],
  ];
  for (const [key, value] of executables) {
    if (value.trim() === '') throw new Error(`${key} must not be empty`);
  }
}

/**
 * 載入設定：讀取 .buildmux.json（若存在）並合併到預設值上
 * @param rootDir - 專案或工作區根目錄
 * @param overrides - 程式碼層級的覆蓋值（優先於檔案）
 */
export function loadConfig(
  rootDir: string,
  overrides?: PartialConfig,
): BuildmuxConfig {
  let fileConfig: unknown = {};

  const configPath = path.join(rootDir, CONFIG_FILE_NAME);
  if (fs.existsSync(configPath)) {
    const raw = fs.readFileSync(configPath, 'utf-8');
    const parsed = fileSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Invalid ${CONFIG_FILE_NAME}: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    }
    fileConfig = parsed.data;
  }

  // 合併順序：defaults < file config < overrides < 環境變數
  const merged = deepMerge(deepMerge(DEFAULT_CONFIG, fileConfig), overrides);
  const config: BuildmuxConfig = configSchema.parse(merged);

  applyEnvOverrides(config);

  validate(config);
  return config;
}
