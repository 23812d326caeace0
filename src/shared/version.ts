import { createRequire } from 'node:module';
import { z } from 'zod';

// 從 package.json 動態讀取版本號，避免硬編碼導致版本不同步
const require = createRequire(import.meta.url);
const packageJsonSchema = z.object({ name: z.string(), version: z.string() });

export const PACKAGE_VERSION = packageJsonSchema.parse(require('../../package.json')).version;
