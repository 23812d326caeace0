import fs from 'node:fs';

/** 路徑存在且為目錄 */
export function isDirectory(dir: string): boolean {
  try {
    return fs.statSync(dir).isDirectory();
  } catch {
    return false;
  }
}
