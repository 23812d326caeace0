import fs from 'node:fs';
import path from 'node:path';
import type { ArtifactLocatorPort, LocatedArtifact } from '../../domain/ports/ArtifactLocatorPort.js';
import { defaultArtifactExtensions } from '../classification/RuleTable.js';

/** 建置中繼檔，不算產出物 */
const EXCLUDED_EXTENSIONS: readonly string[] = ['.d', '.rmeta', '.pdb', '.o'];

/**
 * 掃描產出目錄（不遞迴）
 *
 * 收錄已知副檔名的檔案，以及沒有副檔名、具執行權限的檔案（原生執行檔）。
 * 副檔名清單預設與分類規則檔共用。不存在的目錄直接略過。
 */
export class FileSystemArtifactLocator implements ArtifactLocatorPort {
  private readonly extensions: ReadonlySet<string>;

  constructor(extensions: readonly string[] = defaultArtifactExtensions()) {
    this.extensions = new Set(extensions.map((ext) => `.${ext.toLowerCase()}`));
  }

  locate(dirs: readonly string[]): LocatedArtifact[] {
    const found = new Map<string, LocatedArtifact>();

    for (const dir of dirs) {
      let entries: fs.Dirent[];
      try {
        entries = fs.readdirSync(dir, { withFileTypes: true });
      } catch {
        continue; // 目錄不存在：此操作沒有這類產出
      }

      for (const entry of entries) {
        if (!entry.isFile()) continue;
        const fullPath = path.join(dir, entry.name);
        const stat = fs.statSync(fullPath);
        if (!this.isArtifact(entry.name, stat.mode)) continue;
        found.set(fullPath, { path: fullPath, sizeBytes: stat.size });
      }
    }

    return [...found.values()].sort((a, b) => a.path.localeCompare(b.path));
  }

  private isArtifact(fileName: string, mode: number): boolean {
    if (fileName.startsWith('.')) return false;
    const ext = path.extname(fileName).toLowerCase();
    if (EXCLUDED_EXTENSIONS.includes(ext)) return false;
    if (this.extensions.has(ext)) return true;
    // 無副檔名且可執行
    return ext === '' && (mode & 0o111) !== 0;
  }
}
