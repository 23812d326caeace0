import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { PRAGMA_SQL, SCHEMA_SQL, SCHEMA_VERSION } from './schema.js';
import { silentLogger, type Logger } from '../../shared/Logger.js';

/**
 * SQLite 資料庫管理器
 *
 * 負責：開啟 DB（必要時建立上層目錄）、設定 PRAGMA、執行 schema、
 * 檢查 schema 版本（資料庫比程式新時拒絕開啟）。
 */
export class DatabaseManager {
  private db: Database.Database;

  constructor(
    dbPath: string,
    private readonly logger: Logger = silentLogger,
  ) {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);

    // 設定 PRAGMA（逐行執行，因為 PRAGMA 不支援批次）
    for (const line of PRAGMA_SQL.trim().split('\n')) {
      const trimmed = line.trim();
      if (trimmed && !trimmed.startsWith('--')) {
        this.db.pragma(trimmed.replace('PRAGMA ', '').replace(';', ''));
      }
    }

    this.db.exec(SCHEMA_SQL);
    this.checkSchemaVersion();

    this.logger.info('Database initialized', { dbPath, schemaVersion: SCHEMA_VERSION });
  }

  getDb(): Database.Database {
    return this.db;
  }

  close(): void {
    this.db.close();
  }

  /** 首次使用時寫入版本；已存在且較新時拒絕 */
  private checkSchemaVersion(): void {
    const row = this.db
      .prepare<[], { value: string }>("SELECT value FROM schema_meta WHERE key = 'version'")
      .get();

    if (!row) {
      this.db.prepare(
        "INSERT INTO schema_meta(key, value) VALUES('version', ?)"
      ).run(String(SCHEMA_VERSION));
      return;
    }

    const storedVersion = parseInt(row.value, 10);
    if (storedVersion > SCHEMA_VERSION) {
      throw new Error(
        `Command database schema version ${storedVersion} is newer than supported version ${SCHEMA_VERSION}. ` +
        'Upgrade buildmux or point store.dbPath at another file.'
      );
    }
  }
}
