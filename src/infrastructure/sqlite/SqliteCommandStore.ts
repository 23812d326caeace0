import { randomUUID } from 'node:crypto';
import type Database from 'better-sqlite3';
import type { BookmarkedCommand, CommandHistoryEntry } from '../../domain/entities/CommandRecord.js';
import type {
  BookmarkQuery,
  CommandStorePort,
  HistoryQuery,
  NewBookmark,
} from '../../domain/ports/CommandStorePort.js';

interface HistoryRow {
  command: string;
  session_id: string;
  executed_at: number;
}

interface BookmarkRow {
  bookmark_id: string;
  command: string;
  description: string;
  tags_json: string;
  is_favorite: number;
  use_count: number;
  last_used: number | null;
  created_at: number;
  updated_at: number;
}

/** 指令歷史與書籤的 SQLite 實作 */
export class SqliteCommandStore implements CommandStorePort {
  constructor(
    private readonly db: Database.Database,
    private readonly now: () => number = Date.now,
  ) {}

  appendHistory(entry: CommandHistoryEntry): void {
    this.db.prepare(
      'INSERT INTO command_history(command, session_id, executed_at) VALUES (?, ?, ?)'
    ).run(entry.command, entry.sessionId, entry.executedAt);
  }

  listHistory(query: HistoryQuery = {}): CommandHistoryEntry[] {
    const args: (string | number)[] = [];
    let where = '';
    let limit = '';
    if (query.sessionId !== undefined) {
      where = 'WHERE session_id = ?';
      args.push(query.sessionId);
    }
    if (query.limit !== undefined) {
      limit = 'LIMIT ?';
      args.push(query.limit);
    }
    // 先取最新的 N 筆，再翻回時間正序
    const rows = this.db.prepare<(string | number)[], HistoryRow>(
      `SELECT command, session_id, executed_at FROM command_history ${where}
       ORDER BY executed_at DESC, history_id DESC ${limit}`
    ).all(...args);

    return rows.reverse().map((row) => ({
      command: row.command,
      sessionId: row.session_id,
      executedAt: row.executed_at,
    }));
  }

  addBookmark(bookmark: NewBookmark): BookmarkedCommand {
    const now = this.now();
    const id = randomUUID();
    this.db.prepare(
      `INSERT INTO bookmarked_commands
         (bookmark_id, command, description, tags_json, is_favorite, use_count, last_used, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, 0, NULL, ?, ?)`
    ).run(
      id,
      bookmark.command,
      bookmark.description,
      JSON.stringify(bookmark.tags ?? []),
      bookmark.isFavorite ? 1 : 0,
      now,
      now,
    );
    return this.requireBookmark(id);
  }

  getBookmark(id: string): BookmarkedCommand | undefined {
    const row = this.db.prepare<[string], BookmarkRow>(
      'SELECT * FROM bookmarked_commands WHERE bookmark_id = ?'
    ).get(id);
    return row ? toBookmark(row) : undefined;
  }

  /** 常用的排前面：favorite → 使用次數 → 最近使用 */
  listBookmarks(query: BookmarkQuery = {}): BookmarkedCommand[] {
    const where = query.favoritesOnly ? 'WHERE is_favorite = 1' : '';
    const rows = this.db.prepare<[], BookmarkRow>(
      `SELECT * FROM bookmarked_commands ${where}
       ORDER BY is_favorite DESC, use_count DESC, COALESCE(last_used, 0) DESC, created_at ASC`
    ).all();

    const bookmarks = rows.map(toBookmark);
    if (query.tag === undefined) return bookmarks;
    const tag = query.tag;
    return bookmarks.filter((b) => b.tags.includes(tag));
  }

  removeBookmark(id: string): boolean {
    const result = this.db.prepare('DELETE FROM bookmarked_commands WHERE bookmark_id = ?').run(id);
    return result.changes > 0;
  }

  setFavorite(id: string, isFavorite: boolean): BookmarkedCommand | undefined {
    const result = this.db.prepare(
      'UPDATE bookmarked_commands SET is_favorite = ?, updated_at = ? WHERE bookmark_id = ?'
    ).run(isFavorite ? 1 : 0, this.now(), id);
    return result.changes > 0 ? this.getBookmark(id) : undefined;
  }

  incrementUseCount(id: string): BookmarkedCommand | undefined {
    const now = this.now();
    const result = this.db.prepare(
      `UPDATE bookmarked_commands
         SET use_count = use_count + 1, last_used = ?, updated_at = ?
       WHERE bookmark_id = ?`
    ).run(now, now, id);
    return result.changes > 0 ? this.getBookmark(id) : undefined;
  }

  private requireBookmark(id: string): BookmarkedCommand {
    const bookmark = this.getBookmark(id);
    if (!bookmark) throw new Error(`Bookmark ${id} disappeared after insert`);
    return bookmark;
  }
}

function toBookmark(row: BookmarkRow): BookmarkedCommand {
  const bookmark: BookmarkedCommand = {
    id: row.bookmark_id,
    command: row.command,
    description: row.description,
    tags: parseTags(row.tags_json),
    isFavorite: row.is_favorite === 1,
    useCount: row.use_count,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
  if (row.last_used !== null) bookmark.lastUsed = row.last_used;
  return bookmark;
}

function parseTags(json: string): string[] {
  const parsed: unknown = JSON.parse(json);
  return Array.isArray(parsed) ? parsed.filter((t): t is string => typeof t === 'string') : [];
}
