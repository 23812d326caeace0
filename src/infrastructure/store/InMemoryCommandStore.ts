import { randomUUID } from 'node:crypto';
import type { BookmarkedCommand, CommandHistoryEntry } from '../../domain/entities/CommandRecord.js';
import type {
  BookmarkQuery,
  CommandStorePort,
  HistoryQuery,
  NewBookmark,
} from '../../domain/ports/CommandStorePort.js';

/** 不落地的 CommandStorePort（測試與 --no-store 使用），排序規則與 SQLite 版相同 */
export class InMemoryCommandStore implements CommandStorePort {
  private readonly history: CommandHistoryEntry[] = [];
  private readonly bookmarks = new Map<string, BookmarkedCommand>();

  constructor(private readonly now: () => number = Date.now) {}

  appendHistory(entry: CommandHistoryEntry): void {
    this.history.push({ ...entry });
  }

  listHistory(query: HistoryQuery = {}): CommandHistoryEntry[] {
    const matching = this.history
      .filter((entry) => query.sessionId === undefined || entry.sessionId === query.sessionId)
      .sort((a, b) => a.executedAt - b.executedAt);
    const limited = query.limit !== undefined ? matching.slice(Math.max(matching.length - query.limit, 0)) : matching;
    return limited.map((entry) => ({ ...entry }));
  }

  addBookmark(bookmark: NewBookmark): BookmarkedCommand {
    const now = this.now();
    const created: BookmarkedCommand = {
      id: randomUUID(),
      command: bookmark.command,
      description: bookmark.description,
      tags: [...(bookmark.tags ?? [])],
      isFavorite: bookmark.isFavorite ?? false,
      useCount: 0,
      createdAt: now,
      updatedAt: now,
    };
    this.bookmarks.set(created.id, created);
    return copy(created);
  }

  getBookmark(id: string): BookmarkedCommand | undefined {
    const bookmark = this.bookmarks.get(id);
    return bookmark ? copy(bookmark) : undefined;
  }

  listBookmarks(query: BookmarkQuery = {}): BookmarkedCommand[] {
    return [...this.bookmarks.values()]
      .filter((b) => !query.favoritesOnly || b.isFavorite)
      .filter((b) => query.tag === undefined || b.tags.includes(query.tag))
      .sort((a, b) =>
        Number(b.isFavorite) - Number(a.isFavorite)
        || b.useCount - a.useCount
        || (b.lastUsed ?? 0) - (a.lastUsed ?? 0)
        || a.createdAt - b.createdAt)
      .map(copy);
  }

  removeBookmark(id: string): boolean {
    return this.bookmarks.delete(id);
  }

  setFavorite(id: string, isFavorite: boolean): BookmarkedCommand | undefined {
    const bookmark = this.bookmarks.get(id);
    if (!bookmark) return undefined;
    bookmark.isFavorite = isFavorite;
    bookmark.updatedAt = this.now();
    return copy(bookmark);
  }

  incrementUseCount(id: string): BookmarkedCommand | undefined {
    const bookmark = this.bookmarks.get(id);
    if (!bookmark) return undefined;
    const now = this.now();
    bookmark.useCount++;
    bookmark.lastUsed = now;
    bookmark.updatedAt = now;
    return copy(bookmark);
  }
}

function copy(bookmark: BookmarkedCommand): BookmarkedCommand {
  return { ...bookmark, tags: [...bookmark.tags] };
}
