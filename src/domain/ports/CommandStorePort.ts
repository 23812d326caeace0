import type { BookmarkedCommand, CommandHistoryEntry } from '../entities/CommandRecord.js';

export interface HistoryQuery {
  sessionId?: string;
  limit?: number;
}

export interface BookmarkQuery {
  favoritesOnly?: boolean;
  tag?: string;
}

export interface NewBookmark {
  command: string;
  description: string;
  tags?: string[];
  isFavorite?: boolean;
}

/**
 * 指令歷史與書籤的持久化儲存
 *
 * 跨 session 共用，只增不減為主；session manager 只讀取與累加 useCount。
 */
export interface CommandStorePort {
  appendHistory(entry: CommandHistoryEntry): void;
  /** 依執行時間排序，最新的在最後 */
  listHistory(query?: HistoryQuery): CommandHistoryEntry[];

  addBookmark(bookmark: NewBookmark): BookmarkedCommand;
  getBookmark(id: string): BookmarkedCommand | undefined;
  listBookmarks(query?: BookmarkQuery): BookmarkedCommand[];
  removeBookmark(id: string): boolean;
  setFavorite(id: string, isFavorite: boolean): BookmarkedCommand | undefined;
  incrementUseCount(id: string): BookmarkedCommand | undefined;
}
