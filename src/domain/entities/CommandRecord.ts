/** 已執行過的指令（最新的在最後） */
export interface CommandHistoryEntry {
  command: string;
  sessionId: string;
  executedAt: number;
}

/** 使用者收藏的指令 */
export interface BookmarkedCommand {
  id: string;
  command: string;
  description: string;
  tags: string[];
  isFavorite: boolean;
  useCount: number;
  lastUsed?: number;
  createdAt: number;
  updatedAt: number;
}
