/**
 * 指令歷史導覽：純 index 走訪，不修改歷史本身
 *
 * index = -1 表示「目前不在歷史中」（輸入列為空白的新指令）。
 * - previous：從 -1 跳到最後一筆，其餘往前一筆（停在 0）
 * - next：往後一筆，超過最後一筆時回到 -1
 */
export type HistoryDirection = 'previous' | 'next';

export interface HistoryPosition {
  index: number;
  command: string;
}

export function navigateHistory(
  history: readonly string[],
  index: number,
  direction: HistoryDirection,
): HistoryPosition {
  if (history.length === 0) return { index: -1, command: '' };

  if (direction === 'previous') {
    const nextIndex = index === -1 || index >= history.length
      ? history.length - 1
      : Math.max(index - 1, 0);
    return { index: nextIndex, command: history[nextIndex] };
  }

  if (index === -1 || index >= history.length - 1) {
    return { index: -1, command: '' };
  }
  return { index: index + 1, command: history[index + 1] };
}
