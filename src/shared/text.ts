// CSI / OSC escape sequences
const ANSI_PATTERN = /\u001B(?:\[[0-?]*[ -/]*[@-~]|\][^\u0007\u001B]*(?:\u0007|\u001B\\)|[@-Z\\-_])/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}

const UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

/** 1536 → "1.5 KB" */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(1)} ${UNITS[unit]}`;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** 本地時間 yyyyMMdd_HHmmss */
export function compactTimestamp(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
    + `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/**
 * 切出指令第一個字與其後的參數字串
 * "cd  my dir" → { head: 'cd', rest: 'my dir' }
 */
export function splitCommand(commandText: string): { head: string; rest: string } {
  const trimmed = commandText.trim();
  const match = /^(\S+)\s*([\s\S]*)$/.exec(trimmed);
  if (!match) return { head: '', rest: '' };
  return { head: match[1], rest: match[2].trim() };
}

/** 去掉成對的外層引號 */
export function unquote(text: string): string {
  if (text.length >= 2) {
    const first = text[0];
    const last = text[text.length - 1];
    if ((first === '"' || first === "'") && first === last) return text.slice(1, -1);
  }
  return text;
}

const SAFE_SHELL_WORD = /^[A-Za-z0-9_\-.,/:=@%+~]+$/;

/** 需要時以單引號包住，讓 sh 把它當成一個字 */
export function quoteShellWord(word: string): string {
  if (SAFE_SHELL_WORD.test(word)) return word;
  return `'${word.replace(/'/g, `'\\''`)}'`;
}

/**
 * 把呼叫端 shell 已拆好的參數組回指令列
 *
 * 只有一個字時視為完整指令列原樣使用（`exec "ls | wc -l"`）；
 * 多個字時逐字加引號，保留原本的分界（`exec grep "a b" f`）。
 */
export function joinCommandWords(words: readonly string[]): string {
  if (words.length === 1) return words[0];
  return words.map(quoteShellWord).join(' ');
}
