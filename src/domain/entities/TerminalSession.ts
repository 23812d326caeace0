/** 互動式終端機 session（一次最多一個前景 process） */
export interface TerminalSession {
  id: string;
  workingDirectory: string;
  environment: Readonly<Record<string, string>>;
  isActive: boolean;
  createdAt: number;
}

/** 單一非內建指令的結果 */
export type CommandOutcome = 'SUCCEEDED' | 'FAILED' | 'CANCELLED';
