import fs from 'node:fs/promises';
import path from 'node:path';
import { formatEventLine, type OutputEvent } from '../../domain/entities/OutputEvent.js';
import { InvalidOperationError } from '../../domain/errors/DomainErrors.js';
import { compactTimestamp } from '../../shared/text.js';

/** terminal_20240131_154500.txt */
export function defaultTranscriptName(now: Date = new Date()): string {
  return `terminal_${compactTimestamp(now)}.txt`;
}

export function renderTranscript(events: readonly OutputEvent[]): string {
  return events.map(formatEventLine).join('\n');
}

/** 將終端機輸出存成純文字檔，每個事件一行 "<KIND>: <message>" */
export class TranscriptWriter {
  constructor(private readonly logDir: string) {}

  async write(events: readonly OutputEvent[], fileName: string = defaultTranscriptName()): Promise<string> {
    // 只接受單純檔名，避免寫到 logDir 之外
    if (fileName !== path.basename(fileName) || fileName === '.' || fileName === '..') {
      throw new InvalidOperationError(`Invalid transcript file name: ${fileName}`);
    }
    await fs.mkdir(this.logDir, { recursive: true });
    const filePath = path.join(this.logDir, fileName);
    await fs.writeFile(filePath, renderTranscript(events), 'utf-8');
    return filePath;
  }
}
