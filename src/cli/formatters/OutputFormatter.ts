import { eventPrefix, formatEventLine, type OutputEvent } from '../../domain/entities/OutputEvent.js';

export type OutputFormat = 'json' | 'text' | 'plain';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'plain', 'json'];

/**
 * CLI 輸出格式化器
 *
 * - text：終端機用，依 kind 加前綴符號
 * - plain：transcript 格式 "<KIND>: <message>"
 * - json：一個事件一行 JSON
 */
export class OutputFormatter {
  constructor(private readonly format: OutputFormat = 'text') {}

  formatEvent(event: OutputEvent): string {
    switch (this.format) {
      case 'json':
        return JSON.stringify(event);
      case 'plain':
        return formatEventLine(event);
      case 'text':
        return `${eventPrefix(event)}${event.message}`;
    }
  }

  formatObject(data: unknown): string {
    if (this.format === 'json') {
      return JSON.stringify(data, null, 2);
    }
    return this.flattenToText(data);
  }

  /** 將任意物件平展為人類可讀文字 */
  private flattenToText(data: unknown, indent: number = 0): string {
    if (data === null || data === undefined) return '';
    if (typeof data !== 'object') return String(data);

    const prefix = '  '.repeat(indent);
    if (Array.isArray(data)) {
      return data.map((item, i) => `${prefix}[${i}] ${this.flattenToText(item, indent + 1).trimStart()}`).join('\n');
    }

    return Object.entries(data)
      .map(([key, val]: [string, unknown]) => {
        if (typeof val === 'object' && val !== null) {
          return `${prefix}${key}:\n${this.flattenToText(val, indent + 1)}`;
        }
        return `${prefix}${key}: ${String(val)}`;
      })
      .join('\n');
  }
}
