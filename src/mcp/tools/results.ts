import { errorMessage } from '../../domain/errors/DomainErrors.js';
import { formatEventLine, type OutputEvent } from '../../domain/entities/OutputEvent.js';

export function textResult(text: string) {
  return {
    content: [{ type: 'text' as const, text }],
  };
}

/** 工具失敗一律回 isError，不讓例外穿過 MCP 邊界 */
export function errorResult(action: string, err: unknown) {
  return {
    content: [{ type: 'text' as const, text: `${action} failed: ${errorMessage(err)}` }],
    isError: true,
  };
}

export function eventLines(events: readonly OutputEvent[]): string[] {
  return events.map(formatEventLine);
}
