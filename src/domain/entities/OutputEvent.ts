/** 建置輸出的語意分類 */
export type BuildEventKind = 'INFO' | 'ERROR' | 'WARNING' | 'SUCCESS' | 'TASK' | 'ARTIFACT';

/** 所有事件種類；CLEAR 只由終端機的內建 clear 產生 */
export type OutputEventKind = BuildEventKind | 'CLEAR';

interface EventBase {
  message: string;
  timestamp: number;
  structuredErrors: readonly string[];
  structuredWarnings: readonly string[];
}

export interface MessageEvent extends EventBase {
  kind: 'INFO' | 'ERROR' | 'WARNING' | 'SUCCESS';
}

export interface TaskEvent extends EventBase {
  kind: 'TASK';
  taskName?: string;
}

export interface ArtifactEvent extends EventBase {
  kind: 'ARTIFACT';
  path: string;
  sizeBytes?: number;
}

export interface ClearEvent extends EventBase {
  kind: 'CLEAR';
}

/**
 * OutputEvent：封閉的 tagged union
 *
 * 建立後即 freeze，之後不可變更。
 */
export type OutputEvent = Readonly<MessageEvent | TaskEvent | ArtifactEvent | ClearEvent>;

export interface EventOptions {
  timestamp?: number;
  structuredErrors?: readonly string[];
  structuredWarnings?: readonly string[];
}

function base(message: string, kind: OutputEventKind, opts: EventOptions): EventBase {
  return {
    message,
    timestamp: opts.timestamp ?? Date.now(),
    structuredErrors: Object.freeze([...(opts.structuredErrors ?? (kind === 'ERROR' ? [message] : []))]),
    structuredWarnings: Object.freeze([...(opts.structuredWarnings ?? (kind === 'WARNING' ? [message] : []))]),
  };
}

export function messageEvent(
  kind: MessageEvent['kind'],
  message: string,
  opts: EventOptions = {},
): OutputEvent {
  return Object.freeze({ kind, ...base(message, kind, opts) });
}

export function taskEvent(message: string, taskName?: string, opts: EventOptions = {}): OutputEvent {
  const event: TaskEvent = { kind: 'TASK', ...base(message, 'TASK', opts) };
  if (taskName !== undefined) event.taskName = taskName;
  return Object.freeze(event);
}

export function artifactEvent(
  message: string,
  path: string,
  sizeBytes?: number,
  opts: EventOptions = {},
): OutputEvent {
  const event: ArtifactEvent = { kind: 'ARTIFACT', path, ...base(message, 'ARTIFACT', opts) };
  if (sizeBytes !== undefined) event.sizeBytes = sizeBytes;
  return Object.freeze(event);
}

export function clearEvent(opts: EventOptions = {}): OutputEvent {
  return Object.freeze({ kind: 'CLEAR', ...base('', 'CLEAR', opts) });
}

/** transcript 格式："<KIND>: <message>" */
export function formatEventLine(event: OutputEvent): string {
  return `${event.kind}: ${event.message}`;
}

/** 終端機呈現用的前綴，switch 保持窮舉 */
export function eventPrefix(event: OutputEvent): string {
  switch (event.kind) {
    case 'INFO':
      return '  ';
    case 'ERROR':
      return '✗ ';
    case 'WARNING':
      return '! ';
    case 'SUCCESS':
      return '✓ ';
    case 'TASK':
      return '> ';
    case 'ARTIFACT':
      return '⇒ ';
    case 'CLEAR':
      return '';
    default:
      return assertNever(event);
  }
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(value)}`);
}
