import { randomUUID } from 'node:crypto';
import os from 'node:os';
import path from 'node:path';
import { clearEvent, messageEvent, type OutputEvent } from '../domain/entities/OutputEvent.js';
import type { BookmarkedCommand } from '../domain/entities/CommandRecord.js';
import type { CommandOutcome, TerminalSession } from '../domain/entities/TerminalSession.js';
import {
  BookmarkNotFoundError,
  errorMessage,
  InvalidOperationError,
  SessionBusyError,
  SessionClosedError,
  SessionNotFoundError,
  TimeoutError,
} from '../domain/errors/DomainErrors.js';
import type { CommandStorePort } from '../domain/ports/CommandStorePort.js';
import type { ProcessExecutorPort, ProcessHandle } from '../domain/ports/ProcessExecutorPort.js';
import {
  navigateHistory,
  type HistoryDirection,
  type HistoryPosition,
} from '../domain/value-objects/HistoryCursor.js';
import type { OutputClassifier } from '../infrastructure/classification/OutputClassifier.js';
import { StreamClassifier } from '../infrastructure/classification/StreamClassifier.js';
import type { TranscriptWriter } from '../infrastructure/transcript/TranscriptWriter.js';
import { AsyncChannel } from '../shared/AsyncChannel.js';
import { silentLogger, type Logger } from '../shared/Logger.js';
import { isDirectory } from '../shared/paths.js';
import { splitCommand, unquote } from '../shared/text.js';

export interface TerminalSessionManagerOptions {
  shell: string;
  shellArgs: readonly string[];
  historyLimit: number;
  idleTimeoutMs: number;
  /** cd 無參數或 ~ 的目標，預設 os.homedir() */
  homeDir?: string;
  store?: CommandStorePort;
  transcripts: TranscriptWriter;
  logger?: Logger;
  idGenerator?: () => string;
}

export interface CreateTerminalRequest {
  workingDirectory?: string;
  environment?: Readonly<Record<string, string>>;
}

interface TerminalSessionState {
  session: TerminalSession;
  history: string[];
  transcript: OutputEvent[];
  handle?: ProcessHandle;
  busy: boolean;
  cancelRequested: boolean;
  running?: Promise<CommandOutcome>;
  lastOutcome?: CommandOutcome;
}

const HELP_LINES = [
  'Built-in commands:',
  '  clear       Clear the terminal output',
  '  cd [dir]    Change the working directory (~ is the home directory)',
  '  help        Show this help',
];

/**
 * 終端機 session 管理
 *
 * 每個 session 一次最多一個前景 process；執行中再送指令會被 SessionBusyError 拒絕。
 * clear / cd / help 在行程內處理，不進歷史、不 spawn。
 */
export class TerminalSessionManager {
  private readonly sessions = new Map<string, TerminalSessionState>();
  private readonly closed = new Set<string>();
  private readonly logger: Logger;
  private readonly nextId: () => string;
  private readonly homeDir: string;

  constructor(
    private readonly executor: ProcessExecutorPort,
    private readonly classifier: OutputClassifier,
    private readonly options: TerminalSessionManagerOptions,
  ) {
    this.logger = options.logger ?? silentLogger;
    this.nextId = options.idGenerator ?? randomUUID;
    this.homeDir = options.homeDir ?? os.homedir();
  }

  create(request: CreateTerminalRequest = {}): TerminalSession {
    const workingDirectory = path.resolve(request.workingDirectory ?? this.homeDir);
    if (!isDirectory(workingDirectory)) {
      throw new InvalidOperationError(`Working directory does not exist: ${workingDirectory}`);
    }

    const session: TerminalSession = {
      id: this.nextId(),
      workingDirectory,
      environment: { ...request.environment, PWD: workingDirectory },
      isActive: true,
      createdAt: Date.now(),
    };
    this.sessions.set(session.id, {
      session,
      history: [],
      transcript: [],
      busy: false,
      cancelRequested: false,
    });
    this.logger.info('Terminal session created', { sessionId: session.id, workingDirectory });
    return { ...session };
  }

  get(sessionId: string): TerminalSession | undefined {
    const state = this.sessions.get(sessionId);
    return state ? { ...state.session } : undefined;
  }

  list(): TerminalSession[] {
    return [...this.sessions.values()].map((state) => ({ ...state.session }));
  }

  /**
   * 執行一行指令，回傳該指令的事件串流
   *
   * session 忙碌時同步拋出 SessionBusyError；提前結束迭代不會中止 process。
   */
  execute(sessionId: string, commandText: string): AsyncIterable<OutputEvent> {
    const state = this.requireActive(sessionId);
    if (state.busy) throw new SessionBusyError(sessionId);

    const trimmed = commandText.trim();
    if (trimmed === '') throw new InvalidOperationError('Command is empty');
    state.lastOutcome = undefined;

    const channel = new AsyncChannel<OutputEvent>();
    const emit = (event: OutputEvent) => {
      state.transcript.push(event);
      channel.push(event);
    };

    const builtin = this.runBuiltin(state, trimmed, emit);
    if (builtin) {
      channel.close();
      return channel;
    }

    this.addHistory(state, trimmed);
    state.busy = true;
    state.cancelRequested = false;
    state.running = this.runCommand(state, trimmed, emit).then(
      (outcome) => this.settle(state, outcome),
      (err: unknown) => {
        this.logger.error('Terminal command crashed', { sessionId, error: errorMessage(err) });
        emit(messageEvent('ERROR', errorMessage(err)));
        return this.settle(state, 'FAILED');
      },
    ).finally(() => channel.close());
    return channel;
  }

  /** 目前（或最後一個）非內建指令的結果；最後一個指令是內建指令時為 undefined */
  async whenIdle(sessionId: string): Promise<CommandOutcome | undefined> {
    const state = this.require(sessionId);
    if (state.running) return state.running;
    return state.lastOutcome;
  }

  isBusy(sessionId: string): boolean {
    return this.require(sessionId).busy;
  }

  /** 中止前景 process；沒有 process 時回傳 false */
  cancel(sessionId: string): boolean {
    const state = this.require(sessionId);
    if (!state.handle) return false;
    state.cancelRequested = true;
    return state.handle.kill();
  }

  close(sessionId: string): boolean {
    const state = this.sessions.get(sessionId);
    if (!state) return false;
    state.cancelRequested = true;
    state.handle?.kill();
    state.session.isActive = false;
    this.sessions.delete(sessionId);
    this.closed.add(sessionId);
    this.logger.info('Terminal session closed', { sessionId });
    return true;
  }

  closeAll(): void {
    for (const id of [...this.sessions.keys()]) this.close(id);
  }

  // --- 歷史 ---

  history(sessionId: string): string[] {
    return [...this.require(sessionId).history];
  }

  navigateHistory(sessionId: string, index: number, direction: HistoryDirection): HistoryPosition {
    return navigateHistory(this.require(sessionId).history, index, direction);
  }

  historyPrevious(sessionId: string, index: number): HistoryPosition {
    return this.navigateHistory(sessionId, index, 'previous');
  }

  historyNext(sessionId: string, index: number): HistoryPosition {
    return this.navigateHistory(sessionId, index, 'next');
  }

  // --- 書籤 ---

  bookmark(sessionId: string, command: string, description: string, tags: string[] = []): BookmarkedCommand {
    const state = this.requireActive(sessionId);
    const store = this.requireStore();
    const bookmark = store.addBookmark({ command: command.trim(), description, tags });
    state.transcript.push(messageEvent('INFO', `Command bookmarked: ${bookmark.command}`));
    return bookmark;
  }

  /** 累加使用次數後執行書籤指令 */
  runBookmark(sessionId: string, bookmarkId: string): AsyncIterable<OutputEvent> {
    const state = this.requireActive(sessionId);
    const store = this.requireStore();
    const bookmark = store.getBookmark(bookmarkId);
    if (!bookmark) throw new BookmarkNotFoundError(bookmarkId);
    if (state.busy) throw new SessionBusyError(sessionId);

    store.incrementUseCount(bookmarkId);
    return this.execute(sessionId, bookmark.command);
  }

  // --- transcript ---

  transcript(sessionId: string): OutputEvent[] {
    return [...this.require(sessionId).transcript];
  }

  async saveTranscript(sessionId: string, fileName?: string): Promise<string> {
    const state = this.require(sessionId);
    const filePath = await this.options.transcripts.write(state.transcript, fileName);
    this.logger.info('Terminal transcript saved', { sessionId, filePath });
    return filePath;
  }

  // --- 內部 ---

  /** 內建指令回傳 true */
  private runBuiltin(state: TerminalSessionState, commandText: string, emit: (event: OutputEvent) => void): boolean {
    const { head, rest } = splitCommand(commandText);
    switch (head) {
      case 'clear':
        emit(clearEvent());
        return true;
      case 'cd':
        emit(this.changeDirectory(state, unquote(rest)));
        return true;
      case 'help':
        for (const line of HELP_LINES) emit(messageEvent('INFO', line));
        emit(messageEvent('INFO', `Other commands run through ${this.options.shell}`));
        return true;
      default:
        return false;
    }
  }

  private changeDirectory(state: TerminalSessionState, target: string): OutputEvent {
    const resolved = this.resolveDirectory(state.session.workingDirectory, target);
    if (!isDirectory(resolved)) {
      return messageEvent('ERROR', `cd: ${target || resolved}: No such file or directory`);
    }
    state.session.workingDirectory = resolved;
    state.session.environment = { ...state.session.environment, PWD: resolved };
    return messageEvent('SUCCESS', `Changed directory to ${resolved}`);
  }

  private resolveDirectory(cwd: string, target: string): string {
    if (target === '' || target === '~') return this.homeDir;
    if (target.startsWith('~/')) return path.join(this.homeDir, target.slice(2));
    return path.resolve(cwd, target);
  }

  private async runCommand(
    state: TerminalSessionState,
    commandText: string,
    emit: (event: OutputEvent) => void,
  ): Promise<CommandOutcome> {
    const { session } = state;
    let handle: ProcessHandle;
    try {
      handle = this.executor.spawn({
        cwd: session.workingDirectory,
        argv: [this.options.shell, ...this.options.shellArgs, commandText],
        env: session.environment,
        idleTimeoutMs: this.options.idleTimeoutMs,
      });
    } catch (err) {
      emit(messageEvent('ERROR', errorMessage(err)));
      return 'FAILED';
    }
    state.handle = handle;
    this.logger.debug('Terminal command started', { sessionId: session.id, pid: handle.pid });

    const stream = new StreamClassifier(this.classifier, 'shell');
    let lineCount = 0;
    for await (const line of handle.lines) {
      lineCount++;
      emit(stream.next(line));
    }
    const exit = await handle.exit;
    state.handle = undefined;

    if (exit.kind === 'spawnFailed') {
      emit(messageEvent('ERROR', exit.error.message));
      return 'FAILED';
    }
    if (state.cancelRequested) {
      emit(messageEvent('INFO', 'Command cancelled'));
      return 'CANCELLED';
    }
    if (exit.timedOut) {
      emit(messageEvent('ERROR', new TimeoutError(this.options.idleTimeoutMs).message));
      return 'FAILED';
    }
    if (exit.code !== 0) {
      if (lineCount === 0) {
        emit(messageEvent('ERROR', `Command failed with exit code: ${exit.code ?? exit.signal ?? 'unknown'}`));
      }
      return 'FAILED';
    }
    return 'SUCCEEDED';
  }

  private settle(state: TerminalSessionState, outcome: CommandOutcome): CommandOutcome {
    state.busy = false;
    state.handle = undefined;
    state.running = undefined;
    state.lastOutcome = outcome;
    this.logger.debug('Terminal command finished', { sessionId: state.session.id, outcome });
    return outcome;
  }

  private addHistory(state: TerminalSessionState, commandText: string): void {
    state.history.push(commandText);
    const overflow = state.history.length - this.options.historyLimit;
    if (overflow > 0) state.history.splice(0, overflow);

    if (!this.options.store) return;
    try {
      this.options.store.appendHistory({
        command: commandText,
        sessionId: state.session.id,
        executedAt: Date.now(),
      });
    } catch (err) {
      // 歷史寫入失敗不影響指令執行
      this.logger.warn('Failed to persist command history', { error: errorMessage(err) });
    }
  }

  private requireStore(): CommandStorePort {
    if (!this.options.store) {
      throw new InvalidOperationError('No command store configured');
    }
    return this.options.store;
  }

  private require(sessionId: string): TerminalSessionState {
    const state = this.sessions.get(sessionId);
    if (state) return state;
    if (this.closed.has(sessionId)) throw new SessionClosedError(sessionId);
    throw new SessionNotFoundError(sessionId);
  }

  private requireActive(sessionId: string): TerminalSessionState {
    const state = this.require(sessionId);
    if (!state.session.isActive) throw new SessionClosedError(sessionId);
    return state;
  }
}
