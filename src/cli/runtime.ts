import path from 'node:path';
import { BuildDispatcher } from '../application/BuildDispatcher.js';
import { ProjectDetector } from '../application/ProjectDetector.js';
import { TerminalSessionManager } from '../application/TerminalSessionManager.js';
import { loadConfig, type BuildmuxConfig, type PartialConfig } from '../config/ConfigLoader.js';
import type { CommandStorePort } from '../domain/ports/CommandStorePort.js';
import { FileSystemArtifactLocator } from '../infrastructure/artifacts/FileSystemArtifactLocator.js';
import { BackendRegistry } from '../infrastructure/backends/BackendRegistry.js';
import { OutputClassifier } from '../infrastructure/classification/OutputClassifier.js';
import { ChildProcessExecutor } from '../infrastructure/process/ChildProcessExecutor.js';
import { DatabaseManager } from '../infrastructure/sqlite/DatabaseManager.js';
import { SqliteCommandStore } from '../infrastructure/sqlite/SqliteCommandStore.js';
import { InMemoryCommandStore } from '../infrastructure/store/InMemoryCommandStore.js';
import { TranscriptWriter } from '../infrastructure/transcript/TranscriptWriter.js';
import { Logger } from '../shared/Logger.js';

export interface RuntimeOptions {
  /** false 時指令歷史與書籤只存在記憶體 */
  persistent?: boolean;
  overrides?: PartialConfig;
}

export interface Runtime {
  rootDir: string;
  config: BuildmuxConfig;
  logger: Logger;
  dispatcher: BuildDispatcher;
  terminals: TerminalSessionManager;
  store: CommandStorePort;
  detector: ProjectDetector;
  close(): void;
}

/** 依設定組裝所有元件；CLI 指令與 MCP server 共用 */
export function createRuntime(rootDir: string, options: RuntimeOptions = {}): Runtime {
  const root = path.resolve(rootDir);
  const config = loadConfig(root, options.overrides);
  const logger = new Logger('buildmux', config.logging.level);

  const executor = new ChildProcessExecutor({
    idleTimeoutMs: config.process.idleTimeoutMs,
    killGraceMs: config.process.killGraceMs,
    logger: logger.child('process'),
  });
  const classifier = new OutputClassifier();

  let dbMgr: DatabaseManager | undefined;
  let store: CommandStorePort;
  if (options.persistent === false) {
    store = new InMemoryCommandStore();
  } else {
    dbMgr = new DatabaseManager(path.resolve(root, config.store.dbPath), logger.child('db'));
    store = new SqliteCommandStore(dbMgr.getDb());
  }

  const dispatcher = new BuildDispatcher(
    executor,
    BackendRegistry.fromConfig(config.backends),
    classifier,
    new FileSystemArtifactLocator(),
    { idleTimeoutMs: config.process.idleTimeoutMs, logger: logger.child('build') },
  );

  const terminals = new TerminalSessionManager(executor, classifier, {
    shell: config.process.shell,
    shellArgs: config.process.shellArgs,
    historyLimit: config.terminal.historyLimit,
    idleTimeoutMs: config.process.idleTimeoutMs,
    homeDir: config.terminal.homeDir,
    store,
    transcripts: new TranscriptWriter(path.resolve(root, config.terminal.logDir)),
    logger: logger.child('terminal'),
  });

  return {
    rootDir: root,
    config,
    logger,
    dispatcher,
    terminals,
    store,
    detector: new ProjectDetector(config.backends.native.manifestName),
    close() {
      dispatcher.cancelAll();
      terminals.closeAll();
      dbMgr?.close();
    },
  };
}
