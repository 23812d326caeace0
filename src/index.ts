// Domain
export * from './domain/entities/OutputEvent.js';
export * from './domain/entities/BuildSession.js';
export type * from './domain/entities/TerminalSession.js';
export type * from './domain/entities/CommandRecord.js';
export * from './domain/errors/DomainErrors.js';
export type * from './domain/ports/ProcessExecutorPort.js';
export type * from './domain/ports/BackendAdapterPort.js';
export type * from './domain/ports/ArtifactLocatorPort.js';
export type * from './domain/ports/CommandStorePort.js';
export * from './domain/value-objects/BackendType.js';
export * from './domain/value-objects/BuildOperation.js';
export * from './domain/value-objects/HistoryCursor.js';

// Application
export { BuildDispatcher, type StartBuildRequest, type BuildDispatcherOptions } from './application/BuildDispatcher.js';
export {
  TerminalSessionManager,
  type TerminalSessionManagerOptions,
  type CreateTerminalRequest,
} from './application/TerminalSessionManager.js';
export { ProjectDetector, type ProjectDetection } from './application/ProjectDetector.js';

// Infrastructure
export { ChildProcessExecutor, type ChildProcessExecutorOptions, type SpawnFn } from './infrastructure/process/ChildProcessExecutor.js';
export { OutputClassifier, classifyLine, type ClassifyContext } from './infrastructure/classification/OutputClassifier.js';
export { StreamClassifier, type RunSummary } from './infrastructure/classification/StreamClassifier.js';
export {
  compileRuleTable,
  loadRuleTables,
  defaultRuleTables,
  defaultArtifactExtensions,
  loadRuleFile,
  type CompiledRuleTable,
  type RuleTableDefinition,
} from './infrastructure/classification/RuleTable.js';
export { BackendRegistry } from './infrastructure/backends/BackendRegistry.js';
export { ManagedBuildToolAdapter } from './infrastructure/backends/ManagedBuildToolAdapter.js';
export { PackageManagerAdapter } from './infrastructure/backends/PackageManagerAdapter.js';
export { NativeDriverAdapter } from './infrastructure/backends/NativeDriverAdapter.js';
export { FileSystemArtifactLocator } from './infrastructure/artifacts/FileSystemArtifactLocator.js';
export { DatabaseManager } from './infrastructure/sqlite/DatabaseManager.js';
export { SqliteCommandStore } from './infrastructure/sqlite/SqliteCommandStore.js';
export { InMemoryCommandStore } from './infrastructure/store/InMemoryCommandStore.js';
export { TranscriptWriter } from './infrastructure/transcript/TranscriptWriter.js';

// Config
export { loadConfig } from './config/ConfigLoader.js';
export { DEFAULT_CONFIG } from './config/defaults.js';
export type * from './config/types.js';

export { Logger, type LogLevel, type LogSink } from './shared/Logger.js';
export { createRuntime, type Runtime, type RuntimeOptions } from './cli/runtime.js';
export { createMcpServer } from './mcp/McpServer.js';
