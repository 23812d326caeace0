import type { Command } from 'commander';
import path from 'node:path';
import type { BackendType } from '../../domain/value-objects/BackendType.js';
import type { BuildOperation } from '../../domain/value-objects/BuildOperation.js';
import { OutputFormatter } from '../formatters/OutputFormatter.js';
import { backendOption, formatOption, parseBackend, parseFormat, repoRootOption, type CommonOptions } from '../options.js';
import { createRuntime, type Runtime } from '../runtime.js';

interface BuildCommandOptions extends CommonOptions {
  project?: string;
  backend?: string;
  release?: boolean;
}

interface AddDependencyOptions extends BuildCommandOptions {
  depVersion?: string;
  features?: string;
}

/** 註冊 build / clean / test / add-dep / remove-dep / cross-build 指令 */
export function registerBuildCommands(program: Command): void {
  withBuildOptions(program.command('build'))
    .description('Build the project (debug unless --release)')
    .option('--release', 'Release profile')
    .argument('[extraArgs...]', 'Extra arguments passed to the toolchain')
    .action(async (extraArgs: string[], opts: BuildCommandOptions) => {
      await runOperation(opts, { type: 'build', release: opts.release ?? false, extraArgs });
    });

  withBuildOptions(program.command('clean'))
    .description('Remove build outputs')
    .action(async (opts: BuildCommandOptions) => {
      await runOperation(opts, { type: 'clean' });
    });

  withBuildOptions(program.command('test'))
    .description('Run the project tests')
    .option('--release', 'Release profile')
    .argument('[extraArgs...]', 'Extra arguments passed to the toolchain')
    .action(async (extraArgs: string[], opts: BuildCommandOptions) => {
      await runOperation(opts, { type: 'test', release: opts.release ?? false, extraArgs });
    });

  withBuildOptions(program.command('add-dep'))
    .description('Add a dependency (package manager backend)')
    .argument('<name>', 'Dependency name')
    .option('--dep-version <version>', 'Version requirement')
    .option('--features <list>', 'Comma-separated features to enable')
    .action(async (name: string, opts: AddDependencyOptions) => {
      const features = opts.features?.split(',').map((f) => f.trim()).filter((f) => f !== '');
      await runOperation(opts, { type: 'addDependency', name, version: opts.depVersion, features });
    });

  withBuildOptions(program.command('remove-dep'))
    .description('Remove a dependency (package manager backend)')
    .argument('<name>', 'Dependency name')
    .action(async (name: string, opts: BuildCommandOptions) => {
      await runOperation(opts, { type: 'removeDependency', name });
    });

  withBuildOptions(program.command('cross-build'))
    .description('Build for another target triple')
    .argument('<target>', 'Target triple, e.g. aarch64-linux-android')
    .option('--release', 'Release profile')
    .action(async (target: string, opts: BuildCommandOptions) => {
      await runOperation(opts, { type: 'crossTargetBuild', target, release: opts.release ?? false });
    });
}

function withBuildOptions(command: Command): Command {
  return command
    .addOption(repoRootOption())
    .addOption(formatOption())
    .addOption(backendOption())
    .option('--project <path>', 'Project directory (defaults to the repository root)');
}

/** 執行一個 build session，串流事件直到結束；非 SUCCEEDED 時 exit code 1 */
async function runOperation(opts: BuildCommandOptions, operation: BuildOperation): Promise<void> {
  const formatter = new OutputFormatter(parseFormat(opts.format));
  const runtime = createRuntime(opts.repoRoot);

  try {
    const projectPath = path.resolve(runtime.rootDir, opts.project ?? '.');
    const backendType = opts.backend ? parseBackend(opts.backend) : detectBackend(runtime, projectPath);

    const session = runtime.dispatcher.start({ projectPath, backendType, operation });
    const onInterrupt = () => {
      runtime.dispatcher.cancel(session.id);
    };
    process.once('SIGINT', onInterrupt);

    try {
      for await (const event of runtime.dispatcher.events(session.id)) {
        process.stdout.write(formatter.formatEvent(event) + '\n');
      }
      const finished = await runtime.dispatcher.waitFor(session.id);
      if (finished.status !== 'SUCCEEDED') process.exitCode = 1;
    } finally {
      process.off('SIGINT', onInterrupt);
    }
  } finally {
    runtime.close();
  }
}

function detectBackend(runtime: Runtime, projectPath: string): BackendType {
  const detection = runtime.detector.detect(projectPath);
  if (!detection.backendType) {
    throw new Error(`No build files found in ${projectPath}; pass --backend explicitly`);
  }
  return detection.backendType;
}
