import type { Command } from 'commander';
import path from 'node:path';
import { ProjectDetector } from '../../application/ProjectDetector.js';
import { loadConfig } from '../../config/ConfigLoader.js';
import { OutputFormatter } from '../formatters/OutputFormatter.js';
import { formatOption, parseFormat, repoRootOption, type CommonOptions } from '../options.js';

/** 註冊 detect 指令：只讀建置檔，不需要資料庫 */
export function registerDetectCommand(program: Command): void {
  program
    .command('detect')
    .description('Detect the build backend of a project')
    .argument('[projectPath]', 'Project directory (defaults to the repository root)')
    .addOption(repoRootOption())
    .addOption(formatOption())
    .action((projectPath: string | undefined, opts: CommonOptions) => {
      const formatter = new OutputFormatter(parseFormat(opts.format));
      const config = loadConfig(opts.repoRoot);
      const detector = new ProjectDetector(config.backends.native.manifestName);
      const detection = detector.detect(path.resolve(opts.repoRoot, projectPath ?? '.'));

      process.stdout.write(formatter.formatObject({
        projectPath: detection.projectPath,
        backendType: detection.backendType ?? 'unknown',
        markers: detection.markers,
      }) + '\n');
      if (!detection.backendType) process.exitCode = 1;
    });
}
