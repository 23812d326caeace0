import type { Command } from 'commander';
import path from 'node:path';
import { OutputFormatter } from '../formatters/OutputFormatter.js';
import { formatOption, parseFormat, repoRootOption, type CommonOptions } from '../options.js';
import { createRuntime } from '../runtime.js';
import { joinCommandWords } from '../../shared/text.js';

interface ExecOptions extends CommonOptions {
  cwd?: string;
  saveTranscript?: string | boolean;
}

/** 註冊 exec 指令：單次終端機 session */
export function registerExecCommand(program: Command): void {
  program
    .command('exec')
    .description('Run a command in a one-shot terminal session (cd, clear and help are built in)')
    .argument('<command...>', 'Command words, or the whole command line as one quoted argument')
    .addOption(repoRootOption())
    .addOption(formatOption())
    .option('--cwd <path>', 'Working directory (defaults to the repository root)')
    .option('--save-transcript [fileName]', 'Save the session output to the terminal log directory')
    .action(async (words: string[], opts: ExecOptions) => {
      const formatter = new OutputFormatter(parseFormat(opts.format));
      const runtime = createRuntime(opts.repoRoot);

      try {
        const session = runtime.terminals.create({
          workingDirectory: path.resolve(runtime.rootDir, opts.cwd ?? '.'),
        });
        const onInterrupt = () => {
          runtime.terminals.cancel(session.id);
        };
        process.once('SIGINT', onInterrupt);

        try {
          for await (const event of runtime.terminals.execute(session.id, joinCommandWords(words))) {
            process.stdout.write(formatter.formatEvent(event) + '\n');
          }
          const outcome = await runtime.terminals.whenIdle(session.id);
          if (outcome !== undefined && outcome !== 'SUCCEEDED') process.exitCode = 1;
        } finally {
          process.off('SIGINT', onInterrupt);
        }

        if (opts.saveTranscript) {
          const fileName = typeof opts.saveTranscript === 'string' ? opts.saveTranscript : undefined;
          const filePath = await runtime.terminals.saveTranscript(session.id, fileName);
          process.stderr.write(`Terminal output saved to: ${filePath}\n`);
        }
      } finally {
        runtime.close();
      }
    });
}
