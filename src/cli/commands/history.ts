import type { Command } from 'commander';
import { OutputFormatter } from '../formatters/OutputFormatter.js';
import { formatOption, parseFormat, parsePositiveInt, repoRootOption, type CommonOptions } from '../options.js';
import { createRuntime } from '../runtime.js';

interface HistoryOptions extends CommonOptions {
  session?: string;
  limit: string;
}

/** 註冊 history 指令：列出已保存的指令歷史（最新的在最後） */
export function registerHistoryCommand(program: Command): void {
  program
    .command('history')
    .description('Show persisted command history')
    .addOption(repoRootOption())
    .addOption(formatOption())
    .option('--session <id>', 'Only commands from this terminal session')
    .option('--limit <number>', 'Number of entries', '50')
    .action((opts: HistoryOptions) => {
      const formatter = new OutputFormatter(parseFormat(opts.format));
      const runtime = createRuntime(opts.repoRoot);

      try {
        const entries = runtime.store.listHistory({
          sessionId: opts.session,
          limit: parsePositiveInt(opts.limit, 'limit'),
        });
        if (opts.format === 'json') {
          process.stdout.write(formatter.formatObject(entries) + '\n');
          return;
        }
        if (entries.length === 0) {
          process.stdout.write('No command history.\n');
          return;
        }
        for (const entry of entries) {
          const date = new Date(entry.executedAt).toISOString().slice(0, 19).replace('T', ' ');
          process.stdout.write(`${date}  ${entry.command}\n`);
        }
      } finally {
        runtime.close();
      }
    });
}
