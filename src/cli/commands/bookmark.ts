import type { Command } from 'commander';
import { BookmarkNotFoundError } from '../../domain/errors/DomainErrors.js';
import { OutputFormatter } from '../formatters/OutputFormatter.js';
import { formatOption, parseFormat, repoRootOption, type CommonOptions } from '../options.js';
import { createRuntime } from '../runtime.js';

interface AddOptions extends CommonOptions {
  description: string;
  tag: string[];
  favorite?: boolean;
}

interface ListOptions extends CommonOptions {
  favorites?: boolean;
  tag?: string;
}

interface FavoriteOptions {
  repoRoot: string;
  unset?: boolean;
}

function collectTags(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/** 註冊 bookmark 指令群組 */
export function registerBookmarkCommand(program: Command): void {
  const bookmarkCmd = program
    .command('bookmark')
    .description('Manage bookmarked commands');

  bookmarkCmd
    .command('add')
    .description('Bookmark a command')
    .argument('<command>', 'Command line (quote it)')
    .addOption(repoRootOption())
    .addOption(formatOption())
    .option('--description <text>', 'What the command does', '')
    .option('--tag <tag>', 'Tag (repeatable)', collectTags, [])
    .option('--favorite', 'Mark as favorite')
    .action((command: string, opts: AddOptions) => {
      const formatter = new OutputFormatter(parseFormat(opts.format));
      const runtime = createRuntime(opts.repoRoot);
      try {
        const bookmark = runtime.store.addBookmark({
          command: command.trim(),
          description: opts.description,
          tags: opts.tag,
          isFavorite: opts.favorite ?? false,
        });
        process.stdout.write(
          opts.format === 'json'
            ? formatter.formatObject(bookmark) + '\n'
            : `Command bookmarked: ${bookmark.command}\n  ID: ${bookmark.id}\n`,
        );
      } finally {
        runtime.close();
      }
    });

  bookmarkCmd
    .command('list')
    .description('List bookmarked commands')
    .addOption(repoRootOption())
    .addOption(formatOption())
    .option('--favorites', 'Only favorites')
    .option('--tag <tag>', 'Only bookmarks with this tag')
    .action((opts: ListOptions) => {
      const formatter = new OutputFormatter(parseFormat(opts.format));
      const runtime = createRuntime(opts.repoRoot);
      try {
        const bookmarks = runtime.store.listBookmarks({ favoritesOnly: opts.favorites, tag: opts.tag });
        if (opts.format === 'json') {
          process.stdout.write(formatter.formatObject(bookmarks) + '\n');
          return;
        }
        if (bookmarks.length === 0) {
          process.stdout.write('No bookmarks.\n');
          return;
        }
        for (const b of bookmarks) {
          const star = b.isFavorite ? '★' : ' ';
          process.stdout.write(`${star} ${b.id}  ${b.command}  (used ${b.useCount}x)\n`);
          if (b.description) process.stdout.write(`    ${b.description}\n`);
        }
      } finally {
        runtime.close();
      }
    });

  bookmarkCmd
    .command('run')
    .description('Run a bookmarked command in a one-shot terminal session')
    .argument('<id>', 'Bookmark ID')
    .addOption(repoRootOption())
    .addOption(formatOption())
    .option('--cwd <path>', 'Working directory (defaults to the repository root)')
    .action(async (id: string, opts: CommonOptions & { cwd?: string }) => {
      const formatter = new OutputFormatter(parseFormat(opts.format));
      const runtime = createRuntime(opts.repoRoot);
      try {
        const session = runtime.terminals.create({ workingDirectory: opts.cwd ?? runtime.rootDir });
        for await (const event of runtime.terminals.runBookmark(session.id, id)) {
          process.stdout.write(formatter.formatEvent(event) + '\n');
        }
        const outcome = await runtime.terminals.whenIdle(session.id);
        if (outcome !== undefined && outcome !== 'SUCCEEDED') process.exitCode = 1;
      } finally {
        runtime.close();
      }
    });

  bookmarkCmd
    .command('favorite')
    .description('Mark or unmark a bookmark as favorite')
    .argument('<id>', 'Bookmark ID')
    .addOption(repoRootOption())
    .option('--unset', 'Remove the favorite mark')
    .action((id: string, opts: FavoriteOptions) => {
      const runtime = createRuntime(opts.repoRoot);
      try {
        const updated = runtime.store.setFavorite(id, !opts.unset);
        if (!updated) throw new BookmarkNotFoundError(id);
        process.stdout.write(`${updated.isFavorite ? 'Favorited' : 'Unfavorited'}: ${updated.command}\n`);
      } finally {
        runtime.close();
      }
    });

  bookmarkCmd
    .command('remove')
    .description('Delete a bookmark')
    .argument('<id>', 'Bookmark ID')
    .addOption(repoRootOption())
    .action((id: string, opts: { repoRoot: string }) => {
      const runtime = createRuntime(opts.repoRoot);
      try {
        if (!runtime.store.removeBookmark(id)) throw new BookmarkNotFoundError(id);
        process.stdout.write(`Bookmark removed: ${id}\n`);
      } finally {
        runtime.close();
      }
    });
}
