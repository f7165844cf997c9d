import { Command } from 'commander';
import { CONTENT_CATEGORIES, MEDIA_TYPES } from './api/types.js';
import { searchOptionsSchema, type SearchOptions } from './schemas/cliSchemas.js';
import { validateArgs } from './utils/validation.js';

/**
 * Creates the command definition. `exitOverride` makes commander throw
 * instead of exiting so the caller decides the exit code.
 */
export function createProgram(): Command {
  return new Command()
    .name('photo-harvest')
    .description('Authorize against Google and list matching items from your photo library')
    .version('0.1.0')
    .option('-c, --category <categories...>', `content categories to include (${CONTENT_CATEGORIES.join(', ')})`)
    .option('-x, --exclude-category <categories...>', 'content categories to exclude')
    .option('-m, --media-type <type>', `media type (${MEDIA_TYPES.join(', ')})`)
    .option('--favorites', 'only favorites')
    .option('-d, --date <dates...>', 'dates to match: YYYY, YYYY-MM or YYYY-MM-DD')
    .option('--from <date>', 'start of a date range (with --to)')
    .option('--to <date>', 'end of a date range (with --from)')
    .option('--include-archived', 'include archived items')
    .option('--app-created-only', 'only items created by this app')
    .option('-a, --album <id>', 'list an album instead of filtering')
    .option('-s, --page-size <n>', 'items per page (1-100)', '100')
    .option('-p, --pages <n>', 'maximum number of pages to fetch', '1')
    .option('-f, --format <format>', 'output format: urls | json', 'urls')
    .exitOverride();
}

/**
 * Parses command-line arguments into validated search options.
 *
 * @param argv - Arguments without the node executable and script path.
 * @throws CommanderError for unknown options, help or version output.
 * @throws UsageError if an option value is invalid.
 */
export function parseSearchArguments(argv: string[]): SearchOptions {
  const program = createProgram();
  program.parse(argv, { from: 'user' });
  return validateArgs(program.opts(), searchOptionsSchema);
}
