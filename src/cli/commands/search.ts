import { Command } from 'commander';
import { DEFAULT_SEARCH_LIMIT } from '../../core/query/search.js';
import { openIndex, parseCount, print, runAction, withCommonOptions, type CommonOptions } from './shared.js';

interface SearchOptions extends CommonOptions {
  limit?: string;
}

/**
 * Create the search command.
 */
export function createSearchCommand(): Command {
  return withCommonOptions(new Command('search'))
    .description('Search rule ids, rule text and source code')
    .argument('<query>', 'Text to search for')
    .option('-l, --limit <n>', 'Maximum number of results', String(DEFAULT_SEARCH_LIMIT))
    .action(
      runAction(async (text: string, options: SearchOptions) => {
        const { query } = await openIndex(options);
        const limit = parseCount(options.limit, DEFAULT_SEARCH_LIMIT);
        print(options, query.search(text, limit), (formatter, value) => formatter.formatSearch(value));
      })
    );
}
