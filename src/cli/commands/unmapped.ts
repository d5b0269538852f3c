import { Command } from 'commander';
import { openIndex, print, runAction, withCommonOptions, type CommonOptions } from './shared.js';

/**
 * Create the unmapped command.
 */
export function createUnmappedCommand(): Command {
  return withCommonOptions(new Command('unmapped'))
    .description('List code units no annotation points at')
    .argument('[path]', 'Only files under this path')
    .action(
      runAction(async (scope: string | undefined, options: CommonOptions) => {
        const { query } = await openIndex(options);
        print(options, query.unmapped(scope), (formatter, value) => formatter.formatUnmapped(value));
      })
    );
}
