import { Command } from 'commander';
import { openIndex, print, runAction, withCommonOptions, type CommonOptions } from './shared.js';

/**
 * Create the tree command.
 */
export function createTreeCommand(): Command {
  return withCommonOptions(new Command('tree'))
    .description('Show unit coverage aggregated by directory')
    .argument('[path]', 'Subtree to show (default: project root)')
    .action(
      runAction(async (scope: string | undefined, options: CommonOptions) => {
        const { query } = await openIndex(options);
        print(options, query.tree(scope), (formatter, value) => formatter.formatTree(value));
      })
    );
}
