import { Command } from 'commander';
import { openIndex, print, runAction, withCommonOptions, type CommonOptions } from './shared.js';

/**
 * Create the config command.
 */
export function createConfigCommand(): Command {
  return withCommonOptions(new Command('config'))
    .description('Show resolved specs, prefixes and implementation file counts')
    .action(
      runAction(async (options: CommonOptions) => {
        const { query } = await openIndex(options);
        print(options, query.config(), (formatter, value) => formatter.formatConfig(value));
      })
    );
}
