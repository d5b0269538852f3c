import { Command } from 'commander';
import { openIndex, print, runAction, withCommonOptions, type CommonOptions } from './shared.js';

interface StaleOptions extends CommonOptions {
  prefix?: string;
}

/**
 * Create the stale command.
 */
export function createStaleCommand(): Command {
  return withCommonOptions(new Command('stale'))
    .description('List references whose captured fingerprint no longer matches the rule')
    .argument('[spec-impl]', 'Limit to "spec" or "spec/impl"')
    .option('-p, --prefix <id>', 'Only rules under this id prefix')
    .action(
      runAction(async (specImpl: string | undefined, options: StaleOptions) => {
        const { query } = await openIndex(options);
        print(options, query.stale(specImpl, options.prefix), (formatter, value) => formatter.formatStale(value));
      })
    );
}
