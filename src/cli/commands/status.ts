/**
 * Coverage summary per spec/impl pairing.
 */
import { Command } from 'commander';
import { openIndex, print, runAction, withCommonOptions, type CommonOptions } from './shared.js';

export function createStatusCommand(): Command {
  return withCommonOptions(new Command('status'))
    .description('Show impl and verify coverage for every spec/impl pairing')
    .action(
      runAction(async (options: CommonOptions) => {
        const { query } = await openIndex(options);
        print(options, query.status(), (formatter, status) => formatter.formatStatus(status));
      })
    );
}
