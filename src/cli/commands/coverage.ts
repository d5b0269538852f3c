/**
 * `uncovered` and `untested`: rules missing impl or verify references.
 */
import { Command } from 'commander';
import { openIndex, print, runAction, withCommonOptions, type CommonOptions } from './shared.js';

interface GapOptions extends CommonOptions {
  prefix?: string;
}

type GapKind = 'uncovered' | 'untested';

function createGapCommand(kind: GapKind, description: string): Command {
  return withCommonOptions(new Command(kind))
    .description(description)
    .argument('[spec-impl]', 'Limit to "spec" or "spec/impl"')
    .option('-p, --prefix <id>', 'Only rules under this id prefix, e.g. "auth"')
    .action(
      runAction(async (specImpl: string | undefined, options: GapOptions) => {
        const { query } = await openIndex(options);
        const gaps =
          kind === 'uncovered' ? query.uncovered(specImpl, options.prefix) : query.untested(specImpl, options.prefix);
        print(options, gaps, (formatter, value) => formatter.formatGaps(value, kind));
      })
    );
}

export function createUncoveredCommand(): Command {
  return createGapCommand('uncovered', 'List rules with no impl reference');
}

export function createUntestedCommand(): Command {
  return createGapCommand('untested', 'List rules with no verify reference');
}
