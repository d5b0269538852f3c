import { Command } from 'commander';
import { openIndex, print, runAction, withCommonOptions, type CommonOptions } from './shared.js';

interface RuleOptions extends CommonOptions {
  spec?: string;
}

/**
 * Create the rule command.
 */
export function createRuleCommand(): Command {
  return withCommonOptions(new Command('rule'))
    .description('Show a rule with its declarations and references')
    .argument('<id>', 'Rule id, e.g. auth.login')
    .option('-s, --spec <name>', 'Spec to look in (default: first spec declaring the id)')
    .action(
      runAction(async (id: string, options: RuleOptions) => {
        const { query } = await openIndex(options);
        print(options, query.ruleDetail(id, options.spec), (formatter, value) => formatter.formatRule(value));
      })
    );
}
