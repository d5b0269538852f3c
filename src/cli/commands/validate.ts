/**
 * Report findings; exits non-zero when any of them is an error.
 */
import { Command } from 'commander';
import { openIndex, print, runAction, withCommonOptions, type CommonOptions } from './shared.js';

interface ValidateOptions extends CommonOptions {
  strict?: boolean;
}

export function createValidateCommand(): Command {
  return withCommonOptions(new Command('validate'))
    .description('Check duplicates, malformed and broken annotations, and stale references')
    .argument('[spec-impl]', 'Limit to "spec" or "spec/impl"')
    .option('--strict', 'Treat warnings as errors')
    .action(
      runAction(async (specImpl: string | undefined, options: ValidateOptions) => {
        const { query } = await openIndex(options);
        const findings = query.validate(specImpl);
        print(options, findings, (formatter, value) => formatter.formatFindings(value));

        const failing = findings.filter((finding) => options.strict || finding.severity === 'error');
        if (failing.length > 0) {
          process.exitCode = 1;
        }
      })
    );
}
